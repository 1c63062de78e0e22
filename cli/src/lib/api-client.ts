import type {
  BlastRadiusReport,
  ChangeRiskAssessment,
  FailureScenario,
  RiskAssessment,
  RiskComparison,
  SimulateRequest,
  SpofResponse,
} from "./types.js";

export const DEFAULT_API_URL = "http://localhost:8080";

export interface ApiOptions {
  api?: string;
  token?: string;
}

function authHeaders(token?: string): Record<string, string> {
  const t = token || process.env.TOPDECK_API_TOKEN || "";
  if (!t) return {};
  return { authorization: `Bearer ${t}` };
}

function baseUrl(api?: string): string {
  return (api || process.env.TOPDECK_API_URL || DEFAULT_API_URL).replace(/\/$/, "");
}

/** Non-2xx response from the risk API; `message` carries the server's error text. */
export class ApiError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "ApiError";
  }
}

async function errorText(res: Response): Promise<string> {
  const text = await res.text();
  if (!(res.headers.get("content-type") || "").includes("application/json")) {
    return text;
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return text;
  }
  if (typeof parsed === "object" && parsed !== null && "error" in parsed && typeof parsed.error === "string") {
    return parsed.error;
  }
  return text;
}

async function request<T>(label: string, path: string, options: ApiOptions, init: RequestInit = {}): Promise<T> {
  const res = await fetch(`${baseUrl(options.api)}${path}`, {
    ...init,
    headers: { ...(init.body ? { "content-type": "application/json" } : {}), ...authHeaders(options.token) },
  });
  if (!res.ok) {
    throw new ApiError(res.status, `${label} failed: ${res.status} ${await errorText(res)}`);
  }
  return (await res.json()) as T;
}

export function getBlastRadius(
  id: string,
  params: { maxDepth?: number; category?: string },
  options: ApiOptions = {},
): Promise<BlastRadiusReport> {
  const qs = new URLSearchParams();
  if (params.maxDepth !== undefined) qs.set("maxDepth", String(params.maxDepth));
  if (params.category && params.category.trim()) qs.set("category", params.category.trim());
  const query = qs.toString();
  return request(
    "Blast radius",
    `/risk/blast-radius/${encodeURIComponent(id)}${query ? `?${query}` : ""}`,
    options,
  );
}

export function getRiskAssessment(id: string, options: ApiOptions = {}): Promise<RiskAssessment> {
  return request("Risk assessment", `/risk/resources/${encodeURIComponent(id)}`, options);
}

export function simulateFailure(body: SimulateRequest, options: ApiOptions = {}): Promise<FailureScenario> {
  return request("Simulation", "/risk/simulate", options, {
    method: "POST",
    body: JSON.stringify(body),
  });
}

export function getSinglePointsOfFailure(options: ApiOptions = {}): Promise<SpofResponse> {
  return request("SPOF listing", "/risk/spof", options);
}

export function compareResources(ids: string[], options: ApiOptions = {}): Promise<RiskComparison> {
  const qs = new URLSearchParams({ ids: ids.join(",") });
  return request("Comparison", `/risk/compare?${qs.toString()}`, options);
}

export function getChangeRisk(id: string, at: string | undefined, options: ApiOptions = {}): Promise<ChangeRiskAssessment> {
  const query = at ? `?${new URLSearchParams({ at }).toString()}` : "";
  return request("Change risk", `/risk/resources/${encodeURIComponent(id)}/change-risk${query}`, options);
}
