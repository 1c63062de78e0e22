import Fastify from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import { registerAuth } from "./auth.js";
import {
  loadAnalysisConfig,
  loadDeploymentSchedule,
  type AnalysisConfig,
  type DeploymentSchedule,
} from "./config.js";
import { registerErrorHandler } from "./errors.js";
import { defaultQueryRunner } from "./graph-client.js";
import {
  blastRadiusSchema,
  cascadingFailureSchema,
  changeRiskSchema,
  compareSchema,
  comprehensiveSchema,
  costImpactSchema,
  dependenciesSchema,
  deploymentWindowsSchema,
  mitigationCostsSchema,
  riskAssessmentSchema,
  simulateSchema,
  upstreamHealthSchema,
} from "./schemas.js";
import { compareMitigationCosts, estimateAnnualRiskCost, type MitigationOption } from "./services/cost-impact.js";
import type { FailureType } from "./services/failure-simulator.js";
import type { GraphAccessor, ResourceCatalog } from "./services/graph-accessor.js";
import { Neo4jGraphAccessor } from "./services/neo4j-graph-accessor.js";
import { RiskAnalyzer } from "./services/risk-analyzer.js";
import { pathResourceIds, type TraversalDirection } from "./services/traverser.js";
import { categoryFilter } from "./services/blast-radius.js";

export interface AppDeps {
  graph: GraphAccessor & ResourceCatalog;
  config: AnalysisConfig;
  schedule: DeploymentSchedule;
  logger: boolean;
  /** Overrides TOPDECK_API_TOKEN. */
  apiToken: string;
}

interface IdParams {
  id: string;
}

/** Comma-separated query values, trimmed, empties dropped. */
export function splitList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function buildApp(deps: Partial<AppDeps> = {}) {
  // Trust proxy only when explicitly enabled via env var for security
  const trustProxy = process.env.TRUST_PROXY === "true";
  const app = Fastify({ logger: deps.logger ?? true, trustProxy });
  registerErrorHandler(app);

  // Default to false (disabled); supports comma-separated list of origins
  const origins = splitList(process.env.CORS_ORIGIN);
  const corsOrigin: string | string[] | boolean =
    origins.length === 0 ? false : origins.length === 1 ? origins[0] : origins;
  app.register(cors, {
    origin: corsOrigin,
  });

  // Health check endpoint - registered before rate limiting to avoid rate limit issues
  app.get("/healthz", async () => ({ ok: true }));

  // Validate input to prevent NaN from malformed env values
  const parsed = parseInt(process.env.RATE_LIMIT_MAX || "100", 10);
  const rateLimitMax = Number.isFinite(parsed) && parsed > 0 ? parsed : 100;
  app.register(rateLimit, {
    max: rateLimitMax,
    timeWindow: "1 minute",
  });

  registerAuth(app, { token: deps.apiToken });

  const config = deps.config ?? loadAnalysisConfig();
  const graph =
    deps.graph ?? new Neo4jGraphAccessor(defaultQueryRunner, { defaultStrength: config.defaultEdgeStrength });
  const schedule = deps.schedule ?? loadDeploymentSchedule();
  const analyzer = new RiskAnalyzer({ accessor: graph, catalog: graph, config, schedule, log: app.log });

  app.get<{
    Params: IdParams;
    Querystring: { direction: TraversalDirection; maxDepth?: number; category?: string };
  }>("/resources/:id/dependencies", { schema: dependenciesSchema }, async (req) => {
    const { id } = req.params;
    const { direction, maxDepth, category } = req.query;
    const result = await analyzer.dependencies(id, {
      direction,
      maxDepth: maxDepth ?? config.maxTraversalDepth,
      edgeFilter: categoryFilter(splitList(category)),
    });
    return {
      resourceId: id,
      direction: result.direction,
      maxDepth: result.maxDepth,
      resources: Array.from(result.reached.values(), (r) => ({
        resourceId: r.resourceId,
        distance: r.distance,
        path: pathResourceIds(id, r, direction),
        edges: r.path,
      })),
    };
  });

  app.get<{ Params: IdParams; Querystring: { maxDepth?: number; category?: string } }>(
    "/risk/blast-radius/:id",
    { schema: blastRadiusSchema },
    async (req) => {
      const { maxDepth, category } = req.query;
      return analyzer.blastRadius(req.params.id, { maxDepth, categories: splitList(category) });
    },
  );

  app.get<{ Params: IdParams }>("/risk/resources/:id", { schema: riskAssessmentSchema }, async (req) =>
    analyzer.assess(req.params.id),
  );

  app.get<{ Params: IdParams; Querystring: { currentLoad?: number } }>(
    "/risk/resources/:id/comprehensive",
    { schema: comprehensiveSchema },
    async (req) => analyzer.comprehensive(req.params.id, req.query.currentLoad),
  );

  app.post<{
    Body: {
      resourceId: string;
      failureType: FailureType;
      currentLoad?: number;
      failureFrequency?: number;
      affectedZones?: string[];
      totalZones?: number;
    };
  }>("/risk/simulate", { schema: simulateSchema }, async (req) => {
    const { resourceId, failureType, ...options } = req.body;
    return analyzer.simulate(resourceId, failureType, options);
  });

  app.get<{ Params: IdParams; Querystring: { initialProbability?: number } }>(
    "/risk/cascading-failure/:id",
    { schema: cascadingFailureSchema },
    async (req) => analyzer.cascadingFailure(req.params.id, req.query.initialProbability ?? 1),
  );

  app.get("/risk/spof", async () => {
    const assessments = await analyzer.singlePointsOfFailure();
    return { count: assessments.length, resources: assessments };
  });

  app.get<{ Querystring: { ids: string } }>("/risk/compare", { schema: compareSchema }, async (req) =>
    analyzer.compare(splitList(req.query.ids)),
  );

  app.get<{ Params: IdParams }>(
    "/risk/resources/:id/upstream-health",
    { schema: upstreamHealthSchema },
    async (req) => analyzer.upstreamHealth(req.params.id),
  );

  app.get<{ Params: IdParams; Querystring: { at?: string } }>(
    "/risk/resources/:id/change-risk",
    { schema: changeRiskSchema },
    async (req) => analyzer.changeRisk(req.params.id, req.query.at ? new Date(req.query.at) : new Date()),
  );

  app.get<{ Querystring: { from?: string; days: number } }>(
    "/risk/deployment-windows",
    { schema: deploymentWindowsSchema },
    async (req) => {
      const from = req.query.from ? new Date(req.query.from) : new Date();
      return { windows: analyzer.deploymentWindows(from, req.query.days) };
    },
  );

  app.get<{
    Params: IdParams;
    Querystring: {
      downtimeHours?: number;
      affectedUsers?: number;
      revenueGenerating?: boolean;
      hasSla?: boolean;
      industry?: string;
      annualRevenue?: number;
      failureProbability?: number;
      mttrHours?: number;
    };
  }>("/risk/resources/:id/cost-impact", { schema: costImpactSchema }, async (req) => {
    const { failureProbability, mttrHours, ...request } = req.query;
    const impact = await analyzer.costImpact(req.params.id, request);
    if (failureProbability === undefined) return impact;
    return {
      ...impact,
      annualRiskCost: estimateAnnualRiskCost(
        impact.hourlyImpactRate,
        failureProbability,
        mttrHours ?? impact.downtimeHours,
      ),
    };
  });

  app.post<{ Body: { currentRiskCost: number; options: MitigationOption[] } }>(
    "/risk/mitigation-costs",
    { schema: mitigationCostsSchema },
    async (req) => ({ options: compareMitigationCosts(req.body.currentRiskCost, req.body.options) }),
  );

  return app;
}
