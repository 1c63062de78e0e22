import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";

const MIN_TOKEN_LENGTH = 16;
const BEARER_PREFIX = "Bearer ";

export interface AuthOptions {
  /** Bearer token; auth is disabled when empty. */
  token?: string;
  /** GET paths reachable without a token. */
  publicPaths?: string[];
}

export function timingSafeEqual(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  let out = 0;
  for (let i = 0; i < a.length; i++) out |= a.charCodeAt(i) ^ b.charCodeAt(i);
  return out === 0;
}

export function bearerToken(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || !value.startsWith(BEARER_PREFIX)) return null;
  return value.slice(BEARER_PREFIX.length);
}

export function registerAuth(app: FastifyInstance, options: AuthOptions = {}): void {
  const token = options.token ?? process.env.TOPDECK_API_TOKEN ?? "";
  if (!token) return;
  const publicPaths = options.publicPaths ?? ["/healthz"];

  if (token.length < MIN_TOKEN_LENGTH) {
    app.log.warn(
      `TOPDECK_API_TOKEN is only ${token.length} characters. ` +
        `For security, use at least ${MIN_TOKEN_LENGTH} characters.`,
    );
  }

  app.addHook("onRequest", async (req: FastifyRequest, reply: FastifyReply) => {
    if (req.method === "GET" && publicPaths.some((p) => req.url.startsWith(p))) return;

    const provided = bearerToken(req.headers.authorization);
    if (provided === null || !timingSafeEqual(provided, token)) {
      return reply.code(401).send({ error: "Unauthorized" });
    }
  });
}
