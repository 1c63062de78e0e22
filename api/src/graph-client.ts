import neo4j, { type Driver } from "neo4j-driver";
import { GraphAccessError } from "./errors.js";

let driver: Driver | null = null;

/** Runs one read query and returns each record as a plain object. */
export type CypherRunner = (
  cypher: string,
  params: Record<string, unknown>,
) => Promise<Array<Record<string, unknown>>>;

function credentials(env: NodeJS.ProcessEnv = process.env) {
  return {
    url: env.NEO4J_URL || "",
    user: env.NEO4J_USER || "neo4j",
    password: env.NEO4J_PASSWORD || "",
  };
}

export function isGraphEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  const { url, user, password } = credentials(env);
  return Boolean(url && user && password);
}

export function getDriver(): Driver | null {
  if (!isGraphEnabled()) return null;
  if (!driver) {
    const { url, user, password } = credentials();
    driver = neo4j.driver(url, neo4j.auth.basic(user, password));
  }
  return driver;
}

/** The slice of a neo4j `Driver` the query runner needs. */
export interface SessionSource {
  session(config: { defaultAccessMode: "READ" | "WRITE" }): {
    run(
      cypher: string,
      params: Record<string, unknown>,
    ): Promise<{ records: Array<{ toObject(): Record<string, unknown> }> }>;
    close(): Promise<void>;
  };
}

export function neo4jQueryRunner(d: SessionSource): CypherRunner {
  return async (cypher, params) => {
    const session = d.session({ defaultAccessMode: neo4j.session.READ });
    try {
      const result = await session.run(cypher, params);
      return result.records.map((record) => record.toObject());
    } finally {
      await session.close();
    }
  };
}

/** Resolves the shared driver on every call; fails when Neo4j is not configured. */
export const defaultQueryRunner: CypherRunner = (cypher, params) => {
  const d = getDriver();
  if (!d) {
    return Promise.reject(new GraphAccessError("Neo4j is not configured (set NEO4J_URL and NEO4J_PASSWORD)"));
  }
  return neo4jQueryRunner(d)(cypher, params);
};

export async function closeDriver(): Promise<void> {
  if (driver) {
    await driver.close();
    driver = null;
  }
}
