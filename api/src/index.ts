import { buildApp } from "./server.js";
import { DEFAULT_ANALYSIS_CONFIG, DEFAULT_DEPLOYMENT_SCHEDULE, loadAnalysisConfig, loadDeploymentSchedule } from "./config.js";
import { closeDriver } from "./graph-client.js";
import { fileURLToPath } from "node:url";
import path from "node:path";

const PORT = Number(process.env.PORT || "8080");

/**
 * Validate required configuration.
 * Returns an array of error messages, or empty array if valid.
 */
export function validateConfig(env: NodeJS.ProcessEnv = process.env): string[] {
  const errors: string[] = [];

  if (!env.NEO4J_URL) {
    errors.push("NEO4J_URL is required (e.g., bolt://localhost:7687)");
  }
  if (!env.NEO4J_PASSWORD) {
    errors.push("NEO4J_PASSWORD is required");
  }

  const port = Number(env.PORT || "8080");
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    errors.push(`PORT must be an integer between 1 and 65535, got ${env.PORT}`);
  }

  try {
    loadAnalysisConfig(env);
  } catch (err) {
    errors.push(err instanceof Error ? err.message : String(err));
  }
  try {
    loadDeploymentSchedule(env);
  } catch (err) {
    errors.push(err instanceof Error ? err.message : String(err));
  }

  return errors;
}

async function init() {
  const configErrors = validateConfig();
  // Defaults stand in for a broken analysis config so the app logger can report it.
  const app = buildApp(
    configErrors.length > 0 ? { config: DEFAULT_ANALYSIS_CONFIG, schedule: DEFAULT_DEPLOYMENT_SCHEDULE } : {},
  );

  if (configErrors.length > 0) {
    app.log.error("Configuration validation failed:");
    configErrors.forEach((error) => app.log.error(`  - ${error}`));
    process.exit(1);
  }

  app.log.info("Configuration validation passed");
  app.addHook("onClose", async () => {
    await closeDriver();
  });

  return app;
}

// Only run when this file is executed directly
const entrypointPath = process.argv[1] ? path.resolve(process.argv[1]) : "";

if (entrypointPath && fileURLToPath(import.meta.url) === entrypointPath) {
  init()
    .then((app) => app.listen({ port: PORT, host: "0.0.0.0" }))
    .catch((err) => {
      console.error("Server startup failed:", err);
      process.exit(1);
    });
}
