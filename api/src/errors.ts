import type { FastifyInstance, FastifyError, FastifyRequest, FastifyReply } from "fastify";

/** The requested resource id is not present in the graph. */
export class ResourceNotFoundError extends Error {
  readonly statusCode = 404;
  readonly code = "RESOURCE_NOT_FOUND";

  constructor(readonly resourceId: string) {
    super(`Resource not found: ${resourceId}`);
    this.name = "ResourceNotFoundError";
  }
}

/** The graph store could not be read (unreachable, timed out, query rejected). */
export class GraphAccessError extends Error {
  readonly code = "UPSTREAM_SERVICE_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GraphAccessError";
  }
}

/** Analysis configuration or request parameters that cannot be honoured. */
export class InvalidConfigurationError extends Error {
  readonly code = "INVALID_CONFIGURATION";

  constructor(message: string) {
    super(message);
    this.name = "InvalidConfigurationError";
  }
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler(
    async (error: FastifyError, _request: FastifyRequest, reply: FastifyReply) => {
      const statusCode = error.statusCode ?? 500;

      // Fastify validation errors (JSON Schema)
      if (error.validation) {
        return reply.code(400).send({
          error: `Validation failed: ${error.message}`,
        });
      }

      if (error instanceof ResourceNotFoundError) {
        return reply.code(404).send({ error: error.message });
      }

      if (error instanceof InvalidConfigurationError) {
        return reply.code(400).send({
          error: `Invalid configuration: ${error.message}`,
        });
      }

      // Graph store failures surface as 502
      if (
        error instanceof GraphAccessError ||
        error.code === "UPSTREAM_SERVICE_ERROR" ||
        error.name === "UpstreamServiceError"
      ) {
        return reply.code(502).send({
          error: `Upstream service error: ${error.message}`,
        });
      }

      // Auth errors are already handled by auth.ts hook (401)
      if (statusCode >= 400 && statusCode < 500) {
        return reply.code(statusCode).send({
          error: error.message,
        });
      }

      // Internal server errors: do NOT expose stack traces
      app.log.error(error);
      return reply.code(500).send({
        error: "Internal server error",
      });
    },
  );
}
