/**
 * Fastify error handler plugin: every failure of the preview API leaves as
 * an ApiError body; unknown site paths get the generated 404 page.
 */

import { existsSync, readFileSync } from "node:fs";

import fp from "fastify-plugin";

import type { ApiError } from "../../types/api.js";
import type {
  FastifyError,
  FastifyInstance,
  FastifyReply,
  FastifyRequest,
} from "fastify";

export class NotFoundError extends Error {
  code = "NOT_FOUND" as const;
  statusCode = 404;

  constructor(message: string) {
    super(message);
    this.name = "NotFoundError";
  }
}

// Id-map failures while serving are server-side problems
const DOMAIN_STATUS: Readonly<Record<string, number>> = {
  ID_MAP_FORMAT: 500,
  ID_MAP_INTEGRITY: 500,
  CONFIG_INVALID: 500,
};

export interface ErrorHandlerOptions {
  /** HTML page sent for unknown non-API paths (the site's 404.html) */
  notFoundPage?: string;
}

interface Failure {
  status: number;
  body: Omit<ApiError, "requestId">;
  /** Worth an error log line */
  unexpected: boolean;
}

function classify(error: FastifyError): Failure {
  if (error.validation !== undefined) {
    return {
      status: 400,
      body: {
        error: "VALIDATION_ERROR",
        message: "Invalid request parameters",
        details: { validation: error.validation },
      },
      unexpected: false,
    };
  }

  if (error instanceof NotFoundError || error.statusCode === 404) {
    return {
      status: 404,
      body: { error: "NOT_FOUND", message: error.message || "Resource not found" },
      unexpected: false,
    };
  }

  const domainStatus = DOMAIN_STATUS[error.code];
  if (domainStatus !== undefined) {
    return {
      status: domainStatus,
      body: { error: error.code, message: error.message },
      unexpected: true,
    };
  }

  return {
    status: 500,
    body: { error: "INTERNAL_ERROR", message: "An unexpected error occurred" },
    unexpected: true,
  };
}

function errorHandlerPlugin(
  fastify: FastifyInstance,
  options: ErrorHandlerOptions
): void {
  fastify.setErrorHandler(
    (error: FastifyError, request: FastifyRequest, reply: FastifyReply) => {
      const failure = classify(error);
      if (failure.unexpected) {
        request.log.error(error, "Request failed");
      }
      const response: ApiError = { ...failure.body, requestId: request.id };
      return reply.status(failure.status).send(response);
    }
  );

  fastify.setNotFoundHandler((request: FastifyRequest, reply: FastifyReply) => {
    const page = options.notFoundPage;
    const isApi = request.url === "/api" || request.url.startsWith("/api/");
    if (!isApi && page !== undefined && existsSync(page)) {
      return reply
        .status(404)
        .type("text/html; charset=utf-8")
        .send(readFileSync(page, "utf8"));
    }

    const response: ApiError = {
      error: "NOT_FOUND",
      message: `Route ${request.method} ${request.url} not found`,
      requestId: request.id,
    };
    return reply.status(404).send(response);
  });
}

export const errorHandler = fp(errorHandlerPlugin, {
  name: "error-handler",
});
