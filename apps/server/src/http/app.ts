import Fastify, { type FastifyInstance } from "fastify";
import { SubscriptionError } from "../errors.js";
import { generateTraceId, log } from "../logger.js";
import type { CircuitBreakerStatus } from "../domain/circuit-breaker/types.js";
import type { IdempotencyCache } from "../domain/idempotency/types.js";
import type { SubscriptionService } from "../services/subscription-service.js";
import { registerRoutes } from "./routes.js";

export interface AppOptions {
  service: Pick<SubscriptionService, "subscribe" | "confirm" | "publishIssue" | "getSubscriber">;
  /** Reported by GET /health */
  cache: Pick<IdempotencyCache, "isAvailable"> & { circuitStatus?(): CircuitBreakerStatus };
  adminApiKey: string;
  maxRequestSizeBytes: number;
  trustProxy?: boolean;
  production?: boolean;
  /** Aborted on shutdown so running broadcasts stop dispatching */
  shutdownSignal?: AbortSignal;
}

const SUPPORTED_CONTENT_TYPES = ["application/json"];

export function buildApp(options: AppOptions): FastifyInstance {
  const app = Fastify({
    logger: false, // We use our own structured logger
    bodyLimit: options.maxRequestSizeBytes,
    trustProxy: options.trustProxy ?? false,
    // Request ids double as trace ids in every log line of the request
    genReqId: () => generateTraceId(),
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof SubscriptionError) {
      const context = {
        code: error.code,
        statusCode: error.statusCode,
        url: request.url,
        method: request.method,
        requestId: request.id,
      };
      if (error.statusCode >= 500) {
        log.api.error({ ...context, error: error.message }, "request failed");
      } else {
        log.api.info(context, "request rejected");
      }
      return reply.status(error.statusCode).send(error.toJSON(request.id));
    }

    const statusCode = error.statusCode ?? 500;

    log.api.error({
      error: error.message,
      stack: error.stack,
      url: request.url,
      method: request.method,
      requestId: request.id,
      statusCode,
    }, "unhandled error");

    // Never leak internals of unexpected failures in production
    return reply.status(statusCode).send({
      error: statusCode >= 500 && options.production ? "Internal server error" : error.message,
      requestId: request.id,
    });
  });

  // Request validation middleware
  app.addHook("onRequest", async (request, reply) => {
    if (request.url === "/health") {
      return;
    }

    const contentLength = request.headers["content-length"];
    if (contentLength && parseInt(contentLength, 10) > options.maxRequestSizeBytes) {
      return reply.status(413).send({
        error: "Request too large",
        maxSize: options.maxRequestSizeBytes,
      });
    }

    if (request.method === "POST") {
      const contentType = request.headers["content-type"];
      if (contentType && !SUPPORTED_CONTENT_TYPES.some((type) => contentType.includes(type))) {
        return reply.status(415).send({
          error: "Unsupported media type",
          supported: SUPPORTED_CONTENT_TYPES,
        });
      }
    }
  });

  registerRoutes(app, options);

  return app;
}
