import { createHash, timingSafeEqual } from "node:crypto";
import type { FastifyInstance, FastifyRequest } from "fastify";
import { SubscriberNotFoundError, UnauthorizedError, ValidationError } from "../errors.js";
import { log, withTraceAsync } from "../logger.js";
import { confirmQuerySchema } from "../domain/validation.js";
import type { AppOptions } from "./app.js";

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * Bearer auth for admin routes. Both sides are hashed first so the
 * comparison is constant-time regardless of key length.
 */
export function verifyAdminKey(authHeader: string | undefined, adminApiKey: string): boolean {
  if (!authHeader?.startsWith("Bearer ")) {
    return false;
  }
  const provided = authHeader.slice(7);
  return timingSafeEqual(digest(provided), digest(adminApiKey));
}

export function registerRoutes(app: FastifyInstance, options: AppOptions): void {
  const { service } = options;

  const requireAdmin = async (request: FastifyRequest): Promise<void> => {
    if (!verifyAdminKey(request.headers.authorization, options.adminApiKey)) {
      throw new UnauthorizedError();
    }
  };

  app.get("/health", async (_request, reply) => {
    const available = options.cache.isAvailable();
    const circuit = options.cache.circuitStatus?.();
    return reply.status(available ? 200 : 503).send({
      status: available ? "ok" : "degraded",
      cache: { available, ...(circuit && { circuit: circuit.state, failures: circuit.failures }) },
    });
  });

  app.post("/subscriptions", async (request, reply) =>
    withTraceAsync(async () => {
      const result = await service.subscribe(request.body);
      return reply.status(201).send(result);
    }, request.id)
  );

  app.get("/subscriptions/confirm", async (request, reply) =>
    withTraceAsync(async () => {
      const query = confirmQuerySchema.safeParse(request.query);
      if (!query.success) {
        throw ValidationError.fromZodIssues(query.error.issues);
      }

      try {
        return await service.confirm(query.data.token);
      } catch (error) {
        // A verified link whose subscriber is gone no longer resolves
        if (error instanceof SubscriberNotFoundError) {
          log.subscription.warn({ subscriberId: error.subscriberId }, "token names unknown subscriber");
          return reply.status(401).send(error.toJSON(request.id));
        }
        throw error;
      }
    }, request.id)
  );

  app.get<{ Params: { id: string } }>(
    "/subscriptions/:id",
    { preHandler: requireAdmin },
    async (request) =>
      withTraceAsync(async () => service.getSubscriber(request.params.id), request.id)
  );

  app.post(
    "/issues",
    { preHandler: requireAdmin },
    async (request) =>
      withTraceAsync(async () => {
        const report = await service.publishIssue(request.body, { signal: options.shutdownSignal });
        return report;
      }, request.id)
  );
}
