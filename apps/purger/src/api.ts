import Fastify, { type FastifyInstance, type FastifyReply, type FastifyRequest } from "fastify";
import { createHash, timingSafeEqual } from "node:crypto";
import { z } from "zod";
import type { InvalidationService } from "./services/invalidation-service.js";
import { ProviderConfigError } from "./services/provider-config-source.js";
import type { RequestSummary } from "./types/domain.js";
import { log, withTraceAsync } from "./logger.js";
import { httpRequestDuration, httpRequestsTotal, register } from "./metrics.js";

export interface ApiOptions {
  service: InvalidationService;
  apiKey: string;
  bodyLimit?: number;
  /** Return error messages for 500s (never in production) */
  exposeErrors?: boolean;
}

const PUBLIC_ROUTES = new Set(["/health", "/metrics"]);

function digest(value: string): Buffer {
  return createHash("sha256").update(value).digest();
}

/**
 * Constant-time API key check. Both sides are hashed first so the comparison
 * never depends on the key length.
 */
export function verifyApiKey(authHeader: string | undefined, apiKey: string): boolean {
  if (!authHeader?.startsWith("Bearer ")) {
    return false;
  }
  return timingSafeEqual(digest(authHeader.slice(7)), digest(apiKey));
}

const tenantId = z.string().min(1).max(255);

const submitSchema = z.object({
  tenantId,
  paths: z.array(z.unknown()).max(100_000),
  wait: z.boolean().optional(),
  timeoutMs: z.number().int().min(1).max(300_000).optional(),
});

const purgeAllSchema = z.object({
  tenantId,
  wait: z.boolean().optional(),
  timeoutMs: z.number().int().min(1).max(300_000).optional(),
});

const idParams = z.object({ id: z.string().uuid() });
const tenantParams = z.object({ tenantId });
const listQuery = z.object({ limit: z.coerce.number().int().min(1).max(100).default(20) });

function serializeSummary(summary: RequestSummary) {
  return {
    ...summary,
    createdAt: summary.createdAt.toISOString(),
    startedAt: summary.startedAt?.toISOString() ?? null,
    completedAt: summary.completedAt?.toISOString() ?? null,
    results: summary.results.map((result) => ({
      ...result,
      timestamp: result.timestamp.toISOString(),
    })),
  };
}

/**
 * Run a route handler inside the request's trace. Handlers run after body
 * parsing, which a hook-level context does not survive.
 */
function traced<Req extends FastifyRequest, R>(
  handler: (request: Req, reply: FastifyReply) => Promise<R>
): (request: Req, reply: FastifyReply) => Promise<R> {
  return (request, reply) => withTraceAsync(() => handler(request, reply), request.id);
}

export function buildApi(options: ApiOptions): FastifyInstance {
  const { service } = options;

  const app = Fastify({
    logger: false, // We use our own structured logger
    bodyLimit: options.bodyLimit,
    // The caller's request id becomes the trace id
    requestIdHeader: "x-request-id",
  });

  // Global error handler - prevent stack trace leakage in production
  app.setErrorHandler((error, request, reply) => {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({ error: "Invalid input", details: error.issues, requestId: request.id });
    }
    if (error instanceof ProviderConfigError) {
      log.api.warn({ error: error.message, url: request.url }, "provider not configured");
      return reply.status(422).send({ error: error.message, requestId: request.id });
    }

    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      log.api.error(
        {
          error: error.message,
          stack: error.stack,
          url: request.url,
          method: request.method,
          requestId: request.id,
        },
        "unhandled error"
      );
    }

    return reply.status(statusCode).send({
      error: statusCode >= 500 && !options.exposeErrors ? "Internal server error" : error.message,
      requestId: request.id,
    });
  });

  app.addHook("preHandler", async (request, reply) => {
    if (PUBLIC_ROUTES.has(request.url)) {
      return;
    }
    if (!verifyApiKey(request.headers.authorization, options.apiKey)) {
      return reply.status(401).send({ error: "Unauthorized" });
    }
  });

  app.addHook("onResponse", async (request, reply) => {
    const labels = {
      method: request.method,
      route: request.routeOptions.url ?? "unknown",
      status_code: String(reply.statusCode),
    };
    httpRequestsTotal.inc(labels);
    httpRequestDuration.observe(labels, reply.elapsedTime / 1000);
  });

  app.get("/health", async () => ({
    status: "ok",
    activeDispatches: service.activeDispatches,
  }));

  app.get("/metrics", async (_request, reply) => {
    reply.type(register.contentType);
    return register.metrics();
  });

  app.post("/api/invalidations", traced(async (request, reply) => {
    const body = submitSchema.parse(request.body);
    const outcome = await service.submit(body.tenantId, body.paths, {
      wait: body.wait,
      timeoutMs: body.timeoutMs,
    });

    if (!outcome.accepted) {
      return reply.status(400).send({ error: outcome.error.message, issues: outcome.error.issues });
    }
    if (outcome.summary) {
      return reply.status(200).send({
        requestId: outcome.requestId,
        timedOut: outcome.timedOut ?? false,
        summary: serializeSummary(outcome.summary),
      });
    }
    return reply.status(202).send({ requestId: outcome.requestId });
  }));

  app.post("/api/invalidations/purge-all", traced(async (request, reply) => {
    const body = purgeAllSchema.parse(request.body);
    const outcome = await service.purgeEverything(body.tenantId, {
      wait: body.wait,
      timeoutMs: body.timeoutMs,
    });

    if (!outcome.accepted) {
      return reply.status(400).send({ error: outcome.error.message });
    }
    if (outcome.summary) {
      return reply.status(200).send({
        requestId: outcome.requestId,
        timedOut: outcome.timedOut ?? false,
        summary: serializeSummary(outcome.summary),
      });
    }
    return reply.status(202).send({ requestId: outcome.requestId });
  }));

  app.get("/api/invalidations/:id", traced(async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const summary = await service.getStatus(id);
    if (!summary) {
      return reply.status(404).send({ error: "Invalidation request not found" });
    }
    return serializeSummary(summary);
  }));

  app.get("/api/tenants/:tenantId/invalidations", traced(async (request) => {
    const params = tenantParams.parse(request.params);
    const { limit } = listQuery.parse(request.query);
    const summaries = await service.listRequests(params.tenantId, limit);
    return { requests: summaries.map(serializeSummary) };
  }));

  app.post("/api/invalidations/:id/cancel", traced(async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const outcome = await service.cancel(id);

    switch (outcome) {
      case "cancelled":
        return reply.status(202).send({ requestId: id, status: "cancelling" });
      case "not_running":
        return reply.status(409).send({ error: "Invalidation request is not running" });
      case "not_found":
        return reply.status(404).send({ error: "Invalidation request not found" });
    }
  }));

  app.post("/api/invalidations/:id/retry", traced(async (request, reply) => {
    const { id } = idParams.parse(request.params);
    const outcome = await service.retry(id);

    switch (outcome.status) {
      case "retrying":
        return reply
          .status(202)
          .send({ requestId: id, failedBatches: outcome.failedBatches, resubmitAll: outcome.resubmitAll });
      case "nothing_to_retry":
        return reply.status(200).send({ requestId: id, failedBatches: 0 });
      case "running":
        return reply.status(409).send({ error: "Invalidation request is still running" });
      case "not_found":
        return reply.status(404).send({ error: "Invalidation request not found" });
    }
  }));

  return app;
}
