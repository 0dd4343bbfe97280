import Fastify from "fastify";
import type { FastifyError, FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import { z } from "zod";

import { analyze } from "./aggregator.js";
import type { CacheStore } from "./cache_store.js";
import type { CollectionOrchestrator } from "./collection_orchestrator.js";
import { AppError, NoPlatformsAvailableError, ValidationError } from "./errors.js";
import { logRecoverableError } from "./error_utils.js";
import type { EventMonitor } from "./event_monitor.js";
import type { CollectionHealth } from "./health.js";
import type { KeywordRegistry } from "./keyword_registry.js";
import { logger as rootLogger } from "./logger.js";
import { normalizeKeyword } from "./match_engine.js";
import { memoryUsageBytes, registry } from "./metrics.js";
import { summarize } from "./summary_generator.js";
import { PLATFORMS } from "./types.js";
import type { TrendGranularity } from "./types.js";

const logger = rootLogger.child({ component: "http" });

export interface ServerDeps {
  orchestrator: Pick<CollectionOrchestrator, "collect" | "matchCached" | "cacheStats">;
  cache: Pick<CacheStore, "clear">;
  keywords: Pick<KeywordRegistry, "list" | "add" | "remove">;
  monitor: Pick<EventMonitor, "runOnce" | "stats">;
  health: Pick<CollectionHealth, "track" | "report">;
  analysis: { granularity: TrendGranularity; topContributorsLimit: number };
}

const CollectBodySchema = z.object({
  keyword: z.string().trim().min(1, "keyword is required"),
  platforms: z.array(z.string()).optional(),
  mode: z.enum(["historical", "hot"]).default("historical"),
  policy: z.enum(["exact", "fuzzy"]).default("exact"),
  forceRefresh: z.boolean().default(false),
});

const AnalyzeBodySchema = CollectBodySchema.extend({
  fromCache: z.boolean().default(false),
  granularity: z.enum(["day", "month"]).optional(),
});

const KeywordBodySchema = z.object({
  keyword: z.string().trim().min(1, "keyword is required"),
  platforms: z.array(z.enum(PLATFORMS)).optional(),
  enabled: z.boolean().optional(),
});

const ClearCacheQuerySchema = z.object({
  keyword: z.string().trim().min(1).optional(),
});

const KeywordParamsSchema = z.object({
  keyword: z.string().trim().min(1),
});

function parse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    throw new ValidationError(
      parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; "),
    );
  }
  return parsed.data;
}

function handleError(error: FastifyError | Error, request: FastifyRequest, reply: FastifyReply): FastifyReply {
  if (error instanceof NoPlatformsAvailableError) {
    return reply.status(error.statusCode).send({ status: "error", message: error.message, result: error.result });
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logRecoverableError(logger, error, { location: `${request.method} ${request.url}` }, "Request failed");
    }
    return reply.status(error.statusCode).send({ status: "error", message: error.message });
  }

  // Fastify's own client errors, such as a malformed JSON body.
  if ("statusCode" in error && typeof error.statusCode === "number" && error.statusCode < 500) {
    return reply.status(error.statusCode).send({ status: "error", message: error.message });
  }

  logRecoverableError(logger, error, { location: `${request.method} ${request.url}` }, "Unhandled request error");
  return reply.status(500).send({ status: "error", message: "Internal server error" });
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  const server = Fastify({ logger: false });
  await server.register(cors, { origin: true, credentials: true });
  await server.register(helmet, { global: true });

  server.setErrorHandler(handleError);

  server.addHook("onResponse", async (request, reply) => {
    const level = reply.statusCode >= 500 ? "error" : reply.statusCode >= 400 ? "warn" : "info";
    logger[level]({ route: request.url, method: request.method, statusCode: reply.statusCode, durationMs: reply.elapsedTime }, "Request completed");
  });

  server.get("/health", async () => deps.health.report(deps.monitor.stats()));

  server.get("/metrics", async (_request, reply) => {
    memoryUsageBytes.set(process.memoryUsage().rss);
    const body = await registry.metrics();
    reply.header("Content-Type", registry.contentType);
    return reply.send(body);
  });

  const collectTracked = async (body: z.infer<typeof CollectBodySchema>) => {
    const keyword = normalizeKeyword(body.keyword).normalized;
    return deps.health.track(keyword, body.mode, () =>
      deps.orchestrator.collect({
        keyword: body.keyword,
        platforms: body.platforms,
        mode: body.mode,
        policy: body.policy,
        forceRefresh: body.forceRefresh,
      }),
    );
  };

  server.post("/collect", async (request) => collectTracked(parse(CollectBodySchema, request.body)));

  server.post("/analyze", async (request) => {
    const body = parse(AnalyzeBodySchema, request.body);
    const result = body.fromCache
      ? await deps.orchestrator.matchCached({ keyword: body.keyword, platforms: body.platforms, mode: body.mode, policy: body.policy })
      : await collectTracked(body);
    const metrics = analyze(result.posts, {
      granularity: body.granularity ?? deps.analysis.granularity,
      topContributorsLimit: deps.analysis.topContributorsLimit,
    });
    return { result, metrics, summary: summarize(body.keyword, metrics) };
  });

  server.get("/cache/stats", async () => deps.orchestrator.cacheStats());

  server.delete("/cache", async (request) => {
    const query = parse(ClearCacheQuerySchema, request.query);
    const keyword = query.keyword === undefined ? undefined : normalizeKeyword(query.keyword).normalized;
    return { removed: await deps.cache.clear(keyword) };
  });

  server.get("/keywords", async () => ({ keywords: await deps.keywords.list() }));

  server.post("/keywords", async (request, reply) => {
    const entry = await deps.keywords.add(parse(KeywordBodySchema, request.body));
    return reply.status(201).send(entry);
  });

  server.delete("/keywords/:keyword", async (request, reply) => {
    const { keyword } = parse(KeywordParamsSchema, request.params);
    if (!(await deps.keywords.remove(keyword))) {
      throw new AppError(`Keyword "${keyword}" is not registered`, 404);
    }
    return reply.status(204).send();
  });

  server.post("/monitor/check", async (_request, reply) => {
    const result = await deps.monitor.runOnce();
    if (!result) {
      return reply.status(409).send({ status: "error", message: "A monitor check is already running" });
    }
    return {
      events: result.events,
      outcomes: result.outcomes,
      notifiedEntries: Object.keys(result.state.entries).length,
    };
  });

  return server;
}
