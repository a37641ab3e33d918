import Fastify from "fastify";
import rateLimit from "@fastify/rate-limit";
import type { Telegraf } from "telegraf";
import type { Update } from "telegraf/types";

import type { Logger } from "./logger.js";
import type { LookupStore } from "./lookups.js";

export type HttpServerDeps = {
  lookups: LookupStore;
  adminApiKey?: string;
  bot?: Telegraf;
  webhookPath: string;
};

export function createHttpServer(logger: Logger, deps: HttpServerDeps) {
  const fastify = Fastify({ loggerInstance: logger });

  fastify.register(rateLimit, { global: false });

  fastify.get("/", async () => ({
    service: "realtor-intake-bot",
    health: "/health"
  }));

  fastify.get("/health", async () => ({
    status: "ok",
    lookupsLoadedAt: deps.lookups.lastLoadedAt()?.toISOString() ?? null
  }));

  const bot = deps.bot;
  if (bot) {
    fastify.post<{ Body: Update }>(
      deps.webhookPath,
      {
        config: {
          rateLimit: {
            max: 120,
            timeWindow: "1 minute",
            keyGenerator: (request: { ip: string }) => request.ip
          }
        }
      },
      async (request) => {
        await bot.handleUpdate(request.body);
        return { ok: true };
      }
    );
  }

  fastify.post(
    "/admin/reload",
    {
      config: {
        rateLimit: {
          max: 10,
          timeWindow: "1 minute",
          keyGenerator: (request: { ip: string }) => request.ip
        }
      }
    },
    async (request, reply) => {
      const apiKey = request.headers["x-api-key"];
      if (!deps.adminApiKey || apiKey !== deps.adminApiKey) {
        return reply.code(401).send({ error: "Unauthorized" });
      }

      const result = await deps.lookups.reload();
      if (!result.ok) {
        return reply.code(502).send({ error: "Config source unavailable", detail: result.error });
      }
      return { status: "reloaded", counts: result.counts, skipped: result.skipped };
    }
  );

  return fastify;
}
