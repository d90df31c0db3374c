import Fastify from "fastify";
import type { FastifyInstance } from "fastify";

import { loadMiningConfig } from "../../miner/src/config";
import { loadServiceLimits } from "./limits";
import { registerMiningRoutes } from "./routes";
import type { MiningRouteDeps } from "./routes";

export type BuildServerOptions = Partial<MiningRouteDeps> & {
  logger?: boolean;
};

export function buildServer(options: BuildServerOptions = {}): FastifyInstance {
  const app = Fastify({ logger: options.logger ?? true, bodyLimit: 10 * 1024 * 1024 });

  app.addHook("onRequest", async (req, reply) => {
    reply.header("Access-Control-Allow-Origin", "*");
    reply.header("Access-Control-Allow-Headers", "content-type");
    reply.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") return reply.code(204).send();
  });

  registerMiningRoutes(app, {
    loadConfig: options.loadConfig ?? (() => loadMiningConfig()),
    limits: options.limits ?? loadServiceLimits()
  });
  return app;
}
