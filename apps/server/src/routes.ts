import type { FastifyInstance, FastifyReply } from "fastify";
import { ZodError } from "zod";

import { mergeMiningConfigV1, MiningRunRequestV1Z } from "@cooccur/contracts";
import type { MiningConfigV1 } from "@cooccur/contracts";
import { isMiningKernelError, projectConfigToOptionsV1, projectMiningResultV1, runMiningV1 } from "@cooccur/mining-kernel";

import { applyServiceLimits } from "./limits";
import type { ServiceLimitsV1 } from "./limits";

export type MiningRouteDeps = {
  // Effective profile config, read on every request.
  loadConfig: () => MiningConfigV1;
  limits: ServiceLimitsV1;
};

type RouteError = { code: string; path: string; message: string };

function rejected(reply: FastifyReply, errors: RouteError[], status = 400): FastifyReply {
  return reply.code(status).send({ ok: false, errors });
}

export function registerMiningRoutes(app: FastifyInstance, deps: MiningRouteDeps): void {
  app.get("/api/mining/config", async (_req, reply) => {
    return reply.send(deps.loadConfig());
  });

  app.post("/api/mining/run", async (req, reply) => {
    try {
      const body = MiningRunRequestV1Z.parse(req.body ?? {});
      const config = applyServiceLimits(mergeMiningConfigV1(deps.loadConfig(), body.config), deps.limits);
      const run = runMiningV1(body.transactions, projectConfigToOptionsV1(config));
      req.log.info(
        { transactions: run.transactionCount, levels: run.levels.length, rules: run.rules.length },
        "mining run complete"
      );
      return reply.send(projectMiningResultV1(run));
    } catch (e: unknown) {
      if (e instanceof ZodError) {
        return rejected(
          reply,
          e.issues.map((i) => ({ code: i.code, path: i.path.join("."), message: i.message }))
        );
      }
      if (isMiningKernelError(e)) {
        // Too much work for this service is 413; anything else is a bad request.
        const status = e.code === "CANDIDATE_LIMIT_EXCEEDED" ? 413 : 400;
        return rejected(reply, [{ code: e.code, path: e.context, message: e.message }], status);
      }
      throw e;
    }
  });
}
