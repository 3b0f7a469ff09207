import type { FastifyInstance } from "fastify";
import { z } from "zod";

import type { ReceiverStatsV1 } from "@seismolink/contracts";

import type { SampleTap } from "./sample_tap";

export const RECENT_DEFAULT_LIMIT = 50;
export const RECENT_MAX_LIMIT = 500;

const RecentQuerySchema = z.object({
  limit: z.coerce.number().int().optional(),
});

export type MonitorRuntime = {
  tap: SampleTap;
  stats(): ReceiverStatsV1;
};

export function registerMonitorRoutes(app: FastifyInstance, runtime: MonitorRuntime): void {
  app.get("/api/health", async (_req, reply) => {
    return reply.send({ ok: true, samples: runtime.tap.size });
  });

  app.get("/api/samples/latest", async (_req, reply) => {
    const latest = runtime.tap.latestSample;
    if (!latest) return reply.code(404).send({ ok: false, error: "no sample received yet" });
    return reply.send({ ok: true, sample: latest.toJSON() });
  });

  app.get("/api/samples/recent", async (req, reply) => {
    const q = RecentQuerySchema.safeParse(req.query ?? {});
    if (!q.success) return reply.code(400).send({ ok: false, error: "invalid limit" });
    const limit = Math.max(1, Math.min(q.data.limit ?? RECENT_DEFAULT_LIMIT, RECENT_MAX_LIMIT));
    return reply.send({ ok: true, samples: runtime.tap.recent(limit).map((s) => s.toJSON()) });
  });

  app.get("/api/receiver/stats", async (_req, reply) => {
    return reply.send({ ok: true, stats: runtime.stats(), tap_rejected: runtime.tap.rejected });
  });
}
