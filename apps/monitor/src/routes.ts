import type { FastifyInstance, FastifyReply } from "fastify";
import { z } from "zod";

import { DayZ, DeviceDayStatusZ, DeviceDayStreamsV1Z, formatIssues } from "@devicewatch/contracts";

import { ThresholdPatchRejected } from "./config/patch";
import type { MonitorRuntime } from "./runtime";
import { MAX_LIST_LIMIT } from "./store/sqlite_store";

const OptionsZ = z.object({ config_patch: z.unknown().optional() }).strict();

export const EvaluateBodyZ = z
  .object({
    device_id: z.string().min(1),
    day: DayZ,
    streams: DeviceDayStreamsV1Z,
    options: OptionsZ.optional(),
  })
  .strict();

const RunDayParamsZ = z.object({ day: DayZ });
const RunDayBodyZ = z.object({ options: OptionsZ.optional() }).strict();

const OutcomesQueryZ = z
  .object({
    day: DayZ.optional(),
    status: DeviceDayStatusZ.optional(),
    limit: z.coerce.number().int().optional(),
  })
  .strict();

function badRequest(reply: FastifyReply, err: z.ZodError) {
  return reply.code(400).send({ ok: false, errors: formatIssues(err) });
}

function patchRejected(reply: FastifyReply, e: unknown) {
  if (e instanceof ThresholdPatchRejected) {
    return reply.code(e.status).send({ ok: false, errors: e.errors });
  }
  throw e;
}

export function registerMonitorRoutes(app: FastifyInstance, runtime: MonitorRuntime): void {
  app.get("/api/monitor/config", async (_req, reply) => {
    return reply.send(runtime.manifest());
  });

  app.post("/api/monitor/evaluate", async (req, reply) => {
    const body = EvaluateBodyZ.safeParse(req.body ?? {});
    if (!body.success) return badRequest(reply, body.error);

    try {
      const outcome = await runtime.evaluateUnit({
        device_id: body.data.device_id,
        day: body.data.day,
        streams: body.data.streams,
        config_patch: body.data.options?.config_patch,
      });
      return reply.send(outcome);
    } catch (e) {
      return patchRejected(reply, e);
    }
  });

  app.post("/api/monitor/days/:day/run", async (req, reply) => {
    const params = RunDayParamsZ.safeParse(req.params);
    if (!params.success) return badRequest(reply, params.error);
    const body = RunDayBodyZ.safeParse(req.body ?? {});
    if (!body.success) return badRequest(reply, body.error);

    try {
      const report = await runtime.processDay(params.data.day, { config_patch: body.data.options?.config_patch });
      return reply.send(report);
    } catch (e) {
      return patchRejected(reply, e);
    }
  });

  app.get("/api/monitor/outcomes", async (req, reply) => {
    const q = OutcomesQueryZ.safeParse(req.query ?? {});
    if (!q.success) return badRequest(reply, q.error);
    const limit = Math.max(1, Math.min(q.data.limit ?? 100, MAX_LIST_LIMIT));
    return reply.send({ outcomes: runtime.listOutcomes({ day: q.data.day, status: q.data.status, limit }) });
  });
}
