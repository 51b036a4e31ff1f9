/**
 * Operator endpoints over the task ledger
 *
 * GET    /api/enrichment/tasks?limit=&kind=&status=
 * POST   /api/enrichment/tasks/:id/populate
 * POST   /api/enrichment/tasks/populate-ready?kind=
 * DELETE /api/enrichment/tasks/errors?kind=
 */

import type { FastifyInstance, FastifyReply } from "fastify";
import type { TaskKind, TaskStatus } from "@/types";
import type { ServerOrchestrator } from "../app";
import { isAllKindsFilter, normalizeTaskKind, normalizeTaskStatus } from "@/enrichment/taskKinds";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

interface TasksRoutesOptions {
  orchestrator: ServerOrchestrator;
}

interface KindQuery {
  kind?: string;
}

interface ListTasksQuery extends KindQuery {
  limit?: string;
  status?: string;
}

type Filter<T> = { ok: true; value: T | null } | { ok: false; message: string };

function parseKindFilter(raw: string | undefined): Filter<TaskKind> {
  if (isAllKindsFilter(raw)) {
    return { ok: true, value: null };
  }
  const kind = normalizeTaskKind(raw);
  return kind ? { ok: true, value: kind } : { ok: false, message: `Unknown kind: ${raw}` };
}

function parseStatusFilter(raw: string | undefined): Filter<TaskStatus> {
  if (isAllKindsFilter(raw)) {
    return { ok: true, value: null };
  }
  const status = normalizeTaskStatus(raw);
  return status ? { ok: true, value: status } : { ok: false, message: `Unknown status: ${raw}` };
}

function sendError(reply: FastifyReply, route: string, error: unknown) {
  logger.error("Enrichment route failed", { route, error: errorMessage(error) });
  return reply.status(500).send({ error: "Internal error" });
}

export async function tasksRoutes(fastify: FastifyInstance, options: TasksRoutesOptions) {
  const { orchestrator } = options;

  fastify.get<{ Querystring: ListTasksQuery }>(
    "/enrichment/tasks",
    async (request, reply) => {
      const kind = parseKindFilter(request.query.kind);
      if (!kind.ok) {
        return reply.status(400).send({ error: kind.message });
      }
      const status = parseStatusFilter(request.query.status);
      if (!status.ok) {
        return reply.status(400).send({ error: status.message });
      }

      const limit = request.query.limit ? Number(request.query.limit) : null;

      try {
        const tasks = orchestrator.getLatestTasks(limit, kind.value, status.value);
        return reply.send({ tasks });
      } catch (error) {
        return sendError(reply, "GET /enrichment/tasks", error);
      }
    },
  );

  fastify.post<{ Querystring: KindQuery }>(
    "/enrichment/tasks/populate-ready",
    async (request, reply) => {
      const kind = parseKindFilter(request.query.kind);
      if (!kind.ok) {
        return reply.status(400).send({ error: kind.message });
      }

      try {
        const summary = await orchestrator.populateReadyTasks(kind.value);
        return reply.send(summary);
      } catch (error) {
        return sendError(reply, "POST /enrichment/tasks/populate-ready", error);
      }
    },
  );

  fastify.post<{ Params: { id: string } }>(
    "/enrichment/tasks/:id/populate",
    async (request, reply) => {
      const taskId = Number(request.params.id);
      if (!Number.isInteger(taskId) || taskId <= 0) {
        return reply.status(400).send({ error: "Task id must be a positive integer" });
      }

      try {
        const result = await orchestrator.populateTask(taskId);
        return reply.send({
          ok: result.success,
          message: result.message,
          itemCount: result.itemCount,
        });
      } catch (error) {
        return sendError(reply, "POST /enrichment/tasks/:id/populate", error);
      }
    },
  );

  fastify.delete<{ Querystring: KindQuery }>(
    "/enrichment/tasks/errors",
    async (request, reply) => {
      const kind = parseKindFilter(request.query.kind);
      if (!kind.ok) {
        return reply.status(400).send({ error: kind.message });
      }

      try {
        const deleted = orchestrator.deleteErrorTasks(kind.value);
        return reply.send({ deleted });
      } catch (error) {
        return sendError(reply, "DELETE /enrichment/tasks/errors", error);
      }
    },
  );
}
