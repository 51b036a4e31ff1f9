/**
 * HTTP surface: provider callback endpoint and operator endpoints
 */

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { EnrichmentOrchestrator } from "@/enrichment";
import { callbackRoutes } from "./routes/callbackRoutes";
import { tasksRoutes } from "./routes/tasksRoutes";

export type ServerOrchestrator = Pick<
  EnrichmentOrchestrator,
  "handleCallback" | "getLatestTasks" | "populateTask" | "populateReadyTasks" | "deleteErrorTasks"
>;

export interface ServerDeps {
  orchestrator: ServerOrchestrator;
}

export async function buildServer(deps: ServerDeps): Promise<FastifyInstance> {
  // Request logging goes through the project logger in the routes
  const fastify = Fastify({ logger: false });

  await fastify.register(callbackRoutes, { prefix: "/api", orchestrator: deps.orchestrator });
  await fastify.register(tasksRoutes, { prefix: "/api", orchestrator: deps.orchestrator });

  fastify.get("/api/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  return fastify;
}
