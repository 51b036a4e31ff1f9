/**
 * Provider postback endpoint
 *
 * POST /api/dataforseo/postback?id=&tag=
 * Body is the task_get-shaped JSON, optionally gzip-encoded.
 */

import { gunzip } from "node:zlib";
import { promisify } from "node:util";
import type { FastifyInstance } from "fastify";
import type { ServerOrchestrator } from "../app";
import { errorMessage } from "@/utils";
import * as logger from "@/logger";

const gunzipAsync = promisify(gunzip);

interface CallbackRoutesOptions {
  orchestrator: ServerOrchestrator;
}

interface PostbackRequest {
  Querystring: { id?: string; tag?: string };
  Body: Buffer | undefined;
}

function isGzipEncoded(encoding: string | string[] | undefined): boolean {
  const values = Array.isArray(encoding) ? encoding : [encoding ?? ""];
  return values.some((value) => value.toLowerCase().includes("gzip"));
}

export async function callbackRoutes(fastify: FastifyInstance, options: CallbackRoutesOptions) {
  // Raw bytes for every content type; decoding happens in the handler
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser("*", { parseAs: "buffer" }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post<PostbackRequest>(
    "/dataforseo/postback",
    async (request, reply) => {
      const { id, tag } = request.query;
      const raw = Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0);

      let payload: string;
      try {
        payload = isGzipEncoded(request.headers["content-encoding"])
          ? (await gunzipAsync(raw)).toString("utf8")
          : raw.toString("utf8");
      } catch (error) {
        logger.warn("Postback body could not be decompressed", {
          remoteTaskId: id,
          tag,
          error: errorMessage(error),
        });
        return reply.status(400).send({ ok: false, message: "Invalid gzip payload." });
      }

      try {
        const result = await options.orchestrator.handleCallback({
          remoteIdHint: id ?? null,
          tagHint: tag ?? null,
          payload,
        });

        if (!result.accepted) {
          logger.warn("Postback processing failed", {
            remoteTaskId: id,
            tag,
            message: result.message,
          });
          return reply.status(400).send({ ok: false, message: result.message });
        }

        return reply.send({ ok: true, message: result.message });
      } catch (error) {
        logger.error("Postback handler error", { remoteTaskId: id, tag, error: errorMessage(error) });
        return reply.status(500).send({ ok: false, message: "Internal error." });
      }
    },
  );
}
