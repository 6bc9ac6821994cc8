import express, { Request } from "express";
import bodyParser from "body-parser";
import { v4 as uuidv4 } from "uuid";
import type { IngestRequest } from "../pipeline/context";
import type { IngestPipeline } from "../pipeline/ingestPipeline";
import { errorReply, route, type HttpReply } from "../utils/http";
import { createLogger } from "../utils/logger";

const log = createLogger("ingest-route");

export async function handleIngest(pipeline: IngestPipeline, req: IngestRequest): Promise<HttpReply> {
  const result = await pipeline.run(req);

  if (!result.ok) {
    log.warn({ requestId: req.requestId, ip: req.remoteIp, code: result.error.code }, "Ingest rejected");
    return errorReply(result.error);
  }

  // Dispatch outcome is logged by the notifier; the device is not kept waiting.
  return {
    status: 201,
    body: {
      status: "ok",
      id: result.sample.id,
      server_ts: result.sample.receivedAt.toISOString(),
    },
  };
}

export function toIngestRequest(req: Request): IngestRequest {
  return {
    requestId: uuidv4(),
    authorization: req.header("authorization"),
    body: req.body,
    remoteIp: req.ip ?? null,
  };
}

/**
 * POST /telemetry/ingest
 * Device-facing endpoint, authenticated with `Authorization: Device <serial>:<secret>`.
 * The body is read as text whatever its content type; the pipeline parses it
 * once the device has been authenticated and throttled.
 */
export function createIngestRouter(pipeline: IngestPipeline) {
  const router = express.Router();

  router.post(
    "/ingest",
    bodyParser.text({ type: () => true, limit: "256kb" }),
    route((req) => handleIngest(pipeline, toIngestRequest(req)))
  );

  return router;
}
