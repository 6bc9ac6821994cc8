import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import bodyParser from "body-parser";
import type { AlertSettingsRepository } from "./db/alerts";
import type { DeviceRepository } from "./db/devices";
import type { StorageProfileRepository } from "./db/storageProfiles";
import type { TelemetryStore } from "./db/telemetry";
import { errorMessage } from "./errors";
import type { AlertEvaluator } from "./pipeline/alertEvaluator";
import type { CredentialVerifier } from "./pipeline/credentialVerifier";
import type { IngestPipeline } from "./pipeline/ingestPipeline";
import type { RateLimiter } from "./pipeline/rateLimiter";
import { createAlertSettingsRouter } from "./routes/alertSettings";
import { createDevicesRouter } from "./routes/devices";
import { createHealthRouter, type DbPing } from "./routes/health";
import { createIngestRouter } from "./routes/ingest";
import { createStorageRouter } from "./routes/storage";
import { createTelemetryRouter } from "./routes/telemetry";
import { createLogger } from "./utils/logger";

const log = createLogger("http");

export interface AppServices {
  pipeline: IngestPipeline;
  verifier: CredentialVerifier;
  keyRotationLimiter: RateLimiter;
  devices: DeviceRepository;
  store: TelemetryStore;
  profiles: StorageProfileRepository;
  alertSettings: AlertSettingsRepository;
  alerts: AlertEvaluator;
  ping: DbPing;
}

export function createApp(services: AppServices) {
  const app = express();

  app.set("trust proxy", true);
  app.use(cors());

  /* ------------------------- Logging middleware -------------------------- */
  app.use((req, _res, next) => {
    log.debug({ method: req.method, path: req.path, ip: req.ip }, "Request");
    next();
  });

  /* --------------------------- Register routes --------------------------- */
  // /telemetry/ingest is matched before /telemetry/:serial, and before the JSON
  // parser: device bodies are parsed only after authentication.
  app.use("/telemetry", createIngestRouter(services.pipeline));

  app.use(bodyParser.json({ limit: "256kb" }));
  app.use("/telemetry", createTelemetryRouter(services));
  app.use("/devices", createAlertSettingsRouter(services));
  app.use("/devices", createDevicesRouter(services));
  app.use("/storage", createStorageRouter(services));
  app.use("/health", createHealthRouter(services.ping));

  app.use((req, res) => {
    res.status(404).json({ status: "error", code: "NOT_FOUND", message: `No route for ${req.method} ${req.path}` });
  });

  /* --------------------------- Global Error Trap -------------------------- */
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    // Malformed JSON from body-parser
    if (err instanceof SyntaxError) {
      res.status(400).json({ status: "error", code: "VALIDATION_ERROR", message: "Malformed JSON body" });
      return;
    }
    log.error({ path: req.path, err: errorMessage(err) }, "Uncaught server error");
    res.status(500).json({ status: "error", code: "INTERNAL", message: "Internal server error" });
  });

  return app;
}
