import { cfg } from "./config";
import { createApp } from "./app";
import { startCronJobs } from "./cron";
import { PgAlertSettingsRepository, PgAlertStateStore } from "./db/alerts";
import { PgCredentialRepository } from "./db/credentials";
import { PgDeviceRepository } from "./db/devices";
import { ensureSchema } from "./db/ensureSchema";
import { pool } from "./db/pool";
import { MemoryCounterStore, PgCounterStore, type CounterStore } from "./db/rateLimitCounters";
import { PgStorageProfileRepository } from "./db/storageProfiles";
import { PgTelemetryStore } from "./db/telemetry";
import { errorMessage } from "./errors";
import { AlertEvaluator } from "./pipeline/alertEvaluator";
import { BcryptSecretHasher, CredentialVerifier } from "./pipeline/credentialVerifier";
import { IngestPipeline } from "./pipeline/ingestPipeline";
import { LogTransport, Notifier, WebhookTransport, type NotificationTransport } from "./pipeline/notifier";
import { QuotaEnforcer } from "./pipeline/quotaEnforcer";
import { RateLimiter } from "./pipeline/rateLimiter";
import { createLogger } from "./utils/logger";

const log = createLogger("server");

async function main() {
  await ensureSchema(pool);

  const devices = new PgDeviceRepository(pool);
  const store = new PgTelemetryStore(pool);
  const profiles = new PgStorageProfileRepository(pool);
  const alertSettings = new PgAlertSettingsRepository(pool);

  const counters: CounterStore =
    cfg.RATE_LIMIT_BACKEND === "postgres" ? new PgCounterStore(pool) : new MemoryCounterStore();
  const transport: NotificationTransport = cfg.NOTIFY_WEBHOOK_URL
    ? new WebhookTransport(cfg.NOTIFY_WEBHOOK_URL, cfg.NOTIFY_TIMEOUT_MS, cfg.NOTIFY_FROM)
    : new LogTransport();

  const verifier = new CredentialVerifier(
    new PgCredentialRepository(pool),
    new BcryptSecretHasher(cfg.CREDENTIAL_HASH_ROUNDS)
  );
  const rateLimiter = new RateLimiter(counters, {
    capacity: cfg.RATE_LIMIT_CAPACITY,
    windowMs: cfg.RATE_LIMIT_WINDOW_SECONDS * 1000,
  });
  const keyRotationLimiter = new RateLimiter(counters, {
    capacity: cfg.KEY_ROTATION_LIMIT,
    windowMs: cfg.KEY_ROTATION_WINDOW_SECONDS * 1000,
    prefix: "key-rotation",
  });
  const alerts = new AlertEvaluator(alertSettings, new PgAlertStateStore(pool));

  const pipeline = new IngestPipeline({
    verifier,
    rateLimiter,
    quota: new QuotaEnforcer(profiles),
    devices,
    store,
    alerts,
    notifier: new Notifier(transport),
  });

  const app = createApp({
    pipeline,
    verifier,
    keyRotationLimiter,
    devices,
    store,
    profiles,
    alertSettings,
    alerts,
    ping: async () => {
      const { rows } = await pool.query<{ db_time: Date }>("SELECT NOW() AS db_time");
      return rows[0].db_time;
    },
  });

  const server = app.listen(cfg.PORT, () => {
    log.info({ port: cfg.PORT, rateLimitBackend: cfg.RATE_LIMIT_BACKEND }, "Telemetry core listening");
    if (!cfg.CORE_API_KEY && !cfg.CORE_JWT_SECRET) {
      log.warn("CORE_API_KEY and CORE_JWT_SECRET not set; collaborator endpoints will reject every call");
    }
    if (!cfg.NOTIFY_WEBHOOK_URL) log.warn("NOTIFY_WEBHOOK_URL not set; alerts are logged only");
  });

  const tasks = cfg.ENABLE_CRON ? startCronJobs({ pool, store, profiles, rateLimiter }) : [];

  const shutdown = (signal: string) => {
    log.info({ signal }, "Shutting down");
    tasks.forEach((t) => t.stop());
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          log.error({ err: errorMessage(err) }, "Pool shutdown failed");
          process.exit(1);
        });
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  log.fatal({ err: errorMessage(err) }, "Startup failed");
  process.exit(1);
});
