import type { DeviceRepository } from '../db/devices';
import { estimateSampleBytes, type TelemetryStore } from '../db/telemetry';
import { IngestError, ValidationFailure, errorMessage, guardStorage } from '../errors';
import type { TelemetrySample } from '../types';
import { createLogger } from '../utils/logger';
import { TelemetryBody, toFieldIssues } from '../validators';
import type { AlertEvaluator, FiredAlert } from './alertEvaluator';
import type { IngestRequest, QuotaCheckedContext, ValidatedContext } from './context';
import type { CredentialVerifier } from './credentialVerifier';
import { admit, reject, type Gate } from './gate';
import type { Notifier } from './notifier';
import type { QuotaEnforcer } from './quotaEnforcer';
import type { RateLimiter } from './rateLimiter';

const log = createLogger('ingest');

export interface IngestDependencies {
  verifier: CredentialVerifier;
  rateLimiter: RateLimiter;
  quota: QuotaEnforcer;
  devices: DeviceRepository;
  store: TelemetryStore;
  alerts: AlertEvaluator;
  notifier: Notifier;
}

export type IngestResult =
  | {
      ok: true;
      sample: TelemetrySample;
      alerts: FiredAlert[];
      /** Settles once every dispatch finished; the response never waits on it. */
      notifications: Promise<boolean[]>;
    }
  | { ok: false; error: IngestError };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

type Decoded = { ok: true; value: unknown } | { ok: false };

/** The ingest route hands over the raw text so that nothing is parsed before the device is known. */
function decodeBody(body: unknown): Decoded {
  if (typeof body !== 'string') return { ok: true, value: body };
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

export const validateBody: Gate<QuotaCheckedContext, ValidatedContext> = async (ctx) => {
  const decoded = decodeBody(ctx.body);
  if (!decoded.ok) return reject(new ValidationFailure([], 'Malformed JSON body'));

  const parsed = TelemetryBody.safeParse(decoded.value);
  if (!parsed.success) return reject(new ValidationFailure(toFieldIssues(parsed.error)));

  const body = parsed.data;
  return admit({
    ...ctx,
    sample: {
      deviceSerial: ctx.device.serial,
      mode: body.mode,
      setpointC: body.setpoint_c,
      tempInsideC: body.temp_inside_c,
      tempOutsideC: body.temp_outside_c ?? null,
      humidityPercent: body.humidity_percent ?? null,
      hysteresisC: body.hysteresis_c,
      output: body.output,
      deviceTs: new Date(body.timestamp),
      rawPayload: isRecord(decoded.value) ? decoded.value : { ...body },
    },
    reportedIp: body.device_ip ?? ctx.remoteIp,
  });
};

/**
 * authenticate → rate limit → quota → validate → store → bookkeeping → alerts.
 *
 * Every gate before the store is free of persistent side effects, except
 * the rate-limit counter itself. Once the sample is written the request
 * succeeds: later steps log their failures instead of failing the request,
 * since a retry would only store the sample twice.
 */
export class IngestPipeline {
  constructor(private readonly deps: IngestDependencies) {}

  async run(req: IngestRequest): Promise<IngestResult> {
    try {
      const authed = await this.deps.verifier.authenticate(req);
      if (!authed.admit) return { ok: false, error: authed.error };

      const throttled = await this.deps.rateLimiter.gate(authed.ctx);
      if (!throttled.admit) return { ok: false, error: throttled.error };

      const withinQuota = await this.deps.quota.gate(throttled.ctx);
      if (!withinQuota.admit) return { ok: false, error: withinQuota.error };

      const validated = await validateBody(withinQuota.ctx);
      if (!validated.admit) return { ok: false, error: validated.error };

      return await this.commit(validated.ctx);
    } catch (err) {
      if (err instanceof IngestError) return { ok: false, error: err };
      throw err;
    }
  }

  private async commit(ctx: ValidatedContext): Promise<IngestResult> {
    const sample = await guardStorage(() => this.deps.store.append(ctx.sample));

    try {
      await Promise.all([
        this.deps.devices.touchLastSeen(ctx.device.serial, sample.receivedAt, ctx.reportedIp),
        this.deps.quota.charge(ctx.device.ownerId, estimateSampleBytes(sample.rawPayload)),
      ]);
    } catch (err) {
      log.error({ requestId: ctx.requestId, device: ctx.device.serial, err: errorMessage(err) }, 'Post-write bookkeeping failed');
    }

    let alerts: FiredAlert[] = [];
    try {
      alerts = await this.deps.alerts.evaluate(ctx.device, sample);
    } catch (err) {
      log.error({ requestId: ctx.requestId, device: ctx.device.serial, err: errorMessage(err) }, 'Alert evaluation failed');
    }

    const notifications = Promise.all(alerts.map((alert) => this.deps.notifier.dispatch(alert)));

    log.info(
      {
        requestId: ctx.requestId,
        device: ctx.device.serial,
        sample: sample.id,
        plan: ctx.storage.plan,
        alerts: alerts.map((a) => a.direction),
      },
      'Ingested telemetry'
    );

    return { ok: true, sample, alerts, notifications };
  }
}
