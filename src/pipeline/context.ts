import type { Device, NewTelemetrySample, StorageProfile } from '../types';

/** What the transport hands the pipeline; nothing here is trusted yet. */
export interface IngestRequest {
  requestId: string;
  /** Raw `Authorization` header value. */
  authorization: string | undefined;
  body: unknown;
  remoteIp: string | null;
}

export interface AuthenticatedContext extends IngestRequest {
  device: Device;
}

export interface QuotaCheckedContext extends AuthenticatedContext {
  storage: StorageProfile;
}

export interface ValidatedContext extends QuotaCheckedContext {
  sample: NewTelemetrySample;
  /** Address the device reported for itself, falling back to the peer address. */
  reportedIp: string | null;
}
