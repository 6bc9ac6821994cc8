import type { IngestError } from '../errors';

export type Admit<T> = { admit: true; ctx: T };
export type Reject = { admit: false; error: IngestError };
export type GateOutcome<T> = Admit<T> | Reject;

/** One step of the ingest chain: enriches the context or rejects with a reason. */
export type Gate<In, Out = In> = (ctx: In) => Promise<GateOutcome<Out>>;

export function admit<T>(ctx: T): Admit<T> {
  return { admit: true, ctx };
}

export function reject(error: IngestError): Reject {
  return { admit: false, error };
}
