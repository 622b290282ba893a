import type { RequestError, TimeoutError } from './errors';

export interface Succeeded<T> {
  readonly kind: 'succeeded';
  readonly value: T;
}

export interface Failed {
  readonly kind: 'failed';
  readonly error: RequestError;
}

export interface TimedOut {
  readonly kind: 'timed_out';
  readonly error: TimeoutError;
}

/** Result of a reconciler operation. Errors are returned, not thrown. */
export type Outcome<T = void> = Succeeded<T> | Failed | TimedOut;

/** A read either observes the resource or learns that it does not exist */
export type Observation<T> = { readonly found: true; readonly model: T } | { readonly found: false };

export type FetchOutcome<T> = Succeeded<Observation<T>> | Failed;

export function succeeded(): Succeeded<void>;
export function succeeded<T>(value: T): Succeeded<T>;
export function succeeded(value?: unknown): Succeeded<unknown> {
  return { kind: 'succeeded', value };
}

export function failed(error: RequestError): Failed {
  return { kind: 'failed', error };
}

export function timedOut(error: TimeoutError): TimedOut {
  return { kind: 'timed_out', error };
}

/** Returns the value of a successful outcome and throws the carried error otherwise */
export function unwrap<T>(outcome: Outcome<T>): T {
  if (outcome.kind === 'succeeded') return outcome.value;
  throw outcome.error;
}
