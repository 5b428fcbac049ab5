import type { ZodType } from 'zod';

import type { InstrumentationCollector } from './instrumentation.js';

export interface SidecarClientConfig {
  /** Base address used when a call does not pass its own, e.g. `http://localhost:3500`. */
  defaultAddress: string;
  defaultHeaders?: Record<string, string> | undefined;
  hooks?: SidecarClientHooks | undefined;
  instrumentation?: InstrumentationCollector | undefined;
  /** Per-call timeout in milliseconds. */
  timeout?: number | undefined;
}

/**
 * Options every operation accepts.
 */
export interface SidecarCallOptions {
  /** Overrides the client's default sidecar address for this call. */
  daprAddress?: string | undefined;
  signal?: AbortSignal | undefined;
}

export interface JsonResponseOptions<T> extends SidecarCallOptions {
  schema?: ZodType<T> | undefined;
}

export interface GetSecretOptions<T> extends JsonResponseOptions<T> {
  /** Raw query string appended to the secret URL, e.g. `metadata.version_id=15`. */
  metadata?: string | undefined;
}

/**
 * A keyed state value with an optional concurrency version.
 *
 * Records read from the sidecar carry the raw response body stream as
 * `value`; records written to it carry any JSON-serializable value.
 */
export interface StateRecord<TValue = unknown> {
  key: string;
  value: TValue;
  etag?: string | undefined;
}

export type StateReadRecord = StateRecord<ReadableStream<Uint8Array> | undefined>;

export interface BindingMessage {
  /** Selects the binding endpoint; never part of the request body. */
  bindingName: string;
  data: unknown;
  operation?: string | undefined;
  metadata?: Record<string, string> | undefined;
}

export type SidecarOperation =
  | 'state.save'
  | 'state.get'
  | 'invoke'
  | 'binding.send'
  | 'pubsub.publish'
  | 'secret.get';

export interface SidecarClientHooks {
  /**
   * Called once when a call reaches the transport.
   * Paired with exactly one terminal event (onRequestSuccess or onRequestFailure).
   */
  onRequestStart?: (event: { endpoint: string; method: string; operation: SidecarOperation; timestamp: number }) => void;

  onRequestSuccess?: (event: {
    durationMs: number;
    endpoint: string;
    method: string;
    operation: SidecarOperation;
    status: number;
  }) => void;

  /**
   * Called once when the transport fails, the sidecar answers with a
   * non-success status, or the caller cancels.
   */
  onRequestFailure?: (event: {
    durationMs: number;
    endpoint: string;
    error: string;
    errorCode: string;
    method: string;
    operation: SidecarOperation;
    status?: number | undefined;
  }) => void;
}
