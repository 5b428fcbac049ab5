import { getLogger, type Logger } from '@daprlink/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType } from 'zod';

import * as Address from './core/address.js';
import { interpretErrorResponse, malformedErrorBody } from './core/error-body.js';
import { getErrorMessage, isConnectionRefused } from './core/transport-errors.js';
import type { SidecarEffects } from './core/types.js';
import {
  ErrorCodes,
  InvalidArgumentError,
  NormalizedError,
  OperationCancelledError,
  requestFailed,
  sidecarNotPresent,
  type SidecarClientError,
} from './errors.js';
import { sanitizeEndpoint } from './instrumentation.js';
import type {
  BindingMessage,
  GetSecretOptions,
  JsonResponseOptions,
  SidecarCallOptions,
  SidecarClientConfig,
  SidecarOperation,
  StateReadRecord,
  StateRecord,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 100_000;

// RFC 9110 token characters
const HTTP_METHOD_TOKEN = /^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/;

interface SidecarRequest {
  body?: string | undefined;
  method: string;
  operation: SidecarOperation;
  options: SidecarCallOptions;
  path: string;
}

type ResponseInterpreter<T> = (response: Response) => Promise<Result<T, SidecarClientError>>;

/**
 * Returns the first argument that is missing or an empty string.
 */
function findInvalidArgument(args: Record<string, unknown>): InvalidArgumentError | undefined {
  for (const [name, value] of Object.entries(args)) {
    if (typeof value !== 'string' || value === '') {
      return new InvalidArgumentError(name);
    }
  }
  return undefined;
}

const noPayload: ResponseInterpreter<void> = () => Promise.resolve(ok(undefined));

/**
 * HTTP client for the sidecar's state, invocation, binding, pub/sub and secret APIs.
 *
 * Each operation makes exactly one attempt. Failures come back as `Err` values
 * from the SidecarClientError taxonomy; nothing is thrown for expected failures.
 */
export class SidecarClient {
  private readonly config: SidecarClientConfig;
  private readonly logger: Logger;
  private readonly effects: SidecarEffects;
  private readonly agent: Agent;

  // Close state (for idempotent cleanup)
  private closePromise?: Promise<void>;

  constructor(config: SidecarClientConfig, effects?: Partial<SidecarEffects>) {
    this.config = {
      defaultHeaders: {
        Accept: 'application/json',
      },
      timeout: DEFAULT_TIMEOUT_MS,
      ...config,
      defaultAddress: Address.resolveAddress(undefined, config.defaultAddress),
    };

    this.logger = getLogger('SidecarClient');

    // One keep-alive agent shared by every call
    this.agent = new Agent({
      keepAliveTimeout: 10000, // 10 seconds
      keepAliveMaxTimeout: 60000, // 60 seconds
      pipelining: 1,
    });

    this.effects = {
      fetch: ((url: string | URL, init?: RequestInit) =>
        undiciFetch(url, { ...init, dispatcher: this.agent })) as typeof fetch,
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `Sidecar client initialized - DefaultAddress: ${this.config.defaultAddress}, Timeout: ${this.config.timeout}ms`
    );
  }

  get defaultAddress(): string {
    return this.config.defaultAddress;
  }

  /**
   * Save a batch of state records. Records with an etag are written with an
   * optimistic-concurrency check.
   */
  async saveState(
    storeName: string,
    records: readonly StateRecord[],
    options: SidecarCallOptions = {}
  ): Promise<Result<void, SidecarClientError>> {
    const invalid = findInvalidArgument({ storeName });
    if (invalid) {
      return err(invalid);
    }

    const body = JSON.stringify(records.map(({ key, value, etag }) => ({ key, value, etag })));

    return this.performCall(
      { body, method: 'POST', operation: 'state.save', options, path: Address.sidecarPath`/v1.0/state/${storeName}` },
      noPayload
    );
  }

  /**
   * Read a state record. `value` is the raw response body stream and `etag`
   * the sidecar's ETag header, when either is present.
   */
  async getState(
    storeName: string,
    key: string,
    options: SidecarCallOptions = {}
  ): Promise<Result<StateReadRecord, SidecarClientError>> {
    const invalid = findInvalidArgument({ storeName, key });
    if (invalid) {
      return err(invalid);
    }

    return this.performCall(
      { method: 'GET', operation: 'state.get', options, path: Address.sidecarPath`/v1.0/state/${storeName}/${key}` },
      (response) =>
        Promise.resolve(
          ok({
            key,
            value: response.body ?? undefined,
            etag: response.headers.get('etag') ?? undefined,
          })
        )
    );
  }

  /**
   * Read a state value as JSON. An empty body (missing key) yields `undefined`.
   */
  async getStateValue<T>(
    storeName: string,
    key: string,
    options: JsonResponseOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<T | undefined, SidecarClientError>>;
  async getStateValue(
    storeName: string,
    key: string,
    options?: JsonResponseOptions<unknown>
  ): Promise<Result<unknown, SidecarClientError>>;
  async getStateValue<T>(
    storeName: string,
    key: string,
    options: JsonResponseOptions<T> = {}
  ): Promise<Result<unknown, SidecarClientError>> {
    const invalid = findInvalidArgument({ storeName, key });
    if (invalid) {
      return err(invalid);
    }

    return this.performCall(
      { method: 'GET', operation: 'state.get', options, path: Address.sidecarPath`/v1.0/state/${storeName}/${key}` },
      (response) => this.readJson(response, 'state.get', options.schema, true)
    );
  }

  /**
   * Invoke a method on another application through the sidecar.
   */
  async invokeMethod(
    appId: string,
    methodName: string,
    httpVerb: string,
    body?: unknown,
    options: SidecarCallOptions = {}
  ): Promise<Result<void, SidecarClientError>> {
    const invalid = findInvalidArgument({ appId, methodName, httpVerb });
    if (invalid) {
      return err(invalid);
    }

    if (!HTTP_METHOD_TOKEN.test(httpVerb)) {
      return err(new InvalidArgumentError('httpVerb', `httpVerb is not a valid HTTP method: ${httpVerb}`));
    }

    const hasBody = body !== undefined && body !== null;
    const verb = httpVerb.toUpperCase();
    if (hasBody && (verb === 'GET' || verb === 'HEAD')) {
      return err(new InvalidArgumentError('body', `A request body cannot be sent with ${verb}`));
    }

    return this.performCall(
      {
        body: hasBody ? JSON.stringify(body) : undefined,
        method: httpVerb,
        operation: 'invoke',
        options,
        path: Address.sidecarPath`/v1.0/invoke/${appId}/method/${methodName}`,
      },
      noPayload
    );
  }

  /**
   * Send a message to an output binding. The binding name selects the
   * endpoint; the rest of the message is the request body.
   */
  async sendToBinding(message: BindingMessage, options: SidecarCallOptions = {}): Promise<Result<void, SidecarClientError>> {
    const { bindingName, ...payload } = message;
    const invalid = findInvalidArgument({ bindingName });
    if (invalid) {
      return err(invalid);
    }

    return this.performCall(
      {
        body: JSON.stringify(payload),
        method: 'POST',
        operation: 'binding.send',
        options,
        path: Address.sidecarPath`/v1.0/bindings/${bindingName}`,
      },
      noPayload
    );
  }

  /**
   * Publish an event. `payload` is raw JSON text and is sent byte for byte.
   */
  async publishEvent(
    pubsubName: string,
    topicName: string,
    payload?: string,
    options: SidecarCallOptions = {}
  ): Promise<Result<void, SidecarClientError>> {
    const invalid = findInvalidArgument({ pubsubName, topicName });
    if (invalid) {
      return err(invalid);
    }

    return this.performCall(
      {
        body: payload,
        method: 'POST',
        operation: 'pubsub.publish',
        options,
        path: Address.sidecarPath`/v1.0/publish/${pubsubName}/${topicName}`,
      },
      noPayload
    );
  }

  /**
   * Read a secret. The whole response body is parsed as a JSON document.
   */
  async getSecret<T>(
    storeName: string,
    key: string,
    options: GetSecretOptions<T> & { schema: ZodType<T> }
  ): Promise<Result<T, SidecarClientError>>;
  async getSecret(
    storeName: string,
    key: string,
    options?: GetSecretOptions<unknown>
  ): Promise<Result<unknown, SidecarClientError>>;
  async getSecret<T>(
    storeName: string,
    key: string,
    options: GetSecretOptions<T> = {}
  ): Promise<Result<unknown, SidecarClientError>> {
    const invalid = findInvalidArgument({ storeName, key });
    if (invalid) {
      return err(invalid);
    }

    const metadata = options.metadata?.replace(/^\?/, '');
    const query = metadata ? `?${metadata}` : '';

    return this.performCall(
      {
        method: 'GET',
        operation: 'secret.get',
        options,
        path: `${Address.sidecarPath`/v1.0/secrets/${storeName}/${key}`}${query}`,
      },
      (response) => this.readJson(response, 'secret.get', options.schema, false)
    );
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   *
   * Idempotent: safe to call multiple times. Subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (!this.closePromise) {
      this.closePromise = (async () => {
        this.logger.debug('Closing sidecar agent connections');
        try {
          await this.agent.close();
        } catch (error) {
          const errorMessage = getErrorMessage(error);
          this.logger.error(`Failed to close sidecar agent: ${errorMessage}`);
          throw new Error(`Sidecar agent cleanup failed: ${errorMessage}`);
        }
      })();
    }

    return this.closePromise;
  }

  /**
   * Run one call against the sidecar and normalize every outcome.
   *
   * 2xx responses go to `interpret` untouched; non-2xx responses are turned into
   * a NormalizedError from their error body. Thrown transport or body-read
   * failures become cancellation, sidecar-not-present or request-failed errors.
   */
  private async performCall<T>(
    request: SidecarRequest,
    interpret: ResponseInterpreter<T>
  ): Promise<Result<T, SidecarClientError>> {
    const { body, method, operation, options, path } = request;
    const signal = options.signal;

    if (signal?.aborted) {
      return err(new OperationCancelledError(undefined, signal.reason));
    }

    const address = Address.resolveAddress(options.daprAddress, this.config.defaultAddress);
    const url = Address.buildSidecarUrl(address, path);
    const endpoint = sanitizeEndpoint(path);
    const timeout = this.config.timeout ?? DEFAULT_TIMEOUT_MS;
    const hooks = this.config.hooks;

    const startTime = this.effects.now();
    hooks?.onRequestStart?.({ endpoint, method, operation, timestamp: startTime });

    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeout);
    const forwardAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', forwardAbort, { once: true });

    const headers: Record<string, string> = { ...this.config.defaultHeaders };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    let response: Response | undefined;
    let outcome: Result<T, SidecarClientError>;

    try {
      this.effects.log('debug', `Calling sidecar - URL: ${address}${endpoint}, Method: ${method}`, { operation });

      response = await this.effects.fetch(url, {
        // 'fetch' requires null for empty body, not undefined
        body: body ?? null,
        headers,
        method,
        signal: controller.signal,
      });

      outcome = response.ok
        ? await interpret(response)
        : err(await this.interpretFailure(response, controller.signal));
    } catch (error) {
      outcome = err(this.classifyThrown(error, signal, timedOut, timeout));
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', forwardAbort);
    }

    this.report(operation, method, endpoint, startTime, response?.status, outcome);
    return outcome;
  }

  /**
   * Build the NormalizedError for a non-success response.
   * A body that cannot be read counts as a malformed error body, unless the
   * call was aborted, in which case the abort propagates.
   */
  private async interpretFailure(response: Response, signal: AbortSignal): Promise<NormalizedError> {
    if (response.body === null || response.headers.get('content-length') === '0') {
      return interpretErrorResponse(response.status, undefined);
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      return malformedErrorBody(response.status, error);
    }

    return interpretErrorResponse(response.status, text);
  }

  private classifyThrown(
    error: unknown,
    signal: AbortSignal | undefined,
    timedOut: boolean,
    timeout: number
  ): SidecarClientError {
    if (signal?.aborted) {
      return new OperationCancelledError(undefined, signal.reason ?? error);
    }

    if (timedOut) {
      return requestFailed(`Request timeout after ${timeout}ms`, error);
    }

    if (isConnectionRefused(error)) {
      return sidecarNotPresent(error);
    }

    return requestFailed(getErrorMessage(error), error);
  }

  /**
   * Read a success body as JSON and optionally validate it.
   */
  private async readJson<T>(
    response: Response,
    operation: SidecarOperation,
    schema: ZodType<T> | undefined,
    allowEmpty: boolean
  ): Promise<Result<unknown, SidecarClientError>> {
    const text = response.body === null ? '' : await response.text();

    if (allowEmpty && text.trim() === '') {
      return ok(undefined);
    }

    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch (error) {
      return err(
        new NormalizedError(
          'sidecar-error',
          response.status,
          ErrorCodes.MALFORMED_RESPONSE,
          'The response body returned by the sidecar is not valid JSON.',
          error
        )
      );
    }

    if (!schema) {
      return ok(data);
    }

    const parseResult = schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));
    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => `${issue.path}: ${issue.message}`)
      .join('; ');

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      { operation, status: response.status }
    );

    return err(
      new NormalizedError(
        'sidecar-error',
        response.status,
        ErrorCodes.MALFORMED_RESPONSE,
        `Response validation failed: ${firstFiveErrors}`,
        parseResult.error
      )
    );
  }

  /**
   * Emit the terminal hook, log line and metric for a finished call.
   */
  private report<T>(
    operation: SidecarOperation,
    method: string,
    endpoint: string,
    startTime: number,
    status: number | undefined,
    outcome: Result<T, SidecarClientError>
  ): void {
    const durationMs = this.effects.now() - startTime;
    const hooks = this.config.hooks;

    if (outcome.isOk()) {
      hooks?.onRequestSuccess?.({ durationMs, endpoint, method, operation, status: status ?? 0 });
      this.recordMetric(operation, endpoint, method, status ?? 0, durationMs);
      return;
    }

    const error = outcome.error;
    const errorCode = error instanceof NormalizedError ? error.errorCode : ErrorCodes.OPERATION_CANCELLED;

    hooks?.onRequestFailure?.({ durationMs, endpoint, error: error.message, errorCode, method, operation, status });
    this.recordMetric(operation, endpoint, method, status ?? 0, durationMs, errorCode);

    if (error.kind === 'cancelled') {
      this.effects.log('debug', `Sidecar call cancelled - Endpoint: ${endpoint}, Method: ${method}`, { operation });
      return;
    }

    this.effects.log(
      'warn',
      `Sidecar call failed - Endpoint: ${endpoint}, Method: ${method}, ErrorCode: ${errorCode}, Error: ${error.message}`,
      { operation, status }
    );
  }

  /**
   * Record request metric if instrumentation is enabled
   */
  private recordMetric(
    operation: SidecarOperation,
    endpoint: string,
    method: string,
    status: number,
    durationMs: number,
    errorCode?: string
  ): void {
    if (!this.config.instrumentation) {
      return;
    }

    this.config.instrumentation.record({
      durationMs,
      endpoint,
      errorCode,
      method,
      operation,
      status,
      timestamp: this.effects.now(),
    });
  }
}
