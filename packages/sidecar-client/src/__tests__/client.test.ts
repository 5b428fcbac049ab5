import type { Result } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { SidecarClient } from '../client.js';
import type { SidecarEffects } from '../core/types.js';
import { InvalidArgumentError, NormalizedError, OperationCancelledError, type SidecarClientError } from '../errors.js';
import { InstrumentationCollector } from '../instrumentation.js';
import type { SidecarClientConfig } from '../types.js';

function createClient(mockFetch: typeof fetch, config: Partial<SidecarClientConfig> = {}): SidecarClient {
  const mockEffects: SidecarEffects = {
    fetch: mockFetch,
    log: vi.fn(),
    now: () => 1000,
  };

  return new SidecarClient({ defaultAddress: 'http://localhost:3500', ...config }, mockEffects);
}

type SidecarCall = (client: SidecarClient) => Promise<Result<unknown, SidecarClientError>>;

const everyOperation: [string, SidecarCall][] = [
  ['saveState', (client) => client.saveState('orders', [])],
  ['getState', (client) => client.getState('orders', 'order-1')],
  ['invokeMethod', (client) => client.invokeMethod('checkout', 'orders', 'POST')],
  ['sendToBinding', (client) => client.sendToBinding({ bindingName: 'queue', data: 1 })],
  ['publishEvent', (client) => client.publishEvent('pubsub', 'orders', '{}')],
  ['getSecret', (client) => client.getSecret('vault1', 'apikey')],
];

function refusedFetch() {
  const socketError = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:3500'), { code: 'ECONNREFUSED' });
  return vi.fn().mockRejectedValue(new TypeError('fetch failed', { cause: socketError }));
}

function pendingUntilAborted() {
  return vi.fn().mockImplementation(
    (_url: string, init: RequestInit) =>
      new Promise((_resolve, reject) => {
        init.signal?.addEventListener('abort', () => reject(init.signal?.reason));
      })
  );
}

describe('SidecarClient - state', () => {
  it('should post state records as a JSON array', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    const client = createClient(mockFetch);

    const result = await client.saveState('orders', [
      { key: 'order-1', value: { total: 10 } },
      { key: 'order-2', value: 'pending', etag: '3' },
    ]);

    expect(result.isOk()).toBe(true);
    expect(mockFetch).toHaveBeenCalledWith('http://localhost:3500/v1.0/state/orders', {
      body: '[{"key":"order-1","value":{"total":10}},{"key":"order-2","value":"pending","etag":"3"}]',
      headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      method: 'POST',
      signal: expect.any(AbortSignal),
    });
  });

  it('should reject an empty store name without calling the sidecar', async () => {
    const mockFetch = vi.fn();
    const client = createClient(mockFetch);

    const result = await client.saveState('', [{ key: 'order-1', value: 1 }]);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidArgumentError);
      expect(result.error.kind).toBe('invalid-argument');
      expect(result.error.message).toBe('storeName must be a non-empty string');
    }
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should return the body stream and ETag of a state read', async () => {
    const mockFetch = vi.fn().mockResolvedValue(
      new Response('{"total":10}', { headers: { ETag: '7' }, status: 200 })
    );
    const client = createClient(mockFetch);

    const result = await client.getState('orders', 'order-1');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value.key).toBe('order-1');
      expect(result.value.etag).toBe('7');
      expect(await new Response(result.value.value).text()).toBe('{"total":10}');
    }
    expect(mockFetch).toHaveBeenCalledWith('http://localhost:3500/v1.0/state/orders/order-1', expect.objectContaining({ body: null, method: 'GET' }));
  });

  it('should return a record without value or ETag for a missing key', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response(null, { status: 204 })));

    const result = await client.getState('orders', 'missing');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ key: 'missing', value: undefined, etag: undefined });
    }
  });

  it('should require a key for state reads', async () => {
    const client = createClient(vi.fn());

    const result = await client.getState('orders', '');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(InvalidArgumentError);
      expect(result.error.message).toBe('key must be a non-empty string');
    }
  });

  it('should parse and validate a state value', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response('{"total":10}', { status: 200 })));

    const result = await client.getStateValue('orders', 'order-1', { schema: z.object({ total: z.number() }) });

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ total: 10 });
    }
  });

  it('should not parse a zero-length success body', async () => {
    const client = createClient(
      vi.fn().mockResolvedValue(new Response('', { headers: { 'Content-Length': '0' }, status: 200 }))
    );

    const result = await client.getStateValue('orders', 'order-1');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toBeUndefined();
    }
  });
});

describe('SidecarClient - failure normalization', () => {
  it.each(everyOperation)('should report a missing sidecar on connection refusal during %s', async (_name, call) => {
    const result = await call(createClient(refusedFetch()));

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      const error = result.error;
      expect(error).toBeInstanceOf(NormalizedError);
      expect(error.kind).toBe('sidecar-not-present');
      if (error instanceof NormalizedError) {
        expect(error.statusCode).toBe(503);
        expect(error.errorCode).toBe('ERR_SIDECAR_DOES_NOT_EXIST');
        expect(error.name).toBe('SidecarNotPresentError');
      }
    }
  });

  it('should wrap other transport failures as request failures', async () => {
    const client = createClient(vi.fn().mockRejectedValue(new Error('getaddrinfo ENOTFOUND sidecar')));

    const result = await client.saveState('orders', []);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_REQUEST_FAILED',
        kind: 'sidecar-error',
        message: 'getaddrinfo ENOTFOUND sidecar',
        statusCode: 500,
      });
    }
  });

  it('should keep the sidecar code and message of a 404', async () => {
    const client = createClient(
      vi.fn().mockResolvedValue(
        new Response(JSON.stringify({ errorCode: 'ERR_ACTOR_INSTANCE_MISSING', message: 'actor instance is missing' }), {
          status: 404,
        })
      )
    );

    const result = await client.getState('actors', 'counter');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_ACTOR_INSTANCE_MISSING',
        message: 'actor instance is missing',
        statusCode: 404,
      });
    }
  });

  it('should apply the not-configured defaults to an empty 404', async () => {
    const client = createClient(
      vi.fn().mockResolvedValue(new Response('', { headers: { 'Content-Length': '0' }, status: 404 }))
    );

    const result = await client.publishEvent('pubsub', 'orders');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_DOES_NOT_EXIST',
        message: 'The requested sidecar resource is not configured.',
        statusCode: 404,
      });
    }
  });

  it('should keep the actual status when the error body is not JSON', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response('upstream unavailable', { status: 502 })));

    const result = await client.invokeMethod('checkout', 'orders', 'POST');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_UNKNOWN',
        message: 'The error body returned by the sidecar is not valid JSON.',
        statusCode: 502,
      });
    }
  });

  it('should never return a non-success response as success', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response(null, { status: 500 })));

    const result = await client.saveState('orders', []);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_UNKNOWN',
        message: 'No meaningful error message was returned by the sidecar.',
        statusCode: 500,
      });
    }
  });

  it('should report a timeout as a request failure', async () => {
    const client = createClient(pendingUntilAborted(), { timeout: 5 });

    const result = await client.getState('orders', 'order-1');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_REQUEST_FAILED',
        message: 'Request timeout after 5ms',
        statusCode: 500,
      });
    }
  });
});

describe('SidecarClient - cancellation', () => {
  it('should report cancellation while the call is outstanding', async () => {
    const client = createClient(pendingUntilAborted());
    const controller = new AbortController();

    const pending = client.getState('orders', 'order-1', { signal: controller.signal });
    controller.abort();
    const result = await pending;

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toBeInstanceOf(OperationCancelledError);
      expect(result.error.kind).toBe('cancelled');
    }
  });

  it('should not call the sidecar when the signal is already aborted', async () => {
    const mockFetch = vi.fn();
    const client = createClient(mockFetch);

    const result = await client.publishEvent('pubsub', 'orders', '{}', { signal: AbortSignal.abort() });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.kind).toBe('cancelled');
    }
    expect(mockFetch).not.toHaveBeenCalled();
  });
});

describe('SidecarClient - invocation, bindings and pub/sub', () => {
  it('should invoke a method with a JSON body', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('{"ok":true}', { status: 200 }));
    const client = createClient(mockFetch);

    const result = await client.invokeMethod('checkout', 'orders', 'PUT', { id: 7 });

    expect(result.isOk()).toBe(true);
    expect(mockFetch).toHaveBeenCalledWith(
      'http://localhost:3500/v1.0/invoke/checkout/method/orders',
      expect.objectContaining({ body: '{"id":7}', method: 'PUT' })
    );
  });

  it('should refuse a body on GET invocations', async () => {
    const mockFetch = vi.fn();
    const client = createClient(mockFetch);

    const result = await client.invokeMethod('checkout', 'orders', 'get', { id: 7 });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({ argumentName: 'body', message: 'A request body cannot be sent with GET' });
    }
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should refuse an invalid HTTP verb', async () => {
    const client = createClient(vi.fn());

    const result = await client.invokeMethod('checkout', 'orders', 'NOT A VERB');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({ argumentName: 'httpVerb', kind: 'invalid-argument' });
    }
  });

  it('should send the binding message without its binding name', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    const client = createClient(mockFetch);

    const result = await client.sendToBinding({
      bindingName: 'queue',
      data: { orderId: 7 },
      metadata: { ttlInSeconds: '60' },
      operation: 'create',
    });

    expect(result.isOk()).toBe(true);
    expect(mockFetch).toHaveBeenCalledWith(
      'http://localhost:3500/v1.0/bindings/queue',
      expect.objectContaining({
        body: '{"data":{"orderId":7},"metadata":{"ttlInSeconds":"60"},"operation":"create"}',
        method: 'POST',
      })
    );
  });

  it('should publish the raw JSON payload unchanged', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    const client = createClient(mockFetch);
    const payload = '{ "orderId": 7,\n  "note": "caf\\u00e9 \\"quoted\\"" }';

    const result = await client.publishEvent('pubsub', 'orders', payload);

    expect(result.isOk()).toBe(true);
    expect(mockFetch).toHaveBeenCalledWith(
      'http://localhost:3500/v1.0/publish/pubsub/orders',
      expect.objectContaining({
        body: payload,
        headers: { Accept: 'application/json', 'Content-Type': 'application/json' },
      })
    );
  });

  it('should publish without a body when there is no payload', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    const client = createClient(mockFetch);

    await client.publishEvent('pubsub', 'orders');

    expect(mockFetch).toHaveBeenCalledWith(
      'http://localhost:3500/v1.0/publish/pubsub/orders',
      expect.objectContaining({ body: null, headers: { Accept: 'application/json' } })
    );
  });

  it('should use a per-call address override without its trailing slash', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response(null, { status: 204 }));
    const client = createClient(mockFetch);

    await client.publishEvent('pubsub', 'orders', undefined, { daprAddress: 'http://sidecar:3601/' });

    expect(mockFetch).toHaveBeenCalledWith('http://sidecar:3601/v1.0/publish/pubsub/orders', expect.anything());
  });
});

describe('SidecarClient - secrets', () => {
  it('should return the parsed secret document', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('{"apikey":"xyz"}', { status: 200 }));
    const client = createClient(mockFetch);

    const result = await client.getSecret('vault1', 'apikey');

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      expect(result.value).toEqual({ apikey: 'xyz' });
    }
    expect(mockFetch).toHaveBeenCalledWith('http://localhost:3500/v1.0/secrets/vault1/apikey', expect.anything());
  });

  it('should append the metadata query', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('{"apikey":"xyz"}', { status: 200 }));
    const client = createClient(mockFetch);

    await client.getSecret('vault1', 'apikey', { metadata: 'metadata.version_id=15' });

    expect(mockFetch).toHaveBeenCalledWith(
      'http://localhost:3500/v1.0/secrets/vault1/apikey?metadata.version_id=15',
      expect.anything()
    );
  });

  it('should require both store and key', async () => {
    const mockFetch = vi.fn();
    const client = createClient(mockFetch);

    const noStore = await client.getSecret('', 'apikey');
    const noKey = await client.getSecret('vault1', '');

    expect(noStore.isErr() && noStore.error.message).toBe('storeName must be a non-empty string');
    expect(noKey.isErr() && noKey.error.message).toBe('key must be a non-empty string');
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it('should fail when the secret body is not JSON', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response('apikey=xyz', { status: 200 })));

    const result = await client.getSecret('vault1', 'apikey');

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({
        errorCode: 'ERR_MALFORMED_RESPONSE',
        message: 'The response body returned by the sidecar is not valid JSON.',
        statusCode: 200,
      });
    }
  });

  it('should fail when the secret does not match its schema', async () => {
    const client = createClient(vi.fn().mockResolvedValue(new Response('{"apikey":42}', { status: 200 })));

    const result = await client.getSecret('vault1', 'apikey', { schema: z.object({ apikey: z.string() }) });

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toMatchObject({ errorCode: 'ERR_MALFORMED_RESPONSE', statusCode: 200 });
      expect(result.error.message).toBe('Response validation failed: apikey: Expected string, received number');
    }
  });
});

describe('SidecarClient - hooks and instrumentation', () => {
  it('should emit one start and one success event per call', async () => {
    const onRequestStart = vi.fn();
    const onRequestSuccess = vi.fn();
    const onRequestFailure = vi.fn();
    const client = createClient(vi.fn().mockResolvedValue(new Response('{}', { status: 200 })), {
      hooks: { onRequestFailure, onRequestStart, onRequestSuccess },
    });

    await client.getState('orders', 'order-1');

    expect(onRequestStart).toHaveBeenCalledTimes(1);
    expect(onRequestSuccess).toHaveBeenCalledWith({
      durationMs: 0,
      endpoint: '/v1.0/state/orders/{key}',
      method: 'GET',
      operation: 'state.get',
      status: 200,
    });
    expect(onRequestFailure).not.toHaveBeenCalled();
  });

  it('should emit a failure event with the normalized code', async () => {
    const onRequestFailure = vi.fn();
    const client = createClient(refusedFetch(), { hooks: { onRequestFailure } });

    await client.getSecret('vault1', 'apikey');

    expect(onRequestFailure).toHaveBeenCalledWith(
      expect.objectContaining({
        endpoint: '/v1.0/secrets/vault1/{secret}',
        errorCode: 'ERR_SIDECAR_DOES_NOT_EXIST',
        operation: 'secret.get',
        status: undefined,
      })
    );
  });

  it('should record a metric for each call', async () => {
    const instrumentation = new InstrumentationCollector();
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(new Response(null, { status: 204 }))
      .mockResolvedValueOnce(new Response(null, { status: 404 }));
    const client = createClient(mockFetch, { instrumentation });

    await client.saveState('orders', []);
    await client.getState('orders', 'order-1');

    expect(instrumentation.getMetrics()).toEqual([
      {
        durationMs: 0,
        endpoint: '/v1.0/state/orders',
        errorCode: undefined,
        method: 'POST',
        operation: 'state.save',
        status: 204,
        timestamp: 1000,
      },
      {
        durationMs: 0,
        endpoint: '/v1.0/state/orders/{key}',
        errorCode: 'ERR_DOES_NOT_EXIST',
        method: 'GET',
        operation: 'state.get',
        status: 404,
        timestamp: 1000,
      },
    ]);
  });
});
