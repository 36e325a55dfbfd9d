import { describe, expect, it, vi } from 'vitest';
import { FetchFunction, OrderServiceClient, SleepFunction } from '../src/integrations/orders/client.js';
import { OrderCache, OrderService } from '../src/integrations/orders/service.js';
import { MemoryResponseCache } from '../src/store/response-cache.js';
import { GetOrderError } from '../src/types/errors.js';
import { OrderStatus } from '../src/types/order.js';
import { ORDER_SERVICE_URL, connectionRefused, jsonResponse, sampleOrder, testLogger } from './helpers.js';

function createService(fetchMock: FetchFunction) {
  const client = new OrderServiceClient({
    baseUrl: ORDER_SERVICE_URL,
    logger: testLogger(),
    fetch: fetchMock,
    sleep: vi.fn<SleepFunction>(async () => {}),
  });
  const cache: OrderCache = new MemoryResponseCache<OrderStatus, GetOrderError>();
  return { service: new OrderService(client, cache), cache };
}

const NEW_ORDER = { user_id: 'u1', item: 'widget', amount: 2 };

describe('OrderService.createOrder', () => {
  it('returns the created order and writes it through to the cache', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse(sampleOrder()));
    const { service, cache } = createService(fetchMock);

    const result = await service.createOrder(NEW_ORDER, 'req-1');

    expect(result).toEqual({ ok: true, value: sampleOrder() });
    expect(cache.get('o1')).toEqual(sampleOrder());
    expect(fetchMock.mock.calls[0][0]).toBe('http://orders.test/orders');
  });

  it('keeps fields it does not know about', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ ...sampleOrder(), carrier: 'dhl' }));
    const { service } = createService(fetchMock);

    const result = await service.createOrder(NEW_ORDER);

    expect(result).toEqual({ ok: true, value: { ...sampleOrder(), carrier: 'dhl' } });
  });

  it('relays a non-2xx answer and caches nothing', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ detail: 'amount too large' }, 422));
    const { service, cache } = createService(fetchMock);

    const result = await service.createOrder(NEW_ORDER);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'UpstreamError',
        status: 422,
        contentType: 'application/json',
        body: '{"detail":"amount too large"}',
      },
    });
    expect(cache.size).toBe(0);
  });

  it('flags a 2xx body that is not an order', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => new Response('ok', { status: 200 }));
    const { service, cache } = createService(fetchMock);

    const result = await service.createOrder(NEW_ORDER);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'InvalidUpstreamResponse', message: 'body is not JSON' },
    });
    expect(cache.size).toBe(0);
  });

  it('reports UpstreamUnavailable when upstream cannot be reached', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => {
      throw connectionRefused();
    });
    const { service } = createService(fetchMock);

    const result = await service.createOrder(NEW_ORDER);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('UpstreamUnavailable');
    }
  });
});

describe('OrderService.getOrder', () => {
  it('serves cached orders without calling upstream', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse(sampleOrder()));
    const { service, cache } = createService(fetchMock);
    cache.put('o1', sampleOrder());

    const result = await service.getOrder('o1');

    expect(result).toEqual({ ok: true, value: { order: sampleOrder(), source: 'cache' } });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('reads through on a miss and caches the result', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse(sampleOrder({ id: 'o7' })));
    const { service } = createService(fetchMock);

    const first = await service.getOrder('o7');
    const second = await service.getOrder('o7');

    expect(first).toEqual({ ok: true, value: { order: sampleOrder({ id: 'o7' }), source: 'upstream' } });
    expect(second).toEqual({ ok: true, value: { order: sampleOrder({ id: 'o7' }), source: 'cache' } });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock.mock.calls[0][0]).toBe('http://orders.test/orders/o7');
  });

  it('maps upstream 404 to NotFound and asks again next time', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ detail: 'Not Found' }, 404));
    const { service, cache } = createService(fetchMock);

    expect(await service.getOrder('nope')).toEqual({ ok: false, error: { kind: 'NotFound' } });
    expect(await service.getOrder('nope')).toEqual({ ok: false, error: { kind: 'NotFound' } });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    expect(cache.size).toBe(0);
  });

  it('relays other upstream failures', async () => {
    const fetchMock = vi.fn<FetchFunction>(
      async () => new Response('boom', { status: 500, headers: { 'content-type': 'text/plain' } })
    );
    const { service } = createService(fetchMock);

    expect(await service.getOrder('o1')).toEqual({
      ok: false,
      error: { kind: 'UpstreamError', status: 500, contentType: 'text/plain', body: 'boom' },
    });
  });

  it('encodes the id into the upstream path', async () => {
    const fetchMock = vi.fn<FetchFunction>(async () => jsonResponse({ detail: 'Not Found' }, 404));
    const { service } = createService(fetchMock);

    await service.getOrder('a/b c');

    expect(fetchMock.mock.calls[0][0]).toBe('http://orders.test/orders/a%2Fb%20c');
  });

  it('sends one upstream request for concurrent misses on the same id', async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const fetchMock = vi.fn<FetchFunction>(async () => {
      await gate;
      return jsonResponse(sampleOrder());
    });
    const { service } = createService(fetchMock);

    const pending = Promise.all([service.getOrder('o1'), service.getOrder('o1')]);
    release();
    const [first, second] = await pending;

    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(first).toEqual({ ok: true, value: { order: sampleOrder(), source: 'upstream' } });
    expect(second).toEqual(first);
  });
});
