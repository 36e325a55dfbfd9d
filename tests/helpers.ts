import { vi } from 'vitest';
import { GatewayConfig } from '../src/config/env.js';
import { ClientLogger } from '../src/integrations/orders/client.js';
import { OrderStatus } from '../src/types/order.js';

export const ORDER_SERVICE_URL = 'http://orders.test';

export function testConfig(overrides: Partial<GatewayConfig> = {}): GatewayConfig {
  return {
    nodeEnv: 'test',
    jwtSecret: 'test-secret',
    insecureSecret: false,
    orderServiceUrl: ORDER_SERVICE_URL,
    host: '127.0.0.1',
    port: 0,
    accessTokenExpireMinutes: 30,
    upstream: { timeoutMs: 30_000, maxAttempts: 3, retryDelayMs: 1_000 },
    logLevel: 'silent',
    allowedOrigins: [],
    ...overrides,
  };
}

export function sampleOrder(overrides: Partial<OrderStatus> = {}): OrderStatus {
  return {
    id: 'o1',
    status: 'created',
    item: 'widget',
    amount: 2,
    user_id: 'u1',
    updated_at: '2024-05-01T10:00:00Z',
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'content-type': 'application/json' },
  });
}

/** What fetch rejects with when nothing listens on the port. */
export function connectionRefused(): TypeError {
  const cause = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8002'), {
    code: 'ECONNREFUSED',
  });
  return new TypeError('fetch failed', { cause });
}

export function testLogger(): ClientLogger {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}
