import { OrderServiceClient, UpstreamResponse } from './client.js';
import { ResponseCache } from '../../store/response-cache.js';
import { CreateOrderError, GetOrderError } from '../../types/errors.js';
import { OrderCreate, OrderLookup, OrderStatus, orderStatusSchema } from '../../types/order.js';
import { Result, err, ok } from '../../types/result.js';

export type OrderCache = ResponseCache<OrderStatus, GetOrderError>;

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

function parseOrderStatus(response: UpstreamResponse): Result<OrderStatus, CreateOrderError> {
  let json: unknown;
  try {
    json = JSON.parse(response.body);
  } catch {
    return err({ kind: 'InvalidUpstreamResponse', message: 'body is not JSON' });
  }

  const parsed = orderStatusSchema.safeParse(json);
  if (!parsed.success) {
    return err({
      kind: 'InvalidUpstreamResponse',
      message: parsed.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
    });
  }
  return ok(parsed.data);
}

function upstreamError(response: UpstreamResponse): CreateOrderError {
  return {
    kind: 'UpstreamError',
    status: response.status,
    contentType: response.contentType,
    body: response.body,
  };
}

/**
 * Orders as the gateway sees them: upstream is the source of truth, the
 * cache holds the last copy seen for each id.
 */
export class OrderService {
  constructor(
    private readonly client: OrderServiceClient,
    private readonly cache: OrderCache
  ) {}

  async createOrder(order: OrderCreate, requestId?: string): Promise<Result<OrderStatus, CreateOrderError>> {
    const forwarded = await this.client.forward('POST', '/orders', { body: order, requestId });
    if (!forwarded.ok) {
      return forwarded;
    }

    const response = forwarded.value;
    if (!isSuccess(response.status)) {
      return err(upstreamError(response));
    }

    const created = parseOrderStatus(response);
    if (created.ok) {
      // Write-through: the next read of this id is served locally
      this.cache.put(created.value.id, created.value);
    }
    return created;
  }

  async getOrder(orderId: string, requestId?: string): Promise<Result<OrderLookup, GetOrderError>> {
    const cached = this.cache.get(orderId);
    if (cached) {
      return ok({ order: cached, source: 'cache' });
    }

    const fetched = await this.cache.getOrFetch(orderId, () => this.fetchOrder(orderId, requestId));
    if (!fetched.ok) {
      return fetched;
    }
    return ok({ order: fetched.value, source: 'upstream' });
  }

  private async fetchOrder(orderId: string, requestId?: string): Promise<Result<OrderStatus, GetOrderError>> {
    const forwarded = await this.client.forward('GET', `/orders/${encodeURIComponent(orderId)}`, { requestId });
    if (!forwarded.ok) {
      return forwarded;
    }

    const response = forwarded.value;
    if (response.status === 404) {
      return err({ kind: 'NotFound' });
    }
    if (!isSuccess(response.status)) {
      return err(upstreamError(response));
    }
    return parseOrderStatus(response);
  }
}
