import { FastifyBaseLogger } from 'fastify';
import { Result, err, ok } from '../../types/result.js';
import { UpstreamUnavailable } from '../../types/errors.js';

export type ForwardMethod = 'GET' | 'POST';

export interface UpstreamResponse {
  status: number;
  contentType: string | null;
  body: string;
}

export type FetchFunction = typeof fetch;

export type SleepFunction = (ms: number) => Promise<void>;

export type ClientLogger = Pick<FastifyBaseLogger, 'debug' | 'info' | 'warn' | 'error'>;

export interface OrderServiceClientConfig {
  baseUrl: string;
  logger: ClientLogger;
  timeoutMs?: number;
  maxAttempts?: number;
  retryDelayMs?: number;
  fetch?: FetchFunction;
  sleep?: SleepFunction;
}

export interface ForwardOptions {
  body?: unknown;
  requestId?: string;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

// Failures raised before upstream accepted the connection
const CONNECT_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
]);

export const sleep: SleepFunction = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * HTTP client for the upstream order service.
 *
 * Only connection-level failures are retried, with a linear backoff of
 * retryDelayMs * attempt. Whatever upstream answers, 4xx and 5xx included,
 * ends the loop and is handed back untouched.
 */
export class OrderServiceClient {
  readonly baseUrl: string;
  private readonly logger: ClientLogger;
  private readonly timeoutMs: number;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchFunction;
  private readonly sleepFn: SleepFunction;

  constructor(config: OrderServiceClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.logger = config.logger;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxAttempts = Math.max(1, config.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
    this.retryDelayMs = config.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.fetchFn = config.fetch ?? ((input, init) => fetch(input, init));
    this.sleepFn = config.sleep ?? sleep;
  }

  async forward(
    method: ForwardMethod,
    path: string,
    options: ForwardOptions = {}
  ): Promise<Result<UpstreamResponse, UpstreamUnavailable>> {
    const url = `${this.baseUrl}${path}`;
    // Each attempt gets its own socket; a pooled one may already be closed upstream
    const headers: Record<string, string> = { accept: 'application/json', connection: 'close' };
    if (options.requestId) {
      headers['x-request-id'] = options.requestId;
    }
    let payload: string | undefined;
    if (options.body !== undefined) {
      headers['content-type'] = 'application/json';
      payload = JSON.stringify(options.body);
    }

    let lastReason = 'no attempt made';

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        const response = await this.fetchFn(url, {
          method,
          headers,
          body: payload,
          // A 3xx is upstream's answer, not an instruction to follow
          redirect: 'manual',
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        const body = await response.text();

        this.logger.debug(
          { method, url, status: response.status, attempt },
          '[orders-client] upstream responded'
        );
        return ok({
          status: response.status,
          contentType: response.headers.get('content-type'),
          body,
        });
      } catch (error) {
        lastReason = describeFailure(error);

        if (!isConnectFailure(error)) {
          // Upstream may already have acted on the request; do not repeat it
          this.logger.error(
            { method, url, attempt, reason: lastReason },
            '[orders-client] upstream exchange failed'
          );
          return err({ kind: 'UpstreamUnavailable', reason: lastReason, attempts: attempt });
        }

        if (attempt < this.maxAttempts) {
          const delay = this.retryDelayMs * attempt;
          this.logger.warn(
            { method, url, attempt, delay, reason: lastReason },
            '[orders-client] connection failed, retrying'
          );
          await this.sleepFn(delay);
        }
      }
    }

    this.logger.error(
      { method, url, attempts: this.maxAttempts, reason: lastReason },
      '[orders-client] upstream unreachable, giving up'
    );
    return err({ kind: 'UpstreamUnavailable', reason: lastReason, attempts: this.maxAttempts });
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorCause(error: unknown): unknown {
  if (error instanceof Error) {
    return error.cause;
  }
  return undefined;
}

/**
 * fetch wraps socket errors as TypeError("fetch failed") with the system
 * error in `cause`; with several resolved addresses it is an AggregateError.
 */
export function isConnectFailure(error: unknown, depth = 0): boolean {
  if (error === undefined || depth > 3) {
    return false;
  }
  const code = errorCode(error);
  if (code && CONNECT_ERROR_CODES.has(code)) {
    return true;
  }
  if (error instanceof AggregateError && error.errors.some((inner) => isConnectFailure(inner, depth + 1))) {
    return true;
  }
  return isConnectFailure(errorCause(error), depth + 1);
}

export function describeFailure(error: unknown): string {
  if (!(error instanceof Error)) {
    return String(error);
  }
  if (error.name === 'TimeoutError') {
    return 'upstream did not respond in time';
  }
  const cause = errorCause(error);
  if (cause instanceof Error && cause.message) {
    return `${error.message}: ${cause.message}`;
  }
  return error.message;
}
