export interface InvalidCredentials {
  kind: 'InvalidCredentials';
}

export type TokenErrorKind = 'Malformed' | 'InvalidSignature' | 'Expired';

export interface TokenError {
  kind: TokenErrorKind;
  message: string;
}

export interface Unauthenticated {
  kind: 'Unauthenticated';
  reason: 'missing_credentials' | 'invalid_token' | 'unknown_user';
}

export interface Forbidden {
  kind: 'Forbidden';
}

export type GuardError = Unauthenticated | Forbidden;

export interface UpstreamUnavailable {
  kind: 'UpstreamUnavailable';
  reason: string;
  attempts: number;
}

/** A non-2xx response that upstream actually sent; relayed as-is. */
export interface UpstreamError {
  kind: 'UpstreamError';
  status: number;
  contentType: string | null;
  body: string;
}

export interface InvalidUpstreamResponse {
  kind: 'InvalidUpstreamResponse';
  message: string;
}

export interface NotFound {
  kind: 'NotFound';
}

export type CreateOrderError = UpstreamUnavailable | UpstreamError | InvalidUpstreamResponse;

export type GetOrderError = CreateOrderError | NotFound;

export type GatewayError = GuardError | GetOrderError;
