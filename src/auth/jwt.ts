import jwt from 'jsonwebtoken';
import { Result, err, ok } from '../types/result.js';
import { TokenError } from '../types/errors.js';

export const DEFAULT_TOKEN_TTL_SECONDS = 15 * 60;

const ALGORITHM = 'HS256';

export interface TokenServiceOptions {
  secret: string;
  defaultTtlSeconds?: number;
  /** Milliseconds since epoch; defaults to Date.now. */
  now?: () => number;
}

/**
 * Issues and checks stateless HS256 access tokens.
 * Claims: sub (username), iat, exp, all in whole seconds.
 */
export class TokenService {
  private readonly secret: string;
  private readonly defaultTtlSeconds: number;
  private readonly now: () => number;

  constructor(options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('Token signing secret must not be empty');
    }
    this.secret = options.secret;
    this.defaultTtlSeconds = options.defaultTtlSeconds ?? DEFAULT_TOKEN_TTL_SECONDS;
    this.now = options.now ?? Date.now;
  }

  issueToken(username: string, ttlSeconds: number = this.defaultTtlSeconds): string {
    const ttl = Math.floor(ttlSeconds);
    if (ttl < 1) {
      throw new Error(`Token ttl must be at least one second, got ${ttlSeconds}`);
    }

    const iat = this.nowSeconds();
    return jwt.sign({ sub: username, iat, exp: iat + ttl }, this.secret, { algorithm: ALGORITHM });
  }

  verifyToken(token: string): Result<string, TokenError> {
    let payload: string | jwt.JwtPayload;
    try {
      payload = jwt.verify(token, this.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: this.nowSeconds(),
      });
    } catch (error) {
      return err(classifyVerifyError(error));
    }

    if (typeof payload === 'string' || typeof payload.sub !== 'string' || payload.sub === '') {
      return err({ kind: 'Malformed', message: 'token has no subject' });
    }
    return ok(payload.sub);
  }

  private nowSeconds(): number {
    return Math.floor(this.now() / 1000);
  }
}

function classifyVerifyError(error: unknown): TokenError {
  // TokenExpiredError extends JsonWebTokenError, so it goes first
  if (error instanceof jwt.TokenExpiredError) {
    return { kind: 'Expired', message: error.message };
  }
  if (error instanceof jwt.JsonWebTokenError) {
    if (error.message === 'invalid signature') {
      return { kind: 'InvalidSignature', message: error.message };
    }
    return { kind: 'Malformed', message: error.message };
  }
  return { kind: 'Malformed', message: error instanceof Error ? error.message : String(error) };
}
