import { FastifyReply, FastifyRequest } from 'fastify';
import { UserStore } from '../store/user-store.js';
import { TokenService } from './jwt.js';
import { GuardError } from '../types/errors.js';
import { Result, err, ok } from '../types/result.js';
import { PublicUser, User, toPublicUser } from '../types/user.js';
import { sendGatewayError } from '../routes/errors.js';

declare module 'fastify' {
  interface FastifyRequest {
    user: PublicUser | null;
  }
}

export interface VerifyAuthOptions {
  tokenService: TokenService;
  userStore: UserStore;
}

/**
 * Pulls the token out of "Authorization: Bearer <token>".
 * Any other scheme, or an empty token, counts as no credentials.
 */
export function extractBearerToken(header: string | undefined): string | null {
  if (!header) {
    return null;
  }
  const match = /^bearer\s+(.+)$/i.exec(header.trim());
  if (!match) {
    return null;
  }
  const token = match[1].trim();
  return token || null;
}

/**
 * Resolves the caller behind a bearer header:
 * 1. no credentials, bad token or unknown user -> Unauthenticated
 * 2. disabled account -> Forbidden
 */
export async function authorizeBearer(
  header: string | undefined,
  options: VerifyAuthOptions
): Promise<Result<User, GuardError>> {
  const token = extractBearerToken(header);
  if (!token) {
    return err({ kind: 'Unauthenticated', reason: 'missing_credentials' });
  }

  const verified = options.tokenService.verifyToken(token);
  if (!verified.ok) {
    return err({ kind: 'Unauthenticated', reason: 'invalid_token' });
  }

  const user = await options.userStore.findByUsername(verified.value);
  if (!user) {
    return err({ kind: 'Unauthenticated', reason: 'unknown_user' });
  }

  if (user.disabled) {
    return err({ kind: 'Forbidden' });
  }

  return ok(user);
}

export function createVerifyAuth(options: VerifyAuthOptions) {
  return async (request: FastifyRequest, reply: FastifyReply) => {
    const result = await authorizeBearer(request.headers.authorization, options);
    if (!result.ok) {
      request.log.info({ reason: result.error }, '[auth] request rejected');
      return sendGatewayError(reply, result.error);
    }
    request.user = toPublicUser(result.value);
  };
}
