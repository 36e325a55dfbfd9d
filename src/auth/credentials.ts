import { UserStore } from '../store/user-store.js';
import { User } from '../types/user.js';
import { InvalidCredentials } from '../types/errors.js';
import { Result, err, ok } from '../types/result.js';
import { verifyPassword } from './password.js';

const INVALID_CREDENTIALS: InvalidCredentials = { kind: 'InvalidCredentials' };

/**
 * Checks a username/password pair against the store.
 *
 * Unknown user and wrong password yield the same error value. The lookup
 * still short-circuits, so an unknown user answers faster than a bad password.
 */
export async function authenticateUser(
  store: UserStore,
  username: string,
  password: string
): Promise<Result<User, InvalidCredentials>> {
  const user = await store.findByUsername(username);
  if (!user) {
    return err(INVALID_CREDENTIALS);
  }
  if (!(await verifyPassword(password, user.hashed_password))) {
    return err(INVALID_CREDENTIALS);
  }
  return ok(user);
}
