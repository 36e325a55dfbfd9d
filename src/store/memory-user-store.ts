import { SeedUser, User } from '../types/user.js';
import { UserStore } from './user-store.js';
import { hashPassword } from '../auth/password.js';

/**
 * In-memory user repository, filled from seed accounts on the first lookup.
 *
 * Records are replaced whole on mutation, so a reader never observes a
 * half-updated user. Seeding runs once even when several requests hit a cold
 * store at the same time.
 */
export class MemoryUserStore implements UserStore {
  private users: Map<string, User> = new Map();
  private seeding: Promise<void> | null = null;

  constructor(private readonly seed: SeedUser[] = []) {}

  async findByUsername(username: string): Promise<User | null> {
    await this.ensureSeeded();
    return this.users.get(username) || null;
  }

  async setDisabled(username: string, disabled: boolean): Promise<boolean> {
    await this.ensureSeeded();
    const user = this.users.get(username);
    if (!user) {
      return false;
    }
    this.users.set(username, { ...user, disabled });
    return true;
  }

  private ensureSeeded(): Promise<void> {
    if (!this.seeding) {
      this.seeding = this.loadSeed().catch((error: unknown) => {
        // Allow the next lookup to try again
        this.seeding = null;
        throw error;
      });
    }
    return this.seeding;
  }

  private async loadSeed(): Promise<void> {
    const seen = new Set<string>();
    for (const entry of this.seed) {
      if (seen.has(entry.username)) {
        throw new Error(`Duplicate seed username: ${entry.username}`);
      }
      seen.add(entry.username);
    }

    const users = await Promise.all(
      this.seed.map(async (entry): Promise<User> => ({
        user_id: entry.user_id,
        username: entry.username,
        hashed_password: await hashPassword(entry.password),
        disabled: entry.disabled ?? false,
      }))
    );

    for (const user of users) {
      this.users.set(user.username, user);
    }
  }
}
