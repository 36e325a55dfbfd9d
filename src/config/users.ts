import { SeedUser } from '../types/user.js';

// Accounts the user store is filled with on first lookup
export const SEED_USERS: SeedUser[] = [
  { user_id: 'u1', username: 'testuser', password: 'secret', disabled: false },
  { user_id: 'u2', username: 'admin', password: 'admin123', disabled: false },
];
