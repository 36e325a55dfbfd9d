import { User } from '../types/user.js';

export interface UserStore {
  findByUsername(username: string): Promise<User | null>;
  setDisabled(username: string, disabled: boolean): Promise<boolean>;
}
