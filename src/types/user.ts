export interface User {
  user_id: string;
  username: string;
  hashed_password: string;
  disabled: boolean;
}

// What leaves the gateway: everything except the hash
export type PublicUser = Omit<User, 'hashed_password'>;

export interface SeedUser {
  user_id: string;
  username: string;
  password: string;
  disabled?: boolean;
}

export function toPublicUser(user: User): PublicUser {
  return {
    user_id: user.user_id,
    username: user.username,
    disabled: user.disabled,
  };
}
