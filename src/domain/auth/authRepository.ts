import { UserEntity } from './user.js';

export interface Credentials {
  readonly email: string;
  readonly password: string;
}

/**
 * Domain-facing boundary over the auth data sources. Every operation
 * rejects with a `Failure` (see failures.ts) when it cannot complete.
 */
export interface AuthRepository {
  login(credentials: Credentials): Promise<UserEntity>;
  register(credentials: Credentials): Promise<UserEntity>;
  getUser(userId: number): Promise<UserEntity>;
  changePassword(
    userId: number,
    currentPassword: string,
    newPassword: string
  ): Promise<void>;
}
