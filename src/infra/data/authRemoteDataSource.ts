import { Credentials } from '../../domain/auth/authRepository.js';
import { Password } from './password.js';
import {
  EmailTakenError,
  InvalidCredentialsError,
  UserNotFoundError,
} from './exceptions.js';
import { UserModel, UserRow, userModelFromRow } from './userModel.js';

export interface AuthRemoteDataSource {
  login(credentials: Credentials): Promise<UserModel>;
  register(credentials: Credentials): Promise<UserModel>;
  getUser(userId: number): Promise<UserModel>;
  changePassword(
    userId: number,
    currentPassword: string,
    newPassword: string
  ): Promise<void>;
}

/**
 * The slice of `pg.Pool` the data source queries through.
 */
export interface UsersQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: UserRow[] }>;
}

const USER_COLUMNS = 'id, email, password_hash, created_at';

// Postgres unique_violation
const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === UNIQUE_VIOLATION
  );
}

/**
 * Users table access. Only the repository calls this; errors are thrown
 * as-is and mapped there.
 */
export class PgAuthRemoteDataSource implements AuthRemoteDataSource {
  constructor(private readonly pool: UsersQueryable) {}

  async login(credentials: Credentials): Promise<UserModel> {
    const row = await this.findByEmail(credentials.email);
    if (!row) {
      throw new InvalidCredentialsError();
    }

    const isValid = await Password.verify(credentials.password, row.password_hash);
    if (!isValid) {
      throw new InvalidCredentialsError();
    }

    return userModelFromRow(row);
  }

  async register(credentials: Credentials): Promise<UserModel> {
    const passwordHash = await Password.hash(credentials.password);

    try {
      const result = await this.pool.query(
        `INSERT INTO users (email, password_hash)
         VALUES ($1, $2)
         RETURNING ${USER_COLUMNS}`,
        [credentials.email, passwordHash]
      );
      return userModelFromRow(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new EmailTakenError();
      }
      throw error;
    }
  }

  async getUser(userId: number): Promise<UserModel> {
    const row = await this.findById(userId);
    if (!row) {
      throw new UserNotFoundError();
    }
    return userModelFromRow(row);
  }

  async changePassword(
    userId: number,
    currentPassword: string,
    newPassword: string
  ): Promise<void> {
    const row = await this.findById(userId);
    if (!row) {
      throw new UserNotFoundError();
    }

    const isValid = await Password.verify(currentPassword, row.password_hash);
    if (!isValid) {
      throw new InvalidCredentialsError('Current password is incorrect');
    }

    const passwordHash = await Password.hash(newPassword);
    await this.pool.query(
      'UPDATE users SET password_hash = $1, updated_at = NOW() WHERE id = $2',
      [passwordHash, userId]
    );
  }

  private async findByEmail(email: string): Promise<UserRow | null> {
    const result = await this.pool.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE email = $1`,
      [email]
    );
    return result.rows[0] ?? null;
  }

  private async findById(id: number): Promise<UserRow | null> {
    const result = await this.pool.query(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );
    return result.rows[0] ?? null;
  }
}
