import {
  AuthRepository,
  Credentials,
} from '../../domain/auth/authRepository.js';
import { Failure, NoConnectivityFailure, ServerFailure } from '../../domain/auth/failures.js';
import { UserEntity } from '../../domain/auth/user.js';
import { NetworkInfo } from '../../domain/network/networkInfo.js';
import { logger as rootLogger, Logger } from '../logger.js';
import { AuthRemoteDataSource } from './authRemoteDataSource.js';
import { toUserEntity } from './userModel.js';

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Checks connectivity before every remote call and turns data-source
 * exceptions into failures. There is no retry: a call that fails is
 * reported once.
 *
 * Connectivity can change between the check and the remote call; that
 * window is accepted.
 */
export class AuthRepositoryImpl implements AuthRepository {
  private readonly logger: Logger;

  constructor(
    private readonly remoteDataSource: AuthRemoteDataSource,
    private readonly networkInfo: NetworkInfo,
    logger: Logger = rootLogger
  ) {
    this.logger = logger.child({ component: 'AuthRepository' });
  }

  async login(credentials: Credentials): Promise<UserEntity> {
    const model = await this.remote('login', () =>
      this.remoteDataSource.login(credentials)
    );
    return toUserEntity(model);
  }

  async register(credentials: Credentials): Promise<UserEntity> {
    const model = await this.remote('register', () =>
      this.remoteDataSource.register(credentials)
    );
    return toUserEntity(model);
  }

  async getUser(userId: number): Promise<UserEntity> {
    const model = await this.remote('getUser', () =>
      this.remoteDataSource.getUser(userId)
    );
    return toUserEntity(model);
  }

  async changePassword(
    userId: number,
    currentPassword: string,
    newPassword: string
  ): Promise<void> {
    await this.remote('changePassword', () =>
      this.remoteDataSource.changePassword(userId, currentPassword, newPassword)
    );
  }

  private async remote<T>(operation: string, call: () => Promise<T>): Promise<T> {
    if (!(await this.networkInfo.isConnected())) {
      this.logger.warn({ operation }, 'Remote unreachable, skipping call');
      throw new NoConnectivityFailure();
    }

    try {
      return await call();
    } catch (error) {
      if (error instanceof Failure) {
        throw error;
      }
      this.logger.warn({ operation, err: error }, 'Remote data source failed');
      throw new ServerFailure(messageOf(error), error);
    }
  }
}
