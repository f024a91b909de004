import {
  ChangePasswordParams,
  ChangePasswordUseCase,
} from '../../application/auth/changePassword.js';
import { GetUserParams, GetUserUseCase } from '../../application/auth/getUser.js';
import { LoginParams, LoginUseCase } from '../../application/auth/login.js';
import { RegisterParams, RegisterUseCase } from '../../application/auth/register.js';
import {
  CheckConnectivityUseCase,
  ConnectivityStatus,
} from '../../application/network/checkConnectivity.js';
import { NoParamsUseCase, UseCase, VoidUseCase } from '../../application/useCase.js';
import { UserEntity } from '../../domain/auth/user.js';
import { AppConfig } from '../config.js';
import { AuthRepositoryImpl } from '../data/authRepositoryImpl.js';
import { PgAuthRemoteDataSource } from '../data/authRemoteDataSource.js';
import { PgNetworkInfo } from '../data/pgNetworkInfo.js';
import { createPool } from '../db/pool.js';
import { Container } from './container.js';
import { TOKENS } from './tokens.js';

/**
 * The resolved graph handed to the HTTP layer. Built once at startup.
 */
export interface AuthDependencies {
  readonly login: UseCase<UserEntity, LoginParams>;
  readonly register: UseCase<UserEntity, RegisterParams>;
  readonly getUser: UseCase<UserEntity, GetUserParams>;
  readonly changePassword: VoidUseCase<ChangePasswordParams>;
  readonly checkConnectivity: NoParamsUseCase<ConnectivityStatus>;
}

/**
 * Registers infrastructure as lazy singletons and use cases as factories.
 * Dependencies are registered before their dependents.
 */
export function registerDependencies(container: Container, config: AppConfig): Container {
  container.registerLazySingleton(TOKENS.config, () => config);

  container.registerLazySingleton(
    TOKENS.pool,
    (c) => createPool(c.resolve(TOKENS.config)),
    { dispose: (pool) => pool.end() }
  );

  container.registerLazySingleton(
    TOKENS.networkInfo,
    (c) =>
      new PgNetworkInfo(
        c.resolve(TOKENS.pool),
        c.resolve(TOKENS.config).connectivityTimeoutMs
      )
  );

  container.registerLazySingleton(
    TOKENS.authRemoteDataSource,
    (c) => new PgAuthRemoteDataSource(c.resolve(TOKENS.pool))
  );

  container.registerLazySingleton(
    TOKENS.authRepository,
    (c) =>
      new AuthRepositoryImpl(
        c.resolve(TOKENS.authRemoteDataSource),
        c.resolve(TOKENS.networkInfo)
      )
  );

  container.registerFactory(
    TOKENS.loginUseCase,
    (c) => new LoginUseCase(c.resolve(TOKENS.authRepository))
  );
  container.registerFactory(
    TOKENS.registerUseCase,
    (c) => new RegisterUseCase(c.resolve(TOKENS.authRepository))
  );
  container.registerFactory(
    TOKENS.getUserUseCase,
    (c) => new GetUserUseCase(c.resolve(TOKENS.authRepository))
  );
  container.registerFactory(
    TOKENS.changePasswordUseCase,
    (c) => new ChangePasswordUseCase(c.resolve(TOKENS.authRepository))
  );
  container.registerFactory(
    TOKENS.checkConnectivityUseCase,
    (c) => new CheckConnectivityUseCase(c.resolve(TOKENS.networkInfo))
  );

  return container;
}

/**
 * Seals the container and resolves every use case, so a missing or
 * circular registration fails here instead of on the first request.
 */
export function buildAuthDependencies(container: Container): AuthDependencies {
  container.seal();
  return Object.freeze({
    login: container.resolve(TOKENS.loginUseCase),
    register: container.resolve(TOKENS.registerUseCase),
    getUser: container.resolve(TOKENS.getUserUseCase),
    changePassword: container.resolve(TOKENS.changePasswordUseCase),
    checkConnectivity: container.resolve(TOKENS.checkConnectivityUseCase),
  });
}
