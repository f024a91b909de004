import { ChangePasswordUseCase } from '../../../application/auth/changePassword.js';
import { GetUserUseCase } from '../../../application/auth/getUser.js';
import { LoginUseCase } from '../../../application/auth/login.js';
import { RegisterUseCase } from '../../../application/auth/register.js';
import { CheckConnectivityUseCase } from '../../../application/network/checkConnectivity.js';
import { NetworkInfo } from '../../../domain/network/networkInfo.js';
import { silentLogger } from '../../../test/fakes.js';
import { AuthRemoteDataSource } from '../../data/authRemoteDataSource.js';
import { AuthRepositoryImpl } from '../../data/authRepositoryImpl.js';
import { AuthDependencies } from '../../di/injection.js';
import { createApp } from '../app.js';

export const TOKEN_OPTIONS = { secret: 'test-secret', expiresInSeconds: 3600 };

/**
 * The real use cases and repository over an in-memory data source.
 */
export function buildDependencies(
  dataSource: AuthRemoteDataSource,
  networkInfo: NetworkInfo,
  now?: () => Date
): AuthDependencies {
  const repository = new AuthRepositoryImpl(dataSource, networkInfo, silentLogger);
  return {
    login: new LoginUseCase(repository),
    register: new RegisterUseCase(repository),
    getUser: new GetUserUseCase(repository),
    changePassword: new ChangePasswordUseCase(repository),
    checkConnectivity: new CheckConnectivityUseCase(networkInfo, now),
  };
}

export function buildApp(deps: AuthDependencies) {
  return createApp(deps, { token: TOKEN_OPTIONS, docs: false });
}
