import pg from 'pg';
import { ChangePasswordUseCase } from '../../application/auth/changePassword.js';
import { GetUserUseCase } from '../../application/auth/getUser.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { CheckConnectivityUseCase } from '../../application/network/checkConnectivity.js';
import { AuthRepository } from '../../domain/auth/authRepository.js';
import { NetworkInfo } from '../../domain/network/networkInfo.js';
import { AppConfig } from '../config.js';
import { AuthRemoteDataSource } from '../data/authRemoteDataSource.js';
import { createToken } from './container.js';

export const TOKENS = {
  config: createToken<AppConfig>('AppConfig'),
  pool: createToken<pg.Pool>('PgPool'),
  networkInfo: createToken<NetworkInfo>('NetworkInfo'),
  authRemoteDataSource: createToken<AuthRemoteDataSource>('AuthRemoteDataSource'),
  authRepository: createToken<AuthRepository>('AuthRepository'),
  loginUseCase: createToken<LoginUseCase>('LoginUseCase'),
  registerUseCase: createToken<RegisterUseCase>('RegisterUseCase'),
  getUserUseCase: createToken<GetUserUseCase>('GetUserUseCase'),
  changePasswordUseCase: createToken<ChangePasswordUseCase>('ChangePasswordUseCase'),
  checkConnectivityUseCase: createToken<CheckConnectivityUseCase>('CheckConnectivityUseCase'),
} as const;
