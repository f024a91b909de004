import { AuthRepository } from '../../domain/auth/authRepository.js';
import { UserEntity } from '../../domain/auth/user.js';
import { UseCase } from '../useCase.js';

export interface LoginParams {
  readonly email: string;
  readonly password: string;
}

export class LoginUseCase implements UseCase<UserEntity, LoginParams> {
  constructor(private readonly authRepository: AuthRepository) {}

  async execute(params: LoginParams): Promise<UserEntity> {
    return await this.authRepository.login({
      email: params.email,
      password: params.password,
    });
  }
}
