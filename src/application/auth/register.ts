import { AuthRepository } from '../../domain/auth/authRepository.js';
import { UserEntity } from '../../domain/auth/user.js';
import { UseCase } from '../useCase.js';

export interface RegisterParams {
  readonly email: string;
  readonly password: string;
}

export class RegisterUseCase implements UseCase<UserEntity, RegisterParams> {
  constructor(private readonly authRepository: AuthRepository) {}

  async execute(params: RegisterParams): Promise<UserEntity> {
    return await this.authRepository.register({
      email: params.email,
      password: params.password,
    });
  }
}
