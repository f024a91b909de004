import { AuthRepository } from '../../domain/auth/authRepository.js';
import { UserEntity } from '../../domain/auth/user.js';
import { UseCase } from '../useCase.js';

export interface GetUserParams {
  readonly userId: number;
}

export class GetUserUseCase implements UseCase<UserEntity, GetUserParams> {
  constructor(private readonly authRepository: AuthRepository) {}

  async execute(params: GetUserParams): Promise<UserEntity> {
    return await this.authRepository.getUser(params.userId);
  }
}
