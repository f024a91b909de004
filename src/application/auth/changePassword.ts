import { AuthRepository } from '../../domain/auth/authRepository.js';
import { VoidUseCase } from '../useCase.js';

export interface ChangePasswordParams {
  readonly userId: number;
  readonly currentPassword: string;
  readonly newPassword: string;
}

export class ChangePasswordUseCase implements VoidUseCase<ChangePasswordParams> {
  constructor(private readonly authRepository: AuthRepository) {}

  async execute(params: ChangePasswordParams): Promise<void> {
    await this.authRepository.changePassword(
      params.userId,
      params.currentPassword,
      params.newPassword
    );
  }
}
