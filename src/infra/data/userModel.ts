import { createUserEntity, UserEntity } from '../../domain/auth/user.js';

/**
 * Storage shape of a user as the remote data source returns it.
 */
export interface UserModel {
  id: number;
  email: string;
  createdAt?: Date;
}

export interface UserRow {
  id: number;
  email: string;
  password_hash: string;
  created_at: Date;
}

export function userModelFromRow(row: UserRow): UserModel {
  return {
    id: row.id,
    email: row.email,
    createdAt: row.created_at,
  };
}

export function toUserEntity(model: UserModel): UserEntity {
  return createUserEntity(model.id, model.email);
}
