/**
 * User domain entity. Frozen on creation and compared by value.
 */
export interface UserEntity {
  readonly id: number;
  readonly email: string;
}

export function createUserEntity(id: number, email: string): UserEntity {
  return Object.freeze({ id, email });
}

export function sameUser(a: UserEntity, b: UserEntity): boolean {
  return a.id === b.id && a.email === b.email;
}
