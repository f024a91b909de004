import jwt from 'jsonwebtoken';
import { UserEntity } from '../../domain/auth/user.js';

export interface JwtPayload {
  userId: number;
  email: string;
}

export interface TokenOptions {
  secret: string;
  /** Token lifetime in seconds. */
  expiresInSeconds: number;
}

export function issueToken(user: UserEntity, options: TokenOptions): string {
  const payload: JwtPayload = { userId: user.id, email: user.email };
  return jwt.sign(payload, options.secret, {
    expiresIn: options.expiresInSeconds,
  });
}

function isJwtPayload(value: unknown): value is JwtPayload {
  return (
    typeof value === 'object' &&
    value !== null &&
    'userId' in value &&
    typeof value.userId === 'number' &&
    'email' in value &&
    typeof value.email === 'string'
  );
}

/**
 * Returns the payload of a valid token, or null when the token is
 * malformed, expired or signed with another secret.
 */
export function verifyToken(token: string, secret: string): JwtPayload | null {
  try {
    const decoded = jwt.verify(token, secret);
    return isJwtPayload(decoded) ? decoded : null;
  } catch {
    return null;
  }
}
