import bcrypt from 'bcryptjs';

export const DEFAULT_HASH_ROUNDS = 12;

export function hashPassword(password: string, rounds = DEFAULT_HASH_ROUNDS): Promise<string> {
  return bcrypt.hash(password, rounds);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}
