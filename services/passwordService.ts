import { timingSafeEqual } from 'crypto';
import bcrypt from 'bcryptjs';
import { HashError } from '../types.js';
import { SALT_LENGTH } from './settingsService.js';

export interface PasswordHasher {
  hash: (password: string) => Promise<string>;
  matches: (password: string, storedHash: string) => Promise<boolean>;
}

export interface HasherOptions {
  cost: number;
  // Exactly 16 bytes, shared by every credential (no per-user salt)
  salt: string;
}

/**
 * Builds a bcrypt salt string (`$2b$12$...`) from raw salt bytes and cost.
 */
export const buildBcryptSalt = (cost: number, salt: string): string => {
  const bytes = Buffer.from(salt, 'utf8');
  if (bytes.length !== SALT_LENGTH) {
    throw new HashError(`Salt must be exactly ${SALT_LENGTH} bytes, got ${bytes.length}`);
  }
  if (!Number.isInteger(cost) || cost < 4 || cost > 31) {
    throw new HashError(`Invalid bcrypt cost: ${cost}`);
  }
  const encoded = bcrypt.encodeBase64(Array.from(bytes), SALT_LENGTH);
  return `$2b$${String(cost).padStart(2, '0')}$${encoded}`;
};

export const createPasswordHasher = ({ cost, salt }: HasherOptions): PasswordHasher => {
  const bcryptSalt = buildBcryptSalt(cost, salt);

  const hash = async (password: string): Promise<string> => {
    try {
      return await bcrypt.hash(password, bcryptSalt);
    } catch (error) {
      throw new HashError('Password hashing failed', { cause: error });
    }
  };

  return {
    hash,

    matches: async (password: string, storedHash: string): Promise<boolean> => {
      const candidate = Buffer.from(await hash(password));
      const stored = Buffer.from(storedHash);
      if (candidate.length !== stored.length) return false;
      return timingSafeEqual(candidate, stored);
    },
  };
};
