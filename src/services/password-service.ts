import bcrypt from 'bcrypt';
import crypto from 'crypto';
import validator from 'validator';
import { InvalidInputError } from '../errors';
import { PasswordHashScheme } from '../types';

const BCRYPT_PREFIX = /^\$2[aby]\$\d{2}\$/;

/**
 * Unsalted single-round SHA-256, hex encoded. Every password and
 * verification-code digest in the system goes through this one function.
 */
export function digest(text: string): string {
  return crypto.createHash('sha256').update(text, 'utf8').digest('hex');
}

export function isSha256Digest(value: string): boolean {
  return validator.isHexadecimal(value) && validator.isLength(value, { min: 64, max: 64 });
}

export function isBcryptHash(value: string): boolean {
  return BCRYPT_PREFIX.test(value);
}

export function isSupportedHash(value: string): boolean {
  return isBcryptHash(value) || isSha256Digest(value);
}

export function digestsEqual(left: string, right: string): boolean {
  const a = Buffer.from(left, 'utf8');
  const b = Buffer.from(right, 'utf8');
  if (a.length !== b.length) {
    return false;
  }
  return crypto.timingSafeEqual(a, b);
}

export class PasswordService {
  constructor(
    private readonly scheme: PasswordHashScheme = 'sha256',
    private readonly saltRounds = 12
  ) {}

  async hashPassword(password: string): Promise<string> {
    if (!password) {
      throw new InvalidInputError('Password cannot be empty');
    }

    if (this.scheme === 'bcrypt') {
      try {
        return await bcrypt.hash(password, this.saltRounds);
      } catch (error) {
        throw new Error('Password hashing failed', { cause: error });
      }
    }
    return digest(password);
  }

  async verifyPassword(plainPassword: string, hashedPassword: string): Promise<boolean> {
    if (!plainPassword) {
      throw new InvalidInputError('Plain password cannot be empty');
    }

    if (!hashedPassword) {
      throw new InvalidInputError('Hashed password cannot be empty');
    }

    // Dispatch on the stored format, not the configured scheme
    if (isBcryptHash(hashedPassword)) {
      try {
        return await bcrypt.compare(plainPassword, hashedPassword);
      } catch (error) {
        throw new Error('Password verification failed', { cause: error });
      }
    }
    if (isSha256Digest(hashedPassword)) {
      return digestsEqual(digest(plainPassword), hashedPassword.toLowerCase());
    }
    return false;
  }
}
