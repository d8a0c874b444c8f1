import crypto from 'crypto';

export type CodeGenerator = () => string;

/** Side channel that hands a freshly issued code to its owner. */
export type CodeDelivery = (username: string, code: string, expiresAt: number) => void | Promise<void>;

export const RESET_CODE_LENGTH = 6;

export const generateResetCode: CodeGenerator = () =>
  crypto.randomBytes(RESET_CODE_LENGTH).toString('hex').slice(0, RESET_CODE_LENGTH).toUpperCase();

export function normalizeResetCode(code: string): string {
  return code.trim().toUpperCase();
}
