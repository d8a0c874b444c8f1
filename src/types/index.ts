export type Role = 'admin' | 'user';

export const ROLES: readonly Role[] = ['admin', 'user'];

export interface UserRecord {
  username: string;
  passwordHash: string;
  role: Role;
}

export type CredentialCollection = Record<string, UserRecord>;

export interface Note {
  content: string;
  createdAt: string;
}

export interface FileReference {
  name: string;
  addedAt: string;
}

export interface ProtectedDataRecord {
  username: string;
  notes: Note[];
  files: FileReference[];
}

export type ProtectedDataCollection = Record<string, ProtectedDataRecord>;

export interface ProtectionState {
  failedAttempts: number;
  frozenUntil: number | null;
}

export type ProtectionStatus =
  | { status: 'clear' }
  | { status: 'frozen'; remainingSeconds: number };

export interface Session {
  username: string;
  role: Role;
}

export type LoginResult =
  | { status: 'authenticated'; session: Session }
  | { status: 'bad_credential' }
  | { status: 'frozen'; remainingSeconds: number };

export interface VerificationChallenge {
  username: string;
  codeDigest: string;
  issuedAt: number;
  expiresAt: number;
  failedAttempts: number;
}

export type VerifyResult =
  | { status: 'verified' }
  | { status: 'expired' }
  | { status: 'bad_code'; attemptsRemaining: number };

export interface ResetRequestResponse {
  username: string;
  expiresAt: number;
}

export type PasswordHashScheme = 'sha256' | 'bcrypt';

export interface SecurityConfig {
  dataDir: string;
  maxAttempts: number;
  freezeSeconds: number;
  resetCodeTtlSeconds: number;
  maxResetCodeAttempts: number;
  passwordHashScheme: PasswordHashScheme;
  bcryptRounds: number;
  auditLog: boolean;
}

export type Clock = () => number;
