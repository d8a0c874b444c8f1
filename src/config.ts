import path from 'path';
import { PasswordHashScheme, SecurityConfig } from './types';

const HASH_SCHEMES: readonly PasswordHashScheme[] = ['sha256', 'bcrypt'];

function readInteger(value: string | undefined, fallback: string): number {
  const raw = (value || fallback).trim();
  if (!/^\d+$/.test(raw)) {
    throw new Error('Invalid security configuration');
  }
  return parseInt(raw, 10);
}

function readHashScheme(value: string | undefined): PasswordHashScheme {
  const raw = (value || 'sha256').trim().toLowerCase();
  const scheme = HASH_SCHEMES.find(candidate => candidate === raw);
  if (!scheme) {
    throw new Error('Invalid security configuration');
  }
  return scheme;
}

export function validateConfiguration(config: SecurityConfig): void {
  if (
    config.maxAttempts < 1 ||
    config.freezeSeconds < 1 ||
    config.resetCodeTtlSeconds < 1 ||
    config.maxResetCodeAttempts < 1 ||
    !config.dataDir
  ) {
    throw new Error('Invalid security configuration');
  }

  if (config.maxAttempts > 100) {
    throw new Error('Configuration values are not secure');
  }
  if (config.resetCodeTtlSeconds > 3600) {
    throw new Error('Configuration values are not secure');
  }
  if (config.maxResetCodeAttempts > 20) {
    throw new Error('Configuration values are not secure');
  }
  if (config.bcryptRounds < 4 || config.bcryptRounds > 15) {
    throw new Error('Configuration values are not secure');
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): SecurityConfig {
  const config: SecurityConfig = {
    dataDir: path.resolve(env.SECURITY_DATA_DIR || path.join(process.cwd(), 'data')),
    maxAttempts: readInteger(env.FREEZE_MAX_ATTEMPTS, '5'),
    freezeSeconds: readInteger(env.FREEZE_DURATION_SECONDS, '30'),
    resetCodeTtlSeconds: readInteger(env.RESET_CODE_TTL_SECONDS, '300'),
    maxResetCodeAttempts: readInteger(env.RESET_CODE_MAX_ATTEMPTS, '5'),
    passwordHashScheme: readHashScheme(env.PASSWORD_HASH_SCHEME),
    bcryptRounds: readInteger(env.BCRYPT_ROUNDS, '12'),
    auditLog: (env.AUDIT_LOG || 'on').trim().toLowerCase() !== 'off'
  };

  validateConfiguration(config);
  return config;
}

export function withDataDir(config: SecurityConfig, dataDir: string): SecurityConfig {
  const next = { ...config, dataDir: path.resolve(dataDir) };
  validateConfiguration(next);
  return next;
}
