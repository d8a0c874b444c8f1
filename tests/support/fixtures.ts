import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { Clock, SecurityConfig } from '../../src/types';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'local-guard-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Manually advanced clock starting at a fixed instant. */
export class ManualClock {
  current: number;

  constructor(start = Date.UTC(2026, 0, 15, 9, 0, 0)) {
    this.current = start;
  }

  readonly now: Clock = () => this.current;

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export function testConfig(dataDir: string, overrides: Partial<SecurityConfig> = {}): SecurityConfig {
  return {
    dataDir,
    maxAttempts: 5,
    freezeSeconds: 30,
    resetCodeTtlSeconds: 300,
    maxResetCodeAttempts: 5,
    passwordHashScheme: 'sha256',
    bcryptRounds: 4,
    auditLog: false,
    ...overrides
  };
}
