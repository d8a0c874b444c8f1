import validator from 'validator';
import { BadCodeError, ExpiredError, InvalidInputError, SequenceError } from '../errors';
import { CredentialStore } from '../repositories/credential-store';
import { Clock, ResetRequestResponse, VerificationChallenge, VerifyResult } from '../types';
import { AuditLogger } from './audit-logger';
import { PasswordService, digest, digestsEqual } from './password-service';
import { CodeDelivery, CodeGenerator, generateResetCode, normalizeResetCode } from './reset-code';

export interface EmergencyResetSettings {
  codeTtlSeconds: number;
  maxCodeAttempts: number;
}

export interface EmergencyResetOptions {
  settings?: Partial<EmergencyResetSettings>;
  generateCode?: CodeGenerator;
  deliverCode: CodeDelivery;
  clock?: Clock;
}

type FlowState =
  | { stage: 'challenge_issued'; challenge: VerificationChallenge }
  | { stage: 'verified'; expiresAt: number };

export function unwrapVerifyResult(result: VerifyResult): void {
  if (result.status === 'expired') {
    throw new ExpiredError();
  }
  if (result.status === 'bad_code') {
    throw new BadCodeError();
  }
}

/**
 * Forgotten-password recovery: issue a short-lived code over an injected
 * delivery channel, verify it once, then let the caller set a new password
 * without logging in.
 *
 * Flow per username: requestReset -> verify -> completeReset, all within the
 * code's validity window. Only the digest of the code is kept.
 */
export class EmergencyResetService {
  private readonly flows = new Map<string, FlowState>();
  private readonly settings: EmergencyResetSettings;
  private readonly generateCode: CodeGenerator;
  private readonly deliverCode: CodeDelivery;
  private readonly clock: Clock;

  constructor(
    private readonly credentialStore: CredentialStore,
    private readonly passwordService: PasswordService,
    private readonly auditLogger: AuditLogger,
    options: EmergencyResetOptions
  ) {
    this.settings = { codeTtlSeconds: 300, maxCodeAttempts: 5, ...options.settings };
    this.generateCode = options.generateCode ?? generateResetCode;
    this.deliverCode = options.deliverCode;
    this.clock = options.clock ?? Date.now;
  }

  async requestReset(username: string): Promise<ResetRequestResponse> {
    const user = await this.credentialStore.get(username.trim());

    const code = normalizeResetCode(this.generateCode());
    if (!validator.isAlphanumeric(code)) {
      throw new Error('Failed to generate reset code');
    }

    const issuedAt = this.clock();
    const challenge: VerificationChallenge = {
      username: user.username,
      codeDigest: digest(code),
      issuedAt,
      expiresAt: issuedAt + this.settings.codeTtlSeconds * 1000,
      failedAttempts: 0
    };

    // A new request replaces whatever flow was in progress for this user
    this.flows.set(user.username, { stage: 'challenge_issued', challenge });
    try {
      await this.deliverCode(user.username, code, challenge.expiresAt);
    } catch (error) {
      this.flows.delete(user.username);
      throw error;
    }

    this.auditLogger.logSecurityEvent({
      event: 'reset_requested',
      username: user.username,
      expiresAt: challenge.expiresAt
    });

    return { username: user.username, expiresAt: challenge.expiresAt };
  }

  verify(username: string, submittedCode: string): VerifyResult {
    const key = username.trim();
    const flow = this.flows.get(key);
    if (!flow || flow.stage !== 'challenge_issued') {
      throw new SequenceError('No verification code is pending for this user');
    }

    const { challenge } = flow;
    if (this.clock() > challenge.expiresAt) {
      this.flows.delete(key);
      this.auditLogger.logSecurityEvent({ event: 'reset_failed', username: key, reason: 'expired' });
      return { status: 'expired' };
    }

    if (!digestsEqual(digest(normalizeResetCode(submittedCode)), challenge.codeDigest)) {
      challenge.failedAttempts += 1;
      const attemptsRemaining = Math.max(this.settings.maxCodeAttempts - challenge.failedAttempts, 0);
      if (attemptsRemaining === 0) {
        this.flows.delete(key);
      }
      this.auditLogger.logSecurityEvent({
        event: 'reset_failed',
        username: key,
        reason: 'bad_code',
        attemptsRemaining
      });
      return { status: 'bad_code', attemptsRemaining };
    }

    this.flows.set(key, { stage: 'verified', expiresAt: challenge.expiresAt });
    this.auditLogger.logSecurityEvent({ event: 'reset_verified', username: key });
    return { status: 'verified' };
  }

  async completeReset(username: string, newPassword: string): Promise<void> {
    const key = username.trim();
    const flow = this.flows.get(key);
    if (!flow || flow.stage !== 'verified') {
      throw new SequenceError('Identity must be verified before the password can be reset');
    }
    if (this.clock() > flow.expiresAt) {
      this.flows.delete(key);
      this.auditLogger.logSecurityEvent({ event: 'reset_failed', username: key, reason: 'expired' });
      throw new ExpiredError();
    }
    if (!newPassword) {
      throw new InvalidInputError('New password is required');
    }

    const passwordHash = await this.passwordService.hashPassword(newPassword);
    await this.credentialStore.updatePasswordHash(key, passwordHash);
    this.flows.delete(key);

    this.auditLogger.logSecurityEvent({ event: 'reset_completed', username: key });
  }

  cancel(username: string): void {
    this.flows.delete(username.trim());
  }

  hasPendingFlow(username: string): boolean {
    return this.flows.has(username.trim());
  }
}
