import { CredentialStore } from '../repositories/credential-store';
import { BadCredentialError, FrozenError } from '../errors';
import { LoginResult, Session } from '../types';
import { AccountProtectionTracker } from './account-protection-tracker';
import { AuditLogger } from './audit-logger';
import { PasswordService } from './password-service';

/**
 * Turns a login outcome into a session, throwing the matching typed error for
 * the rejected variants. Useful where the caller reports failures uniformly.
 */
export function unwrapLoginResult(result: LoginResult): Session {
  switch (result.status) {
    case 'authenticated':
      return result.session;
    case 'frozen':
      throw new FrozenError(result.remainingSeconds);
    case 'bad_credential':
      throw new BadCredentialError();
  }
}

export class AuthService {
  constructor(
    private readonly credentialStore: CredentialStore,
    private readonly passwordService: PasswordService,
    private readonly tracker: AccountProtectionTracker,
    private readonly auditLogger: AuditLogger
  ) {}

  async login(username: string, password: string): Promise<LoginResult> {
    const normalizedUsername = username.trim();
    if (!normalizedUsername) {
      return { status: 'bad_credential' };
    }

    // Frozen accounts are rejected before the credential store is consulted
    const status = this.tracker.checkStatus(normalizedUsername);
    if (status.status === 'frozen') {
      this.auditLogger.logAuthenticationEvent({
        event: 'login_frozen',
        username: normalizedUsername,
        remainingSeconds: status.remainingSeconds
      });
      return status;
    }

    const user = await this.credentialStore.find(normalizedUsername);
    const isPasswordValid =
      user !== null &&
      password.length > 0 &&
      (await this.passwordService.verifyPassword(password, user.passwordHash));

    if (!user || !isPasswordValid) {
      return this.rejectLogin(normalizedUsername, user === null);
    }

    this.tracker.recordSuccess(normalizedUsername);
    this.auditLogger.logAuthenticationEvent({
      event: 'login_success',
      username: user.username,
      role: user.role
    });

    return {
      status: 'authenticated',
      session: { username: user.username, role: user.role }
    };
  }

  logout(session: Session): void {
    this.auditLogger.logAuthenticationEvent({
      event: 'logout',
      username: session.username,
      reason: 'user_initiated'
    });
  }

  // Unknown usernames and wrong passwords produce the same result and both
  // count toward the freeze; only the audit trail tells them apart.
  private rejectLogin(username: string, unknownUser: boolean): LoginResult {
    const status = this.tracker.recordFailure(username);
    this.auditLogger.logAuthenticationEvent({
      event: 'login_failed',
      username,
      reason: unknownUser ? 'user_not_found' : 'invalid_password'
    });

    if (status.status === 'frozen') {
      this.auditLogger.logSecurityEvent({
        event: 'account_frozen',
        username,
        reason: 'max_failed_attempts',
        failedAttempts: this.tracker.maxAttempts,
        freezeSeconds: this.tracker.freezeSeconds
      });
      return status;
    }

    return { status: 'bad_credential' };
  }
}
