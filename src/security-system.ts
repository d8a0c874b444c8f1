import { JsonCredentialStore } from './repositories/credential-store';
import { JsonProtectedDataStore } from './repositories/protected-data-store';
import { AccountProtectionTracker } from './services/account-protection-tracker';
import { AuditLogger } from './services/audit-logger';
import { AuthService } from './services/auth-service';
import { EmergencyResetService } from './services/emergency-reset-service';
import { PasswordService } from './services/password-service';
import { CodeDelivery, CodeGenerator } from './services/reset-code';
import { UserSession } from './services/session-service';
import { UserRegistrationService } from './services/user-registration';
import { Clock, SecurityConfig, Session } from './types';

export interface SecuritySystemOptions {
  deliverCode: CodeDelivery;
  generateCode?: CodeGenerator;
  clock?: Clock;
}

/**
 * Wires the stores and services for one data directory. The protection
 * tracker lives as long as this object, so building a new system (for
 * example after switching directories) starts with no freezes.
 */
export class SecuritySystem {
  readonly credentialStore: JsonCredentialStore;
  readonly protectedDataStore: JsonProtectedDataStore;
  readonly passwordService: PasswordService;
  readonly tracker: AccountProtectionTracker;
  readonly auditLogger: AuditLogger;
  readonly auth: AuthService;
  readonly registration: UserRegistrationService;
  readonly emergencyReset: EmergencyResetService;

  constructor(
    readonly config: SecurityConfig,
    private readonly options: SecuritySystemOptions
  ) {
    const clock = options.clock ?? Date.now;

    this.credentialStore = new JsonCredentialStore(config.dataDir);
    this.protectedDataStore = new JsonProtectedDataStore(config.dataDir, clock);
    this.passwordService = new PasswordService(config.passwordHashScheme, config.bcryptRounds);
    this.auditLogger = new AuditLogger(config.auditLog, clock);
    this.tracker = new AccountProtectionTracker(
      { maxAttempts: config.maxAttempts, freezeSeconds: config.freezeSeconds },
      clock
    );
    this.auth = new AuthService(this.credentialStore, this.passwordService, this.tracker, this.auditLogger);
    this.registration = new UserRegistrationService(this.credentialStore, this.passwordService, this.auditLogger);
    this.emergencyReset = new EmergencyResetService(this.credentialStore, this.passwordService, this.auditLogger, {
      settings: {
        codeTtlSeconds: config.resetCodeTtlSeconds,
        maxCodeAttempts: config.maxResetCodeAttempts
      },
      generateCode: options.generateCode,
      deliverCode: options.deliverCode,
      clock
    });
  }

  openSession(identity: Session): UserSession {
    return new UserSession(identity, {
      credentialStore: this.credentialStore,
      protectedDataStore: this.protectedDataStore,
      passwordService: this.passwordService,
      registrationService: this.registration,
      auditLogger: this.auditLogger
    });
  }

  /** Same options over another configuration; used when the data directory changes. */
  rebuild(config: SecurityConfig): SecuritySystem {
    return new SecuritySystem(config, this.options);
  }
}
