export * from './types';
export * from './errors';
export { loadConfig, validateConfiguration, withDataDir } from './config';
export { JsonDocumentFile } from './repositories/json-document';
export { CredentialStore, JsonCredentialStore, parseCredentialCollection } from './repositories/credential-store';
export {
  JsonProtectedDataStore,
  ProtectedDataStore,
  parseProtectedDataCollection,
  restartable
} from './repositories/protected-data-store';
export { AccountProtectionTracker, ProtectionSettings } from './services/account-protection-tracker';
export { AuditLogger, AuditEvent } from './services/audit-logger';
export { AuthService, unwrapLoginResult } from './services/auth-service';
export { EmergencyResetService, EmergencyResetOptions, unwrapVerifyResult } from './services/emergency-reset-service';
export { PasswordService, digest } from './services/password-service';
export { CodeDelivery, CodeGenerator, generateResetCode } from './services/reset-code';
export { UserSession } from './services/session-service';
export { UserRegistrationService, RegistrationResponse, parseRole } from './services/user-registration';
export { SecuritySystem, SecuritySystemOptions } from './security-system';
export { SecurityConsole } from './cli/security-console';
export { Prompt, createTerminalPrompt } from './cli/prompt';
