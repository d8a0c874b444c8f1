import validator from 'validator';
import { InvalidInputError, PermissionDeniedError } from '../errors';
import { CredentialStore } from '../repositories/credential-store';
import { RESERVED_KEYS } from '../repositories/validation';
import { ROLES, Role, Session, UserRecord } from '../types';
import { AuditLogger } from './audit-logger';
import { PasswordService } from './password-service';

export interface RegistrationResponse {
  username: string;
  role: Role;
}

export function parseRole(value: string): Role {
  const normalized = value.trim().toLowerCase();
  const role = ROLES.find(candidate => candidate === normalized);
  if (!role) {
    throw new InvalidInputError('Role must be admin or user');
  }
  return role;
}

export class UserRegistrationService {
  constructor(
    private readonly credentialStore: CredentialStore,
    private readonly passwordService: PasswordService,
    private readonly auditLogger: AuditLogger
  ) {}

  async needsFirstUser(): Promise<boolean> {
    return (await this.credentialStore.count()) === 0;
  }

  /** The very first account is always an administrator. */
  async createFirstUser(username: string, password: string): Promise<RegistrationResponse> {
    const record = await this.buildRecord(username, password, 'admin');

    await this.credentialStore.insert(record, collection => {
      if (Object.keys(collection).length > 0) {
        throw new PermissionDeniedError('Only admins can register new users');
      }
    });

    this.auditLogger.logUserManagementEvent({
      event: 'user_registered',
      username: record.username,
      role: record.role,
      firstUser: true
    });
    return { username: record.username, role: record.role };
  }

  async registerUser(
    registrar: Session,
    username: string,
    password: string,
    role: Role
  ): Promise<RegistrationResponse> {
    const registrarRecord = await this.credentialStore.find(registrar.username);
    if (registrar.role !== 'admin' || registrarRecord?.role !== 'admin') {
      this.auditLogger.logSecurityEvent({
        event: 'permission_denied',
        username: registrar.username,
        action: 'register_user'
      });
      throw new PermissionDeniedError('Only admins can register new users');
    }

    const record = await this.buildRecord(username, password, role);
    await this.credentialStore.insert(record);

    this.auditLogger.logUserManagementEvent({
      event: 'user_registered',
      username: record.username,
      role: record.role,
      registeredBy: registrar.username
    });
    return { username: record.username, role: record.role };
  }

  private async buildRecord(username: string, password: string, role: Role): Promise<UserRecord> {
    const normalizedUsername = username.trim();
    if (validator.isEmpty(normalizedUsername)) {
      throw new InvalidInputError('Username is required');
    }
    if (RESERVED_KEYS.has(normalizedUsername)) {
      throw new InvalidInputError('Username is not allowed');
    }
    if (!password) {
      throw new InvalidInputError('Password is required');
    }

    return {
      username: normalizedUsername,
      passwordHash: await this.passwordService.hashPassword(password),
      role
    };
  }
}
