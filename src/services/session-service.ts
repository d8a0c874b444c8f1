import { InvalidInputError, PermissionDeniedError } from '../errors';
import { CredentialStore } from '../repositories/credential-store';
import { ProtectedDataStore } from '../repositories/protected-data-store';
import { FileReference, Note, Role, Session } from '../types';
import { AuditLogger } from './audit-logger';
import { PasswordService } from './password-service';
import { RegistrationResponse, UserRegistrationService } from './user-registration';

export interface SessionDependencies {
  credentialStore: CredentialStore;
  protectedDataStore: ProtectedDataStore;
  passwordService: PasswordService;
  registrationService: UserRegistrationService;
  auditLogger: AuditLogger;
}

/**
 * Operations available to one authenticated identity. Own notes, files and
 * password are always reachable; user administration requires the admin role.
 */
export class UserSession {
  constructor(
    readonly identity: Session,
    private readonly deps: SessionDependencies
  ) {}

  get username(): string {
    return this.identity.username;
  }

  get role(): Role {
    return this.identity.role;
  }

  get isAdmin(): boolean {
    return this.identity.role === 'admin';
  }

  async changeOwnPassword(newPassword: string): Promise<void> {
    await this.writePassword(this.username, newPassword);
    this.deps.auditLogger.logUserManagementEvent({
      event: 'password_changed',
      username: this.username
    });
  }

  async addNote(content: string): Promise<Note> {
    if (!content.trim()) {
      throw new InvalidInputError('Note cannot be empty');
    }
    const note = await this.deps.protectedDataStore.appendNote(this.username, content);
    this.deps.auditLogger.logUserManagementEvent({ event: 'note_added', username: this.username });
    return note;
  }

  listNotes(): Promise<Iterable<Note>> {
    return this.deps.protectedDataStore.listNotes(this.username);
  }

  async addFileReference(name: string): Promise<FileReference> {
    if (!name.trim()) {
      throw new InvalidInputError('File name cannot be empty');
    }
    return this.deps.protectedDataStore.appendFile(this.username, name.trim());
  }

  listFiles(): Promise<Iterable<FileReference>> {
    return this.deps.protectedDataStore.listFiles(this.username);
  }

  registerUser(newUsername: string, password: string, role: Role): Promise<RegistrationResponse> {
    return this.deps.registrationService.registerUser(this.identity, newUsername, password, role);
  }

  async resetOtherPassword(targetUsername: string, newPassword: string): Promise<void> {
    this.requireAdmin('reset_password');
    const target = targetUsername.trim();
    await this.writePassword(target, newPassword);
    this.deps.auditLogger.logUserManagementEvent({
      event: 'password_reset',
      username: target,
      resetBy: this.username
    });
  }

  async listUsers(): Promise<Session[]> {
    this.requireAdmin('list_users');
    const users = await this.deps.credentialStore.list();
    return users.map(user => ({ username: user.username, role: user.role }));
  }

  private requireAdmin(action: string): void {
    if (!this.isAdmin) {
      this.deps.auditLogger.logSecurityEvent({
        event: 'permission_denied',
        username: this.username,
        action
      });
      throw new PermissionDeniedError('Only admins can manage other users');
    }
  }

  private async writePassword(username: string, newPassword: string): Promise<void> {
    if (!newPassword) {
      throw new InvalidInputError('New password is required');
    }
    const passwordHash = await this.deps.passwordService.hashPassword(newPassword);
    await this.deps.credentialStore.updatePasswordHash(username, passwordHash);
  }
}
