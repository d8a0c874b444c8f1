import { withDataDir } from '../config';
import { isSecurityError } from '../errors';
import { SecuritySystem } from '../security-system';
import { UserSession } from '../services/session-service';
import { ROLES, Role } from '../types';
import { Prompt } from './prompt';

class InputClosed extends Error {
  constructor() {
    super('Input closed');
  }
}

function roleOrDefault(value: string): Role {
  const normalized = value.trim().toLowerCase();
  return ROLES.find(role => role === normalized) ?? 'user';
}

/**
 * Menu-driven front end over a SecuritySystem. All user interaction lives
 * here; typed failures from the core are turned into messages.
 */
export class SecurityConsole {
  constructor(
    private system: SecuritySystem,
    private readonly prompt: Prompt
  ) {}

  get currentSystem(): SecuritySystem {
    return this.system;
  }

  async run(): Promise<void> {
    try {
      await this.ensureFirstUser();
      let running = true;
      while (running) {
        running = await this.mainMenu();
      }
      this.prompt.print('Exiting system. Goodbye!');
    } catch (error) {
      if (!(error instanceof InputClosed)) {
        throw error;
      }
    }
  }

  private async ask(question: string): Promise<string> {
    const answer = await this.prompt.ask(question);
    if (answer === null) {
      throw new InputClosed();
    }
    return answer;
  }

  private async guarded(command: () => Promise<void>): Promise<void> {
    try {
      await command();
    } catch (error) {
      if (isSecurityError(error)) {
        this.prompt.print(error.message);
        return;
      }
      throw error;
    }
  }

  private async askNewPassword(label: string): Promise<string | null> {
    const password = await this.ask(`Enter ${label}: `);
    const confirmation = await this.ask('Confirm password: ');
    if (password !== confirmation) {
      this.prompt.print('Passwords do not match!');
      return null;
    }
    return password;
  }

  private async ensureFirstUser(): Promise<void> {
    while (await this.system.registration.needsFirstUser()) {
      this.prompt.print('No users exist. You must create the first user.');
      await this.guarded(() => this.createFirstUser());
    }
  }

  private async createFirstUser(): Promise<void> {
    this.prompt.print('==== USER REGISTRATION ====');
    const username = await this.ask('Enter new username: ');
    const password = await this.askNewPassword('password');
    if (password === null) {
      return;
    }

    this.prompt.print('First user created will be an administrator.');
    const created = await this.system.registration.createFirstUser(username, password);
    this.prompt.print(`User '${created.username}' created successfully with role '${created.role}'!`);
  }

  private async mainMenu(): Promise<boolean> {
    this.prompt.print('===== SECURITY SYSTEM =====');
    this.prompt.print(`Data location: ${this.system.config.dataDir}`);
    this.prompt.print('1. Login');
    this.prompt.print('2. Change Data Directory');
    this.prompt.print('3. Emergency Profile Reset');
    this.prompt.print('4. Exit');

    const choice = (await this.ask('Enter your choice (1-4): ')).trim();
    switch (choice) {
      case '1':
        await this.guarded(() => this.login());
        return true;
      case '2':
        await this.guarded(() => this.changeDataDirectory());
        return true;
      case '3':
        await this.guarded(() => this.emergencyReset());
        return true;
      case '4':
        return false;
      default:
        this.prompt.print('Invalid choice. Try again.');
        return true;
    }
  }

  private async login(): Promise<void> {
    this.prompt.print('==== SECURITY SYSTEM LOGIN ====');
    const username = await this.ask('Username: ');
    const password = await this.ask('Password: ');

    const result = await this.system.auth.login(username, password);
    switch (result.status) {
      case 'frozen':
        this.prompt.print(`Account is frozen. Try again in ${result.remainingSeconds} seconds.`);
        return;
      case 'bad_credential':
        this.prompt.print('Invalid username or password');
        return;
      case 'authenticated':
        this.prompt.print(`Welcome, ${result.session.username}!`);
        await this.userMenu(this.system.openSession(result.session));
    }
  }

  private async changeDataDirectory(): Promise<void> {
    const dir = (await this.ask('Enter new data directory path (leave blank to cancel): ')).trim();
    if (!dir) {
      return;
    }

    this.system = this.system.rebuild(withDataDir(this.system.config, dir));
    this.prompt.print(`Switching to new data directory: ${this.system.config.dataDir}`);
    await this.ensureFirstUser();
  }

  private async emergencyReset(): Promise<void> {
    this.prompt.print('==== EMERGENCY PROFILE RESET ====');
    this.prompt.print('WARNING: This will reset your password but preserve your data.');
    const username = (await this.ask('Enter your username: ')).trim();

    const reset = this.system.emergencyReset;
    await reset.requestReset(username);

    for (;;) {
      const result = reset.verify(username, await this.ask('Enter the security code: '));
      if (result.status === 'verified') {
        break;
      }
      if (result.status === 'expired') {
        this.prompt.print('Security code has expired. Reset failed.');
        return;
      }
      if (result.attemptsRemaining === 0) {
        this.prompt.print('Invalid security code. Reset failed.');
        return;
      }
      this.prompt.print(`Invalid security code. ${result.attemptsRemaining} attempts remaining.`);
    }

    const password = await this.askNewPassword('new password');
    if (password === null) {
      reset.cancel(username);
      this.prompt.print('Reset canceled.');
      return;
    }

    await reset.completeReset(username, password);
    this.prompt.print(`Password for ${username} has been reset successfully!`);
    this.prompt.print('You can now log in with your new password.');
  }

  private async userMenu(session: UserSession): Promise<void> {
    for (;;) {
      this.prompt.print(`===== Welcome ${session.username} =====`);
      this.prompt.print('1. View Notes');
      this.prompt.print('2. Add Note');
      this.prompt.print('3. Change Password');
      if (session.isAdmin) {
        this.prompt.print('4. Register New User');
        this.prompt.print('5. Reset User Password');
      }
      this.prompt.print('0. Logout');

      const choice = (await this.ask('Enter your choice: ')).trim();
      if (choice === '0') {
        this.system.auth.logout(session.identity);
        this.prompt.print('Logging out...');
        return;
      }
      await this.guarded(() => this.sessionCommand(session, choice));
    }
  }

  private async sessionCommand(session: UserSession, choice: string): Promise<void> {
    switch (choice) {
      case '1':
        return this.viewNotes(session);
      case '2': {
        await session.addNote(await this.ask('Enter your note: '));
        this.prompt.print('Note added successfully!');
        return;
      }
      case '3': {
        const password = await this.askNewPassword('new password');
        if (password !== null) {
          await session.changeOwnPassword(password);
          this.prompt.print('Password changed successfully!');
        }
        return;
      }
      case '4':
        if (session.isAdmin) {
          return this.registerUser(session);
        }
        break;
      case '5':
        if (session.isAdmin) {
          return this.resetUserPassword(session);
        }
        break;
    }
    this.prompt.print('Invalid choice. Try again.');
  }

  private async viewNotes(session: UserSession): Promise<void> {
    const notes = [...(await session.listNotes())];
    if (notes.length === 0) {
      this.prompt.print('No notes found.');
      return;
    }

    this.prompt.print('==== YOUR NOTES ====');
    notes.forEach((note, index) => this.prompt.print(`${index + 1}. ${note.content}`));
  }

  private async registerUser(session: UserSession): Promise<void> {
    this.prompt.print('==== USER REGISTRATION ====');
    const username = await this.ask('Enter new username: ');
    const password = await this.askNewPassword('password');
    if (password === null) {
      return;
    }
    const role = roleOrDefault(await this.ask('Enter role (admin/user): '));

    const created = await session.registerUser(username, password, role);
    this.prompt.print(`User '${created.username}' created successfully with role '${created.role}'!`);
  }

  private async resetUserPassword(session: UserSession): Promise<void> {
    this.prompt.print('==== ADMIN PASSWORD RESET ====');
    this.prompt.print('Available users:');
    for (const user of await session.listUsers()) {
      this.prompt.print(`- ${user.username} (${user.role})`);
    }

    const target = (await this.ask('Enter username to reset: ')).trim();
    const password = await this.askNewPassword('new password for user');
    if (password === null) {
      return;
    }

    await session.resetOtherPassword(target, password);
    this.prompt.print(`Password for ${target} has been reset successfully!`);
  }
}
