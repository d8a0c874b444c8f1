import { promises as fs } from 'fs';
import { InvalidInputError, NotFoundError, PermissionDeniedError } from '../src/errors';
import { SecuritySystem } from '../src/security-system';
import { digest } from '../src/services/password-service';
import { UserSession } from '../src/services/session-service';
import { ManualClock, makeTempDir, removeDir, testConfig } from './support/fixtures';

describe('Session Operations', () => {
  let dataDir: string;
  let clock: ManualClock;
  let system: SecuritySystem;
  let adminSession: UserSession;
  let userSession: UserSession;

  async function snapshot(): Promise<string[]> {
    const names = await fs.readdir(dataDir);
    return Promise.all(names.sort().map(name => fs.readFile(`${dataDir}/${name}`, 'utf8')));
  }

  beforeEach(async () => {
    dataDir = await makeTempDir();
    clock = new ManualClock();
    system = new SecuritySystem(testConfig(dataDir), { deliverCode: jest.fn(), clock: clock.now });

    await system.registration.createFirstUser('alice', 'pw1');
    adminSession = system.openSession({ username: 'alice', role: 'admin' });
    await adminSession.registerUser('bob', 'pw2', 'user');
    userSession = system.openSession({ username: 'bob', role: 'user' });
  });

  afterEach(async () => {
    await removeDir(dataDir);
  });

  describe('Own Data', () => {
    it('should add and list the session owner notes', async () => {
      await userSession.addNote('remember the milk');
      await userSession.addNote('call home');

      const notes = [...(await userSession.listNotes())];

      expect(notes).toEqual([
        { content: 'remember the milk', createdAt: '2026-01-15T09:00:00.000Z' },
        { content: 'call home', createdAt: '2026-01-15T09:00:00.000Z' }
      ]);
      expect([...(await adminSession.listNotes())]).toEqual([]);
    });

    it('should reject blank notes', async () => {
      await expect(userSession.addNote('   ')).rejects.toThrow(InvalidInputError);
    });

    it('should store file references', async () => {
      await userSession.addFileReference(' notes.pdf ');

      expect([...(await userSession.listFiles())]).toEqual([
        { name: 'notes.pdf', addedAt: '2026-01-15T09:00:00.000Z' }
      ]);
    });

    it('should change the own password', async () => {
      await userSession.changeOwnPassword('fresh');

      await expect(system.auth.login('bob', 'fresh')).resolves.toMatchObject({ status: 'authenticated' });
      await expect(system.auth.login('bob', 'pw2')).resolves.toEqual({ status: 'bad_credential' });
    });

    it('should reject an empty new password', async () => {
      await expect(userSession.changeOwnPassword('')).rejects.toThrow('New password is required');
    });
  });

  describe('Administration', () => {
    it('should let an admin reset another user password', async () => {
      await adminSession.resetOtherPassword('bob', 'reset-pw');

      await expect(system.credentialStore.get('bob')).resolves.toEqual({
        username: 'bob',
        passwordHash: digest('reset-pw'),
        role: 'user'
      });
    });

    it('should fail with NotFound when the target does not exist', async () => {
      await expect(adminSession.resetOtherPassword('nobody', 'pw')).rejects.toThrow(NotFoundError);
    });

    it('should list users for admins', async () => {
      await expect(adminSession.listUsers()).resolves.toEqual([
        { username: 'alice', role: 'admin' },
        { username: 'bob', role: 'user' }
      ]);
    });

    it('should deny user administration to non-admins without touching either store', async () => {
      await userSession.addNote('mine');
      const before = await snapshot();

      await expect(userSession.registerUser('carol', 'pw3', 'user')).rejects.toThrow(PermissionDeniedError);
      await expect(userSession.resetOtherPassword('alice', 'hijack')).rejects.toThrow(PermissionDeniedError);
      await expect(userSession.listUsers()).rejects.toThrow(PermissionDeniedError);

      await expect(snapshot()).resolves.toEqual(before);
    });
  });

  describe('Session Identity', () => {
    it('should expose the identity it was opened with', () => {
      expect(adminSession.identity).toEqual({ username: 'alice', role: 'admin' });
      expect(adminSession.isAdmin).toBe(true);
      expect(userSession.role).toBe('user');
      expect(userSession.isAdmin).toBe(false);
    });
  });
});
