import path from 'path';
import { AlreadyExistsError, NotFoundError, StorageCorruptError } from '../errors';
import { isSupportedHash } from '../services/password-service';
import { CredentialCollection, ROLES, Role, UserRecord } from '../types';
import { JsonDocumentFile } from './json-document';
import { isPlainObject, isUsableKey } from './validation';

export const CREDENTIALS_FILE = 'user_data.json';

export interface CredentialStore {
  load(): Promise<CredentialCollection>;
  save(collection: CredentialCollection): Promise<void>;
  upsert(record: UserRecord): Promise<void>;
  find(username: string): Promise<UserRecord | null>;
  get(username: string): Promise<UserRecord>;
  list(): Promise<UserRecord[]>;
  count(): Promise<number>;
  updatePasswordHash(username: string, passwordHash: string): Promise<void>;
  /**
   * Adds a new record. Fails with `AlreadyExists` when the username is taken;
   * `precondition` runs against the loaded collection under the same lock and
   * may throw to abort the insert.
   */
  insert(record: UserRecord, precondition?: (collection: CredentialCollection) => void): Promise<void>;
}

function isRole(value: string): value is Role {
  return ROLES.some(role => role === value);
}

export function parseCredentialCollection(document: unknown, source: string): CredentialCollection {
  if (document === null) {
    return {};
  }
  if (!isPlainObject(document)) {
    throw new StorageCorruptError(source, 'expected an object keyed by username');
  }

  const collection: CredentialCollection = {};
  for (const [key, entry] of Object.entries(document)) {
    if (!isPlainObject(entry)) {
      throw new StorageCorruptError(source, `entry "${key}" is not an object`);
    }

    const { username, passwordHash, role } = entry;
    if (typeof username !== 'string' || username !== key || !isUsableKey(username)) {
      throw new StorageCorruptError(source, `entry "${key}" has a mismatched username`);
    }
    if (typeof passwordHash !== 'string' || !isSupportedHash(passwordHash)) {
      throw new StorageCorruptError(source, `entry "${key}" has an unrecognised password hash`);
    }
    if (typeof role !== 'string' || !isRole(role)) {
      throw new StorageCorruptError(source, `entry "${key}" has an unknown role`);
    }

    collection[key] = { username, passwordHash, role };
  }
  return collection;
}

/**
 * Credential collection kept as one JSON document. Every mutation reloads the
 * whole file, applies the change and rewrites it under the store's lock.
 */
export class JsonCredentialStore implements CredentialStore {
  private readonly file: JsonDocumentFile;

  constructor(dataDir: string) {
    this.file = new JsonDocumentFile(path.join(dataDir, CREDENTIALS_FILE));
  }

  get filePath(): string {
    return this.file.filePath;
  }

  async load(): Promise<CredentialCollection> {
    return parseCredentialCollection(await this.file.read(), this.file.filePath);
  }

  async save(collection: CredentialCollection): Promise<void> {
    await this.file.write(collection);
  }

  upsert(record: UserRecord): Promise<void> {
    return this.file.withLock(async () => {
      const collection = await this.load();
      collection[record.username] = { ...record };
      await this.save(collection);
    });
  }

  insert(record: UserRecord, precondition?: (collection: CredentialCollection) => void): Promise<void> {
    return this.file.withLock(async () => {
      const collection = await this.load();
      precondition?.(collection);
      if (Object.hasOwn(collection, record.username)) {
        throw new AlreadyExistsError(`Username '${record.username}' already exists`);
      }
      collection[record.username] = { ...record };
      await this.save(collection);
    });
  }

  async find(username: string): Promise<UserRecord | null> {
    const collection = await this.load();
    return Object.hasOwn(collection, username) ? collection[username] : null;
  }

  async get(username: string): Promise<UserRecord> {
    const record = await this.find(username);
    if (!record) {
      throw new NotFoundError(`User '${username}' does not exist`);
    }
    return record;
  }

  async list(): Promise<UserRecord[]> {
    return Object.values(await this.load());
  }

  async count(): Promise<number> {
    return Object.keys(await this.load()).length;
  }

  updatePasswordHash(username: string, passwordHash: string): Promise<void> {
    return this.file.withLock(async () => {
      const collection = await this.load();
      if (!Object.hasOwn(collection, username)) {
        throw new NotFoundError(`User '${username}' does not exist`);
      }
      collection[username] = { ...collection[username], passwordHash };
      await this.save(collection);
    });
  }
}
