import path from 'path';
import { StorageCorruptError } from '../errors';
import { FileReference, Note, ProtectedDataCollection, ProtectedDataRecord } from '../types';
import { JsonDocumentFile } from './json-document';
import { isPlainObject, isTimestamp, isUsableKey } from './validation';

export const PROTECTED_DATA_FILE = 'protected_data.json';

export interface ProtectedDataStore {
  load(): Promise<ProtectedDataCollection>;
  save(collection: ProtectedDataCollection): Promise<void>;
  find(username: string): Promise<ProtectedDataRecord | null>;
  appendNote(username: string, content: string): Promise<Note>;
  listNotes(username: string): Promise<Iterable<Note>>;
  appendFile(username: string, name: string): Promise<FileReference>;
  listFiles(username: string): Promise<Iterable<FileReference>>;
}

/** Iterable over a snapshot; every `for...of` starts again from the first item. */
export function restartable<T extends object>(items: readonly T[]): Iterable<T> {
  const snapshot = items.map(item => ({ ...item }));
  return {
    *[Symbol.iterator]() {
      for (const item of snapshot) {
        yield item;
      }
    }
  };
}

function parseNote(value: unknown, source: string, key: string): Note {
  if (!isPlainObject(value) || typeof value.content !== 'string' || !isTimestamp(value.createdAt)) {
    throw new StorageCorruptError(source, `entry "${key}" has a malformed note`);
  }
  return { content: value.content, createdAt: value.createdAt };
}

function parseFile(value: unknown, source: string, key: string): FileReference {
  if (!isPlainObject(value) || typeof value.name !== 'string' || !isTimestamp(value.addedAt)) {
    throw new StorageCorruptError(source, `entry "${key}" has a malformed file reference`);
  }
  return { name: value.name, addedAt: value.addedAt };
}

export function parseProtectedDataCollection(document: unknown, source: string): ProtectedDataCollection {
  if (document === null) {
    return {};
  }
  if (!isPlainObject(document)) {
    throw new StorageCorruptError(source, 'expected an object keyed by username');
  }

  const collection: ProtectedDataCollection = {};
  for (const [key, entry] of Object.entries(document)) {
    if (!isPlainObject(entry) || entry.username !== key || !isUsableKey(key)) {
      throw new StorageCorruptError(source, `entry "${key}" has a mismatched username`);
    }
    if (!Array.isArray(entry.notes) || !Array.isArray(entry.files)) {
      throw new StorageCorruptError(source, `entry "${key}" is missing notes or files`);
    }

    collection[key] = {
      username: key,
      notes: entry.notes.map((note: unknown) => parseNote(note, source, key)),
      files: entry.files.map((file: unknown) => parseFile(file, source, key))
    };
  }
  return collection;
}

export class JsonProtectedDataStore implements ProtectedDataStore {
  private readonly file: JsonDocumentFile;

  constructor(
    dataDir: string,
    private readonly clock: () => number = Date.now
  ) {
    this.file = new JsonDocumentFile(path.join(dataDir, PROTECTED_DATA_FILE));
  }

  get filePath(): string {
    return this.file.filePath;
  }

  async load(): Promise<ProtectedDataCollection> {
    return parseProtectedDataCollection(await this.file.read(), this.file.filePath);
  }

  async save(collection: ProtectedDataCollection): Promise<void> {
    await this.file.write(collection);
  }

  async find(username: string): Promise<ProtectedDataRecord | null> {
    const collection = await this.load();
    return Object.hasOwn(collection, username) ? collection[username] : null;
  }

  appendNote(username: string, content: string): Promise<Note> {
    const note: Note = { content, createdAt: this.timestamp() };
    return this.mutate(username, record => {
      record.notes.push(note);
      return { ...note };
    });
  }

  async listNotes(username: string): Promise<Iterable<Note>> {
    const record = await this.find(username);
    return restartable(record ? record.notes : []);
  }

  appendFile(username: string, name: string): Promise<FileReference> {
    const reference: FileReference = { name, addedAt: this.timestamp() };
    return this.mutate(username, record => {
      record.files.push(reference);
      return { ...reference };
    });
  }

  async listFiles(username: string): Promise<Iterable<FileReference>> {
    const record = await this.find(username);
    return restartable(record ? record.files : []);
  }

  private timestamp(): string {
    return new Date(this.clock()).toISOString();
  }

  // Records are created lazily on the first write for a username.
  private mutate<T>(username: string, change: (record: ProtectedDataRecord) => T): Promise<T> {
    return this.file.withLock(async () => {
      const collection = await this.load();
      const record: ProtectedDataRecord = Object.hasOwn(collection, username)
        ? collection[username]
        : { username, notes: [], files: [] };
      const result = change(record);
      collection[username] = record;
      await this.save(collection);
      return result;
    });
  }
}
