import { promises as fs } from 'fs';
import path from 'path';
import { StorageCorruptError, StorageWriteError, errorCode, errorMessage } from '../errors';

/**
 * A whole JSON document on disk. Reads return `null` when the file does not
 * exist; writes go to a sibling temp file first and are renamed into place.
 *
 * Each instance owns one lock: callers wrap every load-modify-save cycle in
 * `withLock` so concurrent mutations never interleave.
 */
export class JsonDocumentFile {
  private queue: Promise<unknown> = Promise.resolve();

  constructor(readonly filePath: string) {}

  async read(): Promise<unknown> {
    let text: string;
    try {
      text = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw new StorageCorruptError(this.filePath, 'file is not readable', error);
    }

    try {
      return JSON.parse(text);
    } catch (error) {
      throw new StorageCorruptError(this.filePath, 'invalid JSON', error);
    }
  }

  async write(document: unknown): Promise<void> {
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    let directoryReady = false;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      directoryReady = true;
      await fs.writeFile(tempPath, `${JSON.stringify(document, null, 4)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      if (directoryReady) {
        await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
          throw new StorageWriteError(
            this.filePath,
            new AggregateError([error, cleanupError], `${errorMessage(error)}; temp file left at ${tempPath}`)
          );
        });
      }
      throw new StorageWriteError(this.filePath, error);
    }
  }

  withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // the caller observes failures through `run`; the queue only orders work
    this.queue = run.catch(() => undefined);
    return run;
  }
}
