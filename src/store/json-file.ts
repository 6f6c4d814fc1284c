import { join } from 'node:path';
import { readFile, writeFile } from 'node:fs/promises';
import { ensureAlertctlDir } from '../config/index.js';
import { KeyedLock } from '../concurrency/index.js';
import { UpstreamUnavailableError } from '../errors.js';

// Shared across instances so two stores over the same file still serialize.
const fileLocks = new KeyedLock();

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

/**
 * A JSON document on disk with serialized read-modify-write. Reads outside
 * update() see the last completed write.
 */
export class JsonFile<T> {
  private filePath: string | undefined;

  constructor(
    private readonly fileName: string,
    private readonly parse: (raw: unknown) => T,
    private readonly empty: () => T,
    private readonly dir?: string,
  ) {}

  private async getFilePath(): Promise<string> {
    if (!this.filePath) {
      const dir = this.dir ?? (await ensureAlertctlDir());
      this.filePath = join(dir, this.fileName);
    }
    return this.filePath;
  }

  async read(): Promise<T> {
    const path = await this.getFilePath();
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (isMissing(err)) return this.empty();
      throw new UpstreamUnavailableError(`Store file ${this.fileName}`, err);
    }
    try {
      return this.parse(JSON.parse(raw));
    } catch (err) {
      throw new UpstreamUnavailableError(`Store file ${this.fileName} (unreadable contents)`, err);
    }
  }

  /**
   * Run `fn` on the current contents under the file lock. When `fn` returns
   * `next`, it replaces the file. Errors thrown by `fn` propagate unchanged
   * and nothing is written.
   */
  async update<R>(fn: (current: T) => Promise<{ next?: T; result: R }> | { next?: T; result: R }): Promise<R> {
    const path = await this.getFilePath();
    return fileLocks.runExclusive(path, async () => {
      const current = await this.read();
      const { next, result } = await fn(current);
      if (next !== undefined) {
        try {
          await writeFile(path, JSON.stringify(next, null, 2) + '\n', 'utf-8');
        } catch (err) {
          throw new UpstreamUnavailableError(`Store file ${this.fileName}`, err);
        }
      }
      return result;
    });
  }
}
