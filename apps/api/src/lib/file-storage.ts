import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';

export interface FileStorage {
  /** Persist `content` under `key` and return the stored path. */
  save(key: string, content: Buffer, contentType: string): Promise<string>;
  /** Remove a file by the path `save` returned. Missing files are ignored. */
  delete(storedPath: string): Promise<void>;
}

/**
 * Local-disk storage rooted at `directory`. Keys are relative; anything that
 * would resolve outside the root is refused.
 */
export function createLocalFileStorage(directory: string): FileStorage {
  const root = path.resolve(directory);

  function inside(target: string, label: string): string {
    if (target !== root && !target.startsWith(root + path.sep)) {
      throw new Error(`Storage path escapes upload directory: ${label}`);
    }
    return target;
  }

  return {
    async save(key, content) {
      const target = inside(path.resolve(root, key), key);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, content);
      return target;
    },

    async delete(storedPath) {
      await rm(inside(path.resolve(root, storedPath), storedPath), { force: true });
    },
  };
}
