import { mkdir, readFile, unlink } from 'node:fs/promises';
import { join } from 'node:path';
import type { StateStorage } from 'zustand/middleware';
import { errorCode, writeFileAtomic } from './file-writer';

export interface FlushableStorage extends StateStorage {
  /** Resolves once every write queued so far has settled */
  flush: () => Promise<void>;
}

/**
 * Key-value storage backed by one JSON file per key in `directory`.
 * Writes are queued so they land in call order; failures are logged and the
 * in-memory settings stay as they are.
 */
export function createFileStorage(directory: string): FlushableStorage {
  let queue: Promise<void> = Promise.resolve();
  const pathFor = (name: string) => join(directory, `${name}.json`);

  const enqueue = (label: string, task: () => Promise<void>): Promise<void> => {
    queue = queue.then(task).catch((err: unknown) => {
      console.error(`[tmx] Failed to ${label} settings:`, err);
    });
    return queue;
  };

  return {
    getItem: async (name) => {
      await queue;
      try {
        return await readFile(pathFor(name), 'utf8');
      } catch (err) {
        if (errorCode(err) === 'ENOENT') return null;
        throw err;
      }
    },
    setItem: (name, value) =>
      enqueue('save', async () => {
        await mkdir(directory, { recursive: true });
        await writeFileAtomic(pathFor(name), value);
      }),
    removeItem: (name) =>
      enqueue('remove', async () => {
        try {
          await unlink(pathFor(name));
        } catch (err) {
          if (errorCode(err) !== 'ENOENT') throw err;
        }
      }),
    flush: () => queue,
  };
}

/** Storage that lives only as long as the process */
export function createMemoryStorage(): FlushableStorage {
  const items = new Map<string, string>();
  return {
    getItem: (name) => items.get(name) ?? null,
    setItem: (name, value) => {
      items.set(name, value);
    },
    removeItem: (name) => {
      items.delete(name);
    },
    flush: async () => {},
  };
}
