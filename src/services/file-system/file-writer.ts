import { open, rename, stat, unlink } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { WriteError } from '../../types/errors';
import { shortToken } from '../../utils/id-generator';

export interface AtomicWriteOptions {
  /** Distinguishes the temporary file; random unless given */
  token?: string;
}

/** Error code of a failed fs call, if any */
export function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

/** Temporary file used while replacing `filePath`; always in the same directory */
export function tempPathFor(filePath: string, token: string): string {
  return join(dirname(filePath), `.${basename(filePath)}.${token}.tmp`);
}

async function existingMode(filePath: string): Promise<number | null> {
  try {
    return (await stat(filePath)).mode & 0o777;
  } catch (err) {
    if (errorCode(err) === 'ENOENT') return null;
    throw new WriteError('io', `Cannot inspect ${filePath}`, err);
  }
}

async function removeTemp(tempPath: string): Promise<void> {
  try {
    await unlink(tempPath);
  } catch (err) {
    console.warn('[tmx] Could not remove temporary file', tempPath, err);
  }
}

/**
 * Write a file by creating a temporary sibling, syncing it and renaming it
 * over the target. The target is never truncated: it either keeps its old
 * content or gets the complete new content.
 */
export async function writeFileAtomic(
  filePath: string,
  data: string | Uint8Array,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const mode = await existingMode(filePath);
  const tempPath = tempPathFor(filePath, options.token ?? shortToken());

  let handle: FileHandle;
  try {
    handle = await open(tempPath, 'wx');
  } catch (err) {
    if (errorCode(err) === 'EEXIST') {
      throw new WriteError('temp-collision', `Temporary file ${tempPath} already exists`, err);
    }
    throw new WriteError('io', `Cannot create ${tempPath}`, err);
  }

  try {
    try {
      await handle.writeFile(data);
      if (mode !== null) await handle.chmod(mode);
      await handle.sync();
    } finally {
      await handle.close();
    }
    await rename(tempPath, filePath);
  } catch (err) {
    await removeTemp(tempPath);
    throw new WriteError('io', `Cannot write ${filePath}`, err);
  }
}
