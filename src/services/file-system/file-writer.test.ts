import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { chmod, mkdtemp, readFile, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { tempPathFor, writeFileAtomic } from './file-writer';

describe('writeFileAtomic', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tmx-atomic-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('creates a new file and leaves no temporary file behind', async () => {
    const target = join(dir, 'memory.tmx');

    await writeFileAtomic(target, 'new content');

    expect(await readFile(target, 'utf8')).toBe('new content');
    expect(await readdir(dir)).toEqual(['memory.tmx']);
  });

  it('replaces an existing file and keeps its permissions', async () => {
    const target = join(dir, 'memory.tmx');
    await writeFile(target, 'old');
    await chmod(target, 0o600);

    await writeFileAtomic(target, Buffer.from('replaced'));

    expect(await readFile(target, 'utf8')).toBe('replaced');
    expect((await stat(target)).mode & 0o777).toBe(0o600);
  });

  it('refuses to reuse an existing temporary file', async () => {
    const target = join(dir, 'memory.tmx');
    await writeFile(target, 'old');
    await writeFile(tempPathFor(target, 'fixed'), 'someone else');

    await expect(writeFileAtomic(target, 'new', { token: 'fixed' })).rejects.toMatchObject({
      name: 'WriteError',
      kind: 'temp-collision',
    });
    expect(await readFile(target, 'utf8')).toBe('old');
    expect(await readFile(tempPathFor(target, 'fixed'), 'utf8')).toBe('someone else');
  });

  it('reports an io failure when the directory is missing', async () => {
    await expect(writeFileAtomic(join(dir, 'nowhere', 'memory.tmx'), 'data')).rejects.toMatchObject({
      name: 'WriteError',
      kind: 'io',
    });
  });

  it('places the temporary file beside the target', () => {
    expect(tempPathFor('/data/memories/a.tmx', 'abc')).toBe('/data/memories/.a.tmx.abc.tmp');
  });
});
