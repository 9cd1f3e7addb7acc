import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, utimes, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { listPending, compareWorkItems } from './scanner.js';

const OPTIONS = { extension: '.md' };

describe('listPending', () => {
  let queueDir: string;

  beforeEach(async () => {
    queueDir = await mkdtemp(join(tmpdir(), 'scanner-test-'));
  });

  afterEach(async () => {
    await rm(queueDir, { recursive: true, force: true });
  });

  async function addFile(name: string, mtimeSeconds: number): Promise<void> {
    const path = join(queueDir, name);
    await writeFile(path, `# ${name}\n`, 'utf-8');
    await utimes(path, mtimeSeconds, mtimeSeconds);
  }

  it('orders items oldest first regardless of creation order', async () => {
    await addFile('c.md', 1_700_000_300);
    await addFile('a.md', 1_700_000_100);
    await addFile('b.md', 1_700_000_200);

    const items = await listPending(queueDir, new Set(), OPTIONS);
    expect(items.map((i) => i.name)).toEqual(['a.md', 'b.md', 'c.md']);
    expect(items[0]?.path).toBe(join(queueDir, 'a.md'));
    expect(items[0]?.modifiedAt).toBe(1_700_000_100_000);
  });

  it('breaks modification time ties by name', async () => {
    await addFile('zeta.md', 1_700_000_000);
    await addFile('alpha.md', 1_700_000_000);

    const items = await listPending(queueDir, new Set(), OPTIONS);
    expect(items.map((i) => i.name)).toEqual(['alpha.md', 'zeta.md']);
  });

  it('excludes completed names', async () => {
    await addFile('a.md', 1_700_000_100);
    await addFile('b.md', 1_700_000_200);

    const items = await listPending(queueDir, new Set(['a.md']), OPTIONS);
    expect(items.map((i) => i.name)).toEqual(['b.md']);
  });

  it('excludes subdirectories, hidden files and other extensions', async () => {
    await addFile('keep.md', 1_700_000_100);
    await addFile('notes.txt', 1_700_000_100);
    await addFile('.draft.md', 1_700_000_100);
    await mkdir(join(queueDir, 'failed.md'));
    await mkdir(join(queueDir, 'failed'));
    await writeFile(join(queueDir, 'failed', 'old.md'), 'x', 'utf-8');

    const items = await listPending(queueDir, new Set(), OPTIONS);
    expect(items.map((i) => i.name)).toEqual(['keep.md']);
  });

  it('returns an empty list for a missing directory', async () => {
    expect(await listPending(join(queueDir, 'absent'), new Set(), OPTIONS)).toEqual([]);
  });
});

describe('compareWorkItems', () => {
  it('sorts by time before name', () => {
    const early = { name: 'z.md', path: '/q/z.md', modifiedAt: 1 };
    const late = { name: 'a.md', path: '/q/a.md', modifiedAt: 2 };
    expect([late, early].sort(compareWorkItems)).toEqual([early, late]);
  });
});
