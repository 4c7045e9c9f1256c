import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import {
  DirectoryContentProvider,
  InMemoryContentProvider,
  Revision,
} from '@/core/content/file-content-provider';
import { FileNotFoundException } from '@/core/exceptions';

describe('InMemoryContentProvider', () => {
  const provider = new InMemoryContentProvider(
    new Map([['a.ts', 'old\n']]),
    new Map([['a.ts', 'new\n']])
  );

  test('returns the content of the requested revision', async () => {
    expect(await provider.getContent('a.ts', Revision.OLD)).toBe('old\n');
    expect(await provider.getContent('a.ts', Revision.NEW)).toBe('new\n');
  });

  test('fails for a path it does not hold', async () => {
    await expect(provider.getContent('b.ts', Revision.NEW)).rejects.toThrow(
      new FileNotFoundException('b.ts', Revision.NEW)
    );
  });
});

describe('DirectoryContentProvider', () => {
  let tmp: string;
  let provider: DirectoryContentProvider;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), 'effdiff-content-'));
    await fs.outputFile(path.join(tmp, 'old', 'src', 'a.ts'), 'before\n');
    await fs.outputFile(path.join(tmp, 'new', 'src', 'a.ts'), 'after\n');
    await fs.outputFile(path.join(tmp, 'secret.txt'), 'outside\n');
    provider = new DirectoryContentProvider(path.join(tmp, 'old'), path.join(tmp, 'new'));
  });

  afterEach(async () => {
    await fs.remove(tmp);
  });

  test('reads each revision from its own checkout', async () => {
    expect(await provider.getContent('src/a.ts', Revision.OLD)).toBe('before\n');
    expect(await provider.getContent('src/a.ts', Revision.NEW)).toBe('after\n');
  });

  test('fails for a missing file', async () => {
    await expect(provider.getContent('src/b.ts', Revision.OLD)).rejects.toThrow(
      "no old content for 'src/b.ts'"
    );
  });

  test('refuses paths that leave the checkout', async () => {
    await expect(provider.getContent('../secret.txt', Revision.NEW)).rejects.toThrow(
      FileNotFoundException
    );
  });
});
