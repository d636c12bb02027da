import { mkdtemp, rm, utimes, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DirectoryContextSource } from './directory-context-source';

describe('directory-context-source', () => {
  let directory = '';

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'report-viewer-context-'));
    await writeFile(join(directory, 'older.md'), 'Older notes\n');
    await writeFile(join(directory, 'newer.md'), 'Newer notes');
    await writeFile(join(directory, 'current.md'), '# Current');
    await writeFile(join(directory, 'data.csv'), 'a,b');
    const older = new Date('2026-01-02T09:30:00Z');
    const newer = new Date('2026-03-04T18:05:00Z');
    await utimes(join(directory, 'older.md'), older, older);
    await utimes(join(directory, 'newer.md'), newer, newer);
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it('joins markdown files newest first and skips excluded files', async () => {
    const source = new DirectoryContextSource({
      directory,
      exclude: [join(directory, 'current.md')],
    });

    await expect(source.gatherContext(10_000)).resolves.toBe(
      '## newer (2026-03-04 18:05)\nNewer notes\n\n## older (2026-01-02 09:30)\nOlder notes\n\n'
    );
  });

  it('stops before a section that would exceed the budget', async () => {
    const source = new DirectoryContextSource({
      directory,
      exclude: [join(directory, 'current.md')],
    });
    const first = '## newer (2026-03-04 18:05)\nNewer notes\n\n';

    await expect(source.gatherContext(first.length)).resolves.toBe(first);
    await expect(source.gatherContext(first.length - 1)).resolves.toBe('');
  });

  it('returns no context when the directory is missing', async () => {
    const source = new DirectoryContextSource({ directory: join(directory, 'missing') });
    await expect(source.gatherContext(1_000)).resolves.toBe('');
  });
});
