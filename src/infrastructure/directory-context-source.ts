import { readdir, readFile, stat } from 'node:fs/promises';
import { join, resolve } from 'node:path';

import type { ContextSource } from '../application/ports';

interface ContextEntry {
  name: string;
  modifiedAt: Date;
  content: string;
}

interface DirectoryContextSourceOptions {
  directory: string;
  exclude?: string[];
}

// Newest first. Stops before the first file that would exceed the budget.
export class DirectoryContextSource implements ContextSource {
  private readonly excluded: Set<string>;

  constructor(private readonly options: DirectoryContextSourceOptions) {
    this.excluded = new Set((options.exclude ?? []).map((path) => resolve(path)));
  }

  async gatherContext(maxUnits: number): Promise<string> {
    const entries = await this.readEntries();
    entries.sort((left, right) => right.modifiedAt.getTime() - left.modifiedAt.getTime());

    let context = '';
    for (const entry of entries) {
      const chunk = `## ${entry.name} (${formatTimestamp(entry.modifiedAt)})\n${entry.content}\n\n`;
      if (context.length + chunk.length > maxUnits) {
        break;
      }
      context += chunk;
    }
    return context;
  }

  private async readEntries(): Promise<ContextEntry[]> {
    let names: string[];
    try {
      const dirents = await readdir(this.options.directory, { withFileTypes: true });
      names = dirents
        .filter((dirent) => dirent.isFile() && dirent.name.endsWith('.md'))
        .map((dirent) => dirent.name);
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }

    const entries: ContextEntry[] = [];
    for (const name of names) {
      const path = join(this.options.directory, name);
      if (this.excluded.has(resolve(path))) {
        continue;
      }
      const [content, stats] = await Promise.all([readFile(path, 'utf8'), stat(path)]);
      entries.push({
        name: name.replace(/\.md$/, ''),
        modifiedAt: stats.mtime,
        content: content.trim(),
      });
    }
    return entries;
  }
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
