import { mkdir, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { DiagnosticsReportWriter } from '../application/ports';

export class FileDiagnosticsReportWriter implements DiagnosticsReportWriter {
  constructor(private readonly directory: string = tmpdir()) {}

  async saveReport(fileName: string, content: string): Promise<string> {
    await mkdir(this.directory, { recursive: true });
    const path = join(this.directory, fileName);
    await writeFile(path, content, 'utf8');
    return path;
  }
}
