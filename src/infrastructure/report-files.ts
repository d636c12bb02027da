import { readdir, readFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';

import type { ChartFileLocator, ReportFileReader } from '../application/ports';

export function chartsDirectoryFor(reportPath: string): string {
  return join(dirname(reportPath), 'charts');
}

export class FsReportFileReader implements ReportFileReader {
  async readReport(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }
}

export class ChartDirectoryLocator implements ChartFileLocator {
  constructor(private readonly chartsDirectory: string) {}

  async firstChartFile(): Promise<string | null> {
    let names: string[];
    try {
      const entries = await readdir(this.chartsDirectory, { withFileTypes: true });
      names = entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
    } catch {
      return null;
    }

    const first = names.filter((name) => name.toLowerCase().endsWith('.png')).sort()[0];
    return first === undefined ? null : join(this.chartsDirectory, first);
  }
}
