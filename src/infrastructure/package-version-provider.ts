import { readFile } from 'node:fs/promises';

import type { AppVersionProvider } from '../application/ports';

const PACKAGE_JSON_URL = new URL('../../package.json', import.meta.url);

export class PackageVersionProvider implements AppVersionProvider {
  constructor(private readonly packageJsonUrl: URL = PACKAGE_JSON_URL) {}

  async getAppVersion(): Promise<string> {
    try {
      const parsed: unknown = JSON.parse(await readFile(this.packageJsonUrl, 'utf8'));
      if (typeof parsed === 'object' && parsed !== null && 'version' in parsed) {
        return typeof parsed.version === 'string' ? parsed.version : 'unknown';
      }
      return 'unknown';
    } catch {
      return 'unknown';
    }
  }
}
