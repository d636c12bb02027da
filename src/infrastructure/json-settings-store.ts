import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';

import type { ViewerSettingsStore } from '../application/ports';
import { mergeViewerSettings, type ViewerSettings } from '../application/settings';

export const SETTINGS_PATH_ENV = 'REPORT_VIEWER_SETTINGS';

export function defaultSettingsPath(
  env: NodeJS.ProcessEnv = process.env,
  home: string = homedir()
): string {
  const override = env[SETTINGS_PATH_ENV]?.trim();
  if (override) {
    return override;
  }
  return join(home, '.config', 'report-viewer', 'settings.json');
}

export class JsonFileViewerSettingsStore implements ViewerSettingsStore {
  constructor(private readonly path: string = defaultSettingsPath()) {}

  async load(): Promise<ViewerSettings> {
    try {
      const raw = await readFile(this.path, 'utf8');
      if (!raw.trim()) {
        return mergeViewerSettings(undefined);
      }
      const parsed: unknown = JSON.parse(raw);
      return mergeViewerSettings(parsed);
    } catch {
      // Missing or unreadable settings fall back to defaults.
      return mergeViewerSettings(undefined);
    }
  }
}
