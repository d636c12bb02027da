import open from 'open';

import { buildMailtoUri } from '../application/draft';
import type { Handoff } from '../application/ports';
import type { HandoffApps } from '../application/settings';

export type Launcher = (target: string, app: string | null) => Promise<void>;

const SYSTEM_DEFAULT_APP = 'default';

export const launchWithOpen: Launcher = async (target, app) => {
  await open(target, app ? { app: { name: app } } : {});
};

export class SystemHandoff implements Handoff {
  constructor(
    private readonly apps: HandoffApps,
    private readonly launch: Launcher = launchWithOpen
  ) {}

  openUrl(url: string): Promise<void> {
    return this.launchWith(this.apps.browser, url);
  }

  openFile(path: string): Promise<void> {
    return this.launchWith(this.apps.editor, path);
  }

  openMailto(to: string, subject: string, body: string): Promise<void> {
    return this.launchWith(this.apps.email, buildMailtoUri(to, subject, body));
  }

  playMedia(path: string): Promise<void> {
    return this.launchWith(this.apps.media, path);
  }

  private async launchWith(app: string, target: string): Promise<void> {
    const appName = app === SYSTEM_DEFAULT_APP ? null : app;
    try {
      await this.launch(target, appName);
    } catch (error) {
      throw new Error(`opening ${target} with ${appName ?? 'system default'} failed`, {
        cause: error,
      });
    }
  }
}
