import clipboard from 'clipboardy';

import type { Clipboard } from '../application/ports';

export class SystemClipboard implements Clipboard {
  constructor(
    private readonly write: (text: string) => Promise<void> = (text) => clipboard.write(text)
  ) {}

  async copy(text: string): Promise<void> {
    await this.write(text);
  }
}
