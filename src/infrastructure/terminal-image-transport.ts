import type { ImageTransport } from '../application/ports';
import type { ImageMode } from '../application/settings';
import type { ImageTier } from '../domain';

const KITTY_CHUNK_SIZE = 4096;
const ESC = '\u001b';
const BEL = '\u0007';

type TerminalEnv = Record<string, string | undefined>;

export class TerminalImageTransport implements ImageTransport {
  constructor(private readonly env: TerminalEnv = process.env) {}

  detectTier(mode: ImageMode): ImageTier {
    switch (mode) {
      case 'text':
      case 'external':
        return 'none';
      case 'inline':
      case 'auto':
        return detectBestTier(this.env);
    }
  }

  encodeInline(png: Uint8Array, tier: ImageTier): string | null {
    if (png.length === 0) {
      return null;
    }
    const payload = Buffer.from(png).toString('base64');
    switch (tier) {
      case 'kitty':
        return encodeKitty(payload);
      case 'iterm':
        return `${ESC}]1337;File=inline=1;size=${png.length};preserveAspectRatio=1:${payload}${BEL}`;
      case 'none':
        return null;
    }
  }
}

export function detectBestTier(env: TerminalEnv): ImageTier {
  const term = env.TERM ?? '';
  const program = env.TERM_PROGRAM ?? '';
  if (term.includes('kitty') || env.KITTY_WINDOW_ID || /^(ghostty|wezterm)$/i.test(program)) {
    return 'kitty';
  }
  if (program === 'iTerm.app' || env.LC_TERMINAL === 'iTerm2') {
    return 'iterm';
  }
  return 'none';
}

// Kitty graphics protocol: PNG payload, transmitted and displayed, split into
// chunks where every chunk but the last carries m=1.
function encodeKitty(payload: string): string {
  const chunks: string[] = [];
  for (let offset = 0; offset < payload.length; offset += KITTY_CHUNK_SIZE) {
    chunks.push(payload.slice(offset, offset + KITTY_CHUNK_SIZE));
  }
  return chunks
    .map((chunk, index) => {
      const more = index < chunks.length - 1 ? 1 : 0;
      const controls = index === 0 ? `a=T,f=100,q=2,m=${more}` : `m=${more}`;
      return `${ESC}_G${controls};${chunk}${ESC}\\`;
    })
    .join('');
}
