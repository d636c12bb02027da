import { describe, expect, it } from 'vitest';

import { detectBestTier, TerminalImageTransport } from './terminal-image-transport';

describe('terminal-image-transport', () => {
  it('never sends images in text or external mode', () => {
    const transport = new TerminalImageTransport({ TERM: 'xterm-kitty' });
    expect(transport.detectTier('text')).toBe('none');
    expect(transport.detectTier('external')).toBe('none');
    expect(transport.detectTier('auto')).toBe('kitty');
    expect(transport.detectTier('inline')).toBe('kitty');
  });

  it('detects the terminal protocol from the environment', () => {
    expect(detectBestTier({ KITTY_WINDOW_ID: '1' })).toBe('kitty');
    expect(detectBestTier({ TERM_PROGRAM: 'WezTerm' })).toBe('kitty');
    expect(detectBestTier({ TERM_PROGRAM: 'iTerm.app' })).toBe('iterm');
    expect(detectBestTier({ LC_TERMINAL: 'iTerm2' })).toBe('iterm');
    expect(detectBestTier({ TERM: 'xterm-256color' })).toBe('none');
  });

  it('encodes an iTerm inline image', () => {
    const transport = new TerminalImageTransport({});
    expect(transport.encodeInline(new Uint8Array([1, 2, 3]), 'iterm')).toBe(
      '\u001b]1337;File=inline=1;size=3;preserveAspectRatio=1:AQID\u0007'
    );
  });

  it('splits kitty payloads into chunks', () => {
    const transport = new TerminalImageTransport({});
    expect(transport.encodeInline(new Uint8Array([1, 2, 3]), 'kitty')).toBe(
      '\u001b_Ga=T,f=100,q=2,m=0;AQID\u001b\\'
    );

    const large = transport.encodeInline(new Uint8Array(4000), 'kitty') ?? '';
    const chunks = large.split('\u001b\\').filter(Boolean);
    expect(chunks).toHaveLength(2);
    expect(chunks[0].startsWith('\u001b_Ga=T,f=100,q=2,m=1;')).toBe(true);
    expect(chunks[1].startsWith('\u001b_Gm=0;')).toBe(true);
  });

  it('returns null without a tier or data', () => {
    const transport = new TerminalImageTransport({});
    expect(transport.encodeInline(new Uint8Array([1]), 'none')).toBeNull();
    expect(transport.encodeInline(new Uint8Array(0), 'kitty')).toBeNull();
  });
});
