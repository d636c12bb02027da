import { describe, expect, it } from 'vitest';

import { resetHyperlink, setHyperlink } from '../application/ansi-text';
import { wrapUrlsForView, ZoneRegistry } from './click-zones';

describe('click-zones (presentation)', () => {
  it('maps a wrapped URL fragment to its full link and locates it on screen', () => {
    const registry = new ZoneRegistry();
    const { frame, targets } = wrapUrlsForView(
      'See https://a.example/long-pa\nth here',
      [{ url: 'https://a.example/long-path', label: 'Long' }],
      { hyperlinks: false, registry }
    );

    expect(targets).toEqual(new Map([['url-0', 'https://a.example/long-path']]));
    expect(registry.scan(frame)).toBe('See https://a.example/long-pa\nth here');
    expect(registry.zoneAt(4, 0)).toBe('url-0');
    expect(registry.zoneAt(28, 0)).toBe('url-0');
    expect(registry.zoneAt(29, 0)).toBeNull();
    expect(registry.zoneAt(3, 0)).toBeNull();
    expect(registry.zoneAt(5, 1)).toBeNull();
  });

  it('wraps fragments in hyperlinks and ignores styling when measuring', () => {
    const registry = new ZoneRegistry();
    const { frame } = wrapUrlsForView('\u001b[4mhttps://b.example\u001b[0m', [], {
      hyperlinks: true,
      registry,
    });

    expect(registry.scan(frame)).toBe(
      `\u001b[4m${setHyperlink('https://b.example')}https://b.example${resetHyperlink()}\u001b[0m`
    );
    expect(registry.zoneAt(0, 0)).toBe('url-0');
    expect(registry.zoneAt(16, 0)).toBe('url-0');
    expect(registry.zoneAt(17, 0)).toBeNull();
  });

  it('replaces hyperlinks the renderer already emitted', () => {
    const registry = new ZoneRegistry();
    const rendered = `${setHyperlink('https://c.example')}https://c.example${resetHyperlink()}`;
    const { frame } = wrapUrlsForView(rendered, [], { hyperlinks: false, registry });
    expect(registry.scan(frame)).toBe('https://c.example');
  });

  it('numbers zones per frame', () => {
    const registry = new ZoneRegistry();
    const { targets } = wrapUrlsForView('https://x.example and https://y.example', [], {
      hyperlinks: false,
      registry,
    });
    expect([...targets.keys()]).toEqual(['url-0', 'url-1']);

    registry.reset();
    registry.scan('');
    expect(registry.zoneAt(0, 0)).toBeNull();
  });
});
