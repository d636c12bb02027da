import { describe, expect, it } from 'vitest';

import { isQuitKey, resolveKeyboardShortcutIntent } from './keyboard-shortcuts';
import type { KeyEvent } from './terminal-input';

const key = (name: string, modifiers: Partial<KeyEvent> = {}): KeyEvent => ({
  type: 'key',
  name,
  ctrl: false,
  shift: false,
  sequence: name,
  ...modifiers,
});

describe('keyboard-shortcuts (presentation)', () => {
  it('maps section navigation and collapse keys', () => {
    expect(resolveKeyboardShortcutIntent(key('n'))).toEqual({ type: 'next-section' });
    expect(resolveKeyboardShortcutIntent(key('n', { shift: true }))).toEqual({
      type: 'previous-section',
    });
    expect(resolveKeyboardShortcutIntent(key('return'))).toEqual({ type: 'toggle-section' });
    expect(resolveKeyboardShortcutIntent(key('tab'))).toEqual({ type: 'toggle-section' });
    expect(resolveKeyboardShortcutIntent(key('c'))).toEqual({ type: 'collapse-all' });
    expect(resolveKeyboardShortcutIntent(key('e'))).toEqual({ type: 'expand-all' });
  });

  it('maps overlays and quick actions', () => {
    expect(resolveKeyboardShortcutIntent(key('a'))).toEqual({ type: 'show-actions' });
    expect(resolveKeyboardShortcutIntent(key('l'))).toEqual({ type: 'show-links' });
    expect(resolveKeyboardShortcutIntent(key('d'))).toEqual({ type: 'quick-draft' });
    expect(resolveKeyboardShortcutIntent(key('o'))).toEqual({ type: 'quick-open' });
    expect(resolveKeyboardShortcutIntent(key('p'))).toEqual({ type: 'quick-play' });
    expect(resolveKeyboardShortcutIntent(key('i'))).toEqual({ type: 'open-chart' });
    expect(resolveKeyboardShortcutIntent(key('m'))).toEqual({ type: 'mail-draft' });
  });

  it('maps scrolling keys', () => {
    expect(resolveKeyboardShortcutIntent(key('j'))).toEqual({ type: 'line-down' });
    expect(resolveKeyboardShortcutIntent(key('up'))).toEqual({ type: 'line-up' });
    expect(resolveKeyboardShortcutIntent(key('space'))).toEqual({ type: 'page-down' });
    expect(resolveKeyboardShortcutIntent(key('b'))).toEqual({ type: 'page-up' });
    expect(resolveKeyboardShortcutIntent(key('g'))).toEqual({ type: 'scroll-top' });
    expect(resolveKeyboardShortcutIntent(key('g', { shift: true }))).toEqual({
      type: 'scroll-bottom',
    });
    expect(resolveKeyboardShortcutIntent(key('end'))).toEqual({ type: 'scroll-bottom' });
  });

  it('maps quit keys and ignores other control chords', () => {
    expect(resolveKeyboardShortcutIntent(key('q'))).toEqual({ type: 'quit' });
    expect(resolveKeyboardShortcutIntent(key('escape'))).toEqual({ type: 'quit' });
    expect(resolveKeyboardShortcutIntent(key('c', { ctrl: true }))).toEqual({ type: 'quit' });
    expect(resolveKeyboardShortcutIntent(key('d', { ctrl: true }))).toEqual({ type: 'none' });
    expect(resolveKeyboardShortcutIntent(key('x'))).toEqual({ type: 'none' });
  });

  it('recognizes the keys accepted while busy', () => {
    expect(isQuitKey(key('q'))).toBe(true);
    expect(isQuitKey(key('c', { ctrl: true }))).toBe(true);
    expect(isQuitKey(key('escape'))).toBe(false);
  });
});
