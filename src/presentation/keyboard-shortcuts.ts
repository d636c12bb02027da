import type { KeyEvent } from './terminal-input';
import type { ViewerAction } from './viewer-actions';

export type KeyboardShortcutIntent = { type: 'none' } | { type: ViewerAction };

const NAMED_KEYS: Record<string, ViewerAction> = {
  return: 'toggle-section',
  down: 'line-down',
  up: 'line-up',
  space: 'page-down',
  pagedown: 'page-down',
  pageup: 'page-up',
  home: 'scroll-top',
  end: 'scroll-bottom',
  escape: 'quit',
};

const LETTER_KEYS: Record<string, ViewerAction> = {
  n: 'next-section',
  c: 'collapse-all',
  e: 'expand-all',
  a: 'show-actions',
  l: 'show-links',
  d: 'quick-draft',
  o: 'quick-open',
  p: 'quick-play',
  i: 'open-chart',
  m: 'mail-draft',
  j: 'line-down',
  k: 'line-up',
  f: 'page-down',
  b: 'page-up',
  g: 'scroll-top',
  q: 'quit',
};

const SHIFTED_LETTER_KEYS: Record<string, ViewerAction> = {
  n: 'previous-section',
  g: 'scroll-bottom',
};

export function resolveKeyboardShortcutIntent(key: KeyEvent): KeyboardShortcutIntent {
  if (key.ctrl) {
    return key.name === 'c' ? { type: 'quit' } : { type: 'none' };
  }

  if (key.name === 'tab') {
    // Shift+Tab arrives as a distinct sequence and is left unbound.
    return key.shift ? { type: 'none' } : { type: 'toggle-section' };
  }
  const named = NAMED_KEYS[key.name];
  if (named) {
    return { type: named };
  }

  const table = key.shift ? SHIFTED_LETTER_KEYS : LETTER_KEYS;
  const action = table[key.name];
  return action ? { type: action } : { type: 'none' };
}

export function isQuitKey(key: KeyEvent): boolean {
  return (key.ctrl && key.name === 'c') || (!key.ctrl && !key.shift && key.name === 'q');
}
