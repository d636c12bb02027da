import type { LinkEntry } from '../domain';

// Stops before whitespace, escape sequences and closing brackets.
export const URL_FRAGMENT_PATTERN = /https?:\/\/[^\s\u001b)\]>]+/g;

/**
 * Maps a visible URL fragment (possibly cut short by word wrapping) to the
 * longest known URL it is a prefix of. Equal lengths keep the earlier link.
 * Unknown fragments are returned unchanged.
 */
export function resolveFullUrl(fragment: string, links: readonly LinkEntry[]): string {
  let best = fragment;
  for (const link of links) {
    if (link.url.startsWith(fragment) && link.url.length > best.length) {
      best = link.url;
    }
  }
  return best;
}
