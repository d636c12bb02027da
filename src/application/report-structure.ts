import type { ActionKind, LinkEntry, ParsedHeading, ReportAction } from '../domain';

const HEADING_PATTERN = /^(#{1,6})\s+(.+)$/;
const CLOSING_HASHES_PATTERN = /\s+#+\s*$/;
const MARKDOWN_LINK_PATTERN = /(!?)\[([^\]]*)\]\((https?:\/\/[^\s)]+)\)/g;
const BARE_URL_PATTERN = /https?:\/\/[^\s<>()[\]"'`]+/g;
const TRAILING_URL_PUNCTUATION = /[.,;:!?]+$/;
const LINK_LABEL_MAX = 60;

const ACTION_MARKERS: ReadonlyArray<{ kind: ActionKind; marker: string }> = [
  { kind: 'draft', marker: '[draft]' },
  { kind: 'open', marker: '[open]' },
  { kind: 'configure', marker: '[configure]' },
  { kind: 'play', marker: '[play]' },
];

export function parseHeadings(markdown: string): ParsedHeading[] {
  const headings: ParsedHeading[] = [];
  const lines = splitLines(markdown);

  lines.forEach((line, index) => {
    const match = HEADING_PATTERN.exec(line);
    if (!match) {
      return;
    }
    const text = match[2].replace(CLOSING_HASHES_PATTERN, '').trim();
    if (!text) {
      return;
    }
    headings.push({ text, level: match[1].length, rawLine: index });
  });

  return headings;
}

export function parseActions(markdown: string): ReportAction[] {
  const actions: ReportAction[] = [];

  for (const line of splitLines(markdown)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }

    const lower = trimmed.toLowerCase();
    const found = ACTION_MARKERS.find(({ marker }) => lower.includes(marker));
    if (!found) {
      continue;
    }

    const markerEnd = lower.indexOf(found.marker) + found.marker.length;
    const { description, target } = splitActionTarget(trimmed.slice(markerEnd).trim());
    actions.push({ kind: found.kind, description, target });
  }

  return actions;
}

// Text before and after the first complete "( … )" segment forms the description.
export function splitActionTarget(remainder: string): { description: string; target: string } {
  const open = remainder.indexOf('(');
  if (open === -1) {
    return { description: remainder, target: '' };
  }
  const close = remainder.indexOf(')', open);
  if (close === -1) {
    return { description: remainder, target: '' };
  }

  return {
    description: `${remainder.slice(0, open)}${remainder.slice(close + 1)}`.trim(),
    target: remainder.slice(open + 1, close).trim(),
  };
}

export function parseLinks(markdown: string): LinkEntry[] {
  const links: LinkEntry[] = [];
  const seen = new Set<string>();
  const add = (url: string, label: string) => {
    if (seen.has(url)) {
      return;
    }
    seen.add(url);
    links.push({ url, label });
  };

  const lines = splitLines(markdown);
  for (const line of lines) {
    for (const match of line.matchAll(MARKDOWN_LINK_PATTERN)) {
      const [, bang, label, url] = match;
      if (bang || !label.trim()) {
        continue;
      }
      add(url, label.trim());
    }
  }

  for (const line of lines) {
    const withoutMarkdownLinks = line.replace(MARKDOWN_LINK_PATTERN, (full) => ' '.repeat(full.length));
    for (const match of withoutMarkdownLinks.matchAll(BARE_URL_PATTERN)) {
      const url = trimBareUrl(match[0]);
      if (!url) {
        continue;
      }
      add(url, synthesizeLinkLabel(line, url));
    }
  }

  return links;
}

export function synthesizeLinkLabel(line: string, url: string): string {
  const context = line
    .replace(url, ' ')
    .replace(/^\s*#{1,6}\s+/, '')
    .replace(/^\s*(?:[-*+]|\d+[.)])\s+/, '')
    .replace(/\[(?:draft|open|configure|play)\]/gi, ' ')
    .replace(/[*_`<>]/g, '')
    .replace(/\s+/g, ' ')
    .replace(/^[\s:(–—-]+|[\s:().,;–—-]+$/g, '')
    .trim();

  if (!context) {
    return url;
  }
  if (context.length <= LINK_LABEL_MAX) {
    return context;
  }
  return `${context.slice(0, LINK_LABEL_MAX - 1).trimEnd()}…`;
}

function trimBareUrl(candidate: string): string {
  const trimmed = candidate.replace(TRAILING_URL_PUNCTUATION, '');
  return /^https?:\/\/.+/.test(trimmed) ? trimmed : '';
}

function splitLines(markdown: string): string[] {
  if (!markdown) {
    return [];
  }
  return markdown.split(/\r?\n/);
}
