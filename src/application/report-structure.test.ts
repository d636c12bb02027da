import { describe, expect, it } from 'vitest';

import {
  parseActions,
  parseHeadings,
  parseLinks,
  splitActionTarget,
  synthesizeLinkLabel,
} from './report-structure';

describe('report-structure', () => {
  it('returns empty lists for empty input', () => {
    expect(parseHeadings('')).toEqual([]);
    expect(parseActions('')).toEqual([]);
    expect(parseLinks('')).toEqual([]);
  });

  it('extracts headings in document order with levels and raw lines', () => {
    const markdown = '# Report\n\nIntro\n## Markets ##\n### Detail\n#NoSpace\n####### seven';
    expect(parseHeadings(markdown)).toEqual([
      { text: 'Report', level: 1, rawLine: 0 },
      { text: 'Markets', level: 2, rawLine: 3 },
      { text: 'Detail', level: 3, rawLine: 4 },
    ]);
  });

  it('parses action markers case-insensitively and keeps their order', () => {
    const actions = parseActions('[DRAFT] x\n[draft] y\n[Draft] z');
    expect(actions).toEqual([
      { kind: 'draft', description: 'x', target: '' },
      { kind: 'draft', description: 'y', target: '' },
      { kind: 'draft', description: 'z', target: '' },
    ]);
  });

  it('extracts a trailing parenthesized target', () => {
    expect(parseActions('[Open] View filing (https://sec.gov/filing/123)')).toEqual([
      { kind: 'open', description: 'View filing', target: 'https://sec.gov/filing/123' },
    ]);
    expect(parseActions('- [Play] Briefing audio (/tmp/briefing.mp3)')).toEqual([
      { kind: 'play', description: 'Briefing audio', target: '/tmp/briefing.mp3' },
    ]);
  });

  it('keeps the whole remainder as description without a complete parenthesis', () => {
    expect(parseActions('- [Configure] Enable alerts for AAPL')).toEqual([
      { kind: 'configure', description: 'Enable alerts for AAPL', target: '' },
    ]);
    expect(parseActions('[Draft] Reply to Sam (about the contract')).toEqual([
      { kind: 'draft', description: 'Reply to Sam (about the contract', target: '' },
    ]);
  });

  it('ignores lines without a known marker', () => {
    expect(parseActions('[Note] nothing to do\nplain text\n[open source] project')).toEqual([]);
  });

  it('joins text around the target segment', () => {
    expect(splitActionTarget('Email Dana (dana@example.com) about Q3')).toEqual({
      description: 'Email Dana about Q3',
      target: 'dana@example.com',
    });
  });

  it('collects markdown links first, then bare URLs, deduplicated by URL', () => {
    const markdown = [
      'See [SEC filing](https://sec.gov/filing/123) for detail.',
      'Also https://example.com/news.',
      '- Source: https://sec.gov/filing/123',
      '![chart](https://img.example.com/c.png)',
    ].join('\n');

    expect(parseLinks(markdown)).toEqual([
      { url: 'https://sec.gov/filing/123', label: 'SEC filing' },
      { url: 'https://example.com/news', label: 'Also' },
    ]);
  });

  it('yields one entry for a URL repeated on different lines', () => {
    const links = parseLinks('https://example.com/a\nagain https://example.com/a');
    expect(links).toEqual([{ url: 'https://example.com/a', label: 'https://example.com/a' }]);
  });

  it('truncates long synthesized labels with an ellipsis', () => {
    const line =
      'This is a rather long sentence describing the linked article in more detail than needed https://a.example/x';
    expect(synthesizeLinkLabel(line, 'https://a.example/x')).toBe(
      'This is a rather long sentence describing the linked articl…'
    );
  });

  it('drops action markers from synthesized labels', () => {
    expect(parseLinks('- [Open] Filing (https://sec.example/f/1)')).toEqual([
      { url: 'https://sec.example/f/1', label: 'Filing' },
    ]);
  });

  it('strips list markers and parentheses around bare URLs', () => {
    expect(synthesizeLinkLabel('- (see https://example.com/path)', 'https://example.com/path')).toBe(
      'see'
    );
  });
});
