import { describe, expect, it } from 'vitest';

import { mapHeadingPositions } from './heading-positions';

describe('heading-positions', () => {
  it('maps headings to rendered lines and derives section ends', () => {
    const rendered = [
      '# Report',
      '',
      '## Alpha',
      'alpha body',
      '### Deep',
      'deep body',
      '## Beta',
      'beta body',
    ];
    const mapped = mapHeadingPositions(
      [
        { text: 'Report', level: 1, rawLine: 0 },
        { text: 'Alpha', level: 2, rawLine: 2 },
        { text: 'Deep', level: 3, rawLine: 5 },
        { text: 'Beta', level: 2, rawLine: 8 },
      ],
      rendered
    );

    expect(mapped.map((heading) => [heading.text, heading.renderedLine, heading.endLine])).toEqual([
      ['Report', 0, 8],
      ['Alpha', 2, 6],
      ['Deep', 4, 6],
      ['Beta', 6, 8],
    ]);
    expect(mapped.every((heading) => !heading.collapsed)).toBe(true);
  });

  it('never re-matches an earlier occurrence of repeated heading text', () => {
    const mapped = mapHeadingPositions(
      [
        { text: 'Summary', level: 2, rawLine: 0 },
        { text: 'Summary', level: 2, rawLine: 4 },
      ],
      ['## Summary', 'text', '## Summary']
    );
    expect(mapped.map((heading) => heading.renderedLine)).toEqual([0, 2]);
  });

  it('drops headings that cannot be located', () => {
    const mapped = mapHeadingPositions(
      [
        { text: 'Gone', level: 2, rawLine: 0 },
        { text: 'Kept', level: 2, rawLine: 2 },
      ],
      ['## Kept', 'body']
    );
    expect(mapped).toHaveLength(1);
    expect(mapped[0]).toMatchObject({ text: 'Kept', renderedLine: 0, endLine: 2 });
  });

  it('matches heading text through styling escapes', () => {
    const mapped = mapHeadingPositions(
      [{ text: 'Markets', level: 2, rawLine: 0 }],
      ['intro', '\u001b[1m## \u001b[35mMarkets\u001b[0m']
    );
    expect(mapped[0].renderedLine).toBe(1);
  });
});
