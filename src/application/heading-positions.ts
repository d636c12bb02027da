import type { ParsedHeading, SectionHeading } from '../domain';
import { stripAnsi } from './ansi-text';

/**
 * Locates each parsed heading in the rendered output. The search cursor only
 * moves forward, so repeated heading text maps to successive occurrences.
 * Headings whose text cannot be found are dropped.
 */
export function mapHeadingPositions(
  headings: ParsedHeading[],
  renderedLines: string[]
): SectionHeading[] {
  const plainLines = renderedLines.map((line) => stripAnsi(line));
  const mapped: SectionHeading[] = [];
  let searchFrom = 0;

  for (const heading of headings) {
    for (let index = searchFrom; index < plainLines.length; index += 1) {
      if (!plainLines[index].includes(heading.text)) {
        continue;
      }
      mapped.push({
        ...heading,
        renderedLine: index,
        visibleLine: index,
        endLine: renderedLines.length,
        collapsed: false,
      });
      searchFrom = index + 1;
      break;
    }
  }

  computeEndLines(mapped, renderedLines.length);
  return mapped;
}

export function computeEndLines(headings: SectionHeading[], totalLines: number): void {
  headings.forEach((heading, index) => {
    heading.endLine = totalLines;
    for (let next = index + 1; next < headings.length; next += 1) {
      if (headings[next].level <= heading.level) {
        heading.endLine = headings[next].renderedLine;
        break;
      }
    }
  });
}
