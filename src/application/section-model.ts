import type { SectionHeading } from '../domain';
import { insertAfterAnsiPrefix } from './ansi-text';

export const EXPANDED_INDICATOR = '▼ ';
export const COLLAPSED_INDICATOR = '▸ ';

export interface HeadingStop {
  index: number;
  line: number;
}

interface LineRange {
  start: number;
  end: number;
}

export class SectionModel {
  private readonly fullLines: readonly string[];
  private readonly headings: SectionHeading[];
  private readonly hidden = new Set<number>();
  private visible: string[] = [];

  constructor(fullLines: readonly string[], headings: SectionHeading[]) {
    this.fullLines = fullLines;
    this.headings = headings.map((heading) => ({ ...heading }));
    this.rebuild();
  }

  get sections(): readonly SectionHeading[] {
    return this.headings;
  }

  visibleLines(): readonly string[] {
    return this.visible;
  }

  visibleContent(): string {
    return this.visible.join('\n');
  }

  isCollapsible(index: number): boolean {
    const heading = this.headings[index];
    return heading !== undefined && heading.level > 1;
  }

  isVisible(index: number): boolean {
    return index >= 0 && index < this.headings.length && !this.hidden.has(index);
  }

  toggle(index: number): boolean {
    if (!this.isCollapsible(index) || !this.isVisible(index)) {
      return false;
    }
    const heading = this.headings[index];
    heading.collapsed = !heading.collapsed;
    this.rebuild();
    return true;
  }

  collapseAll(): boolean {
    let changed = false;
    for (const heading of this.headings) {
      if (heading.level > 1 && !heading.collapsed) {
        heading.collapsed = true;
        changed = true;
      }
    }
    if (changed) {
      this.rebuild();
    }
    return changed;
  }

  expandAll(): boolean {
    let changed = false;
    for (const heading of this.headings) {
      if (heading.collapsed) {
        heading.collapsed = false;
        changed = true;
      }
    }
    if (changed) {
      this.rebuild();
    }
    return changed;
  }

  currentSectionIndex(offset: number): number {
    let best = -1;
    let first = -1;
    this.headings.forEach((heading, index) => {
      if (!this.isCollapsible(index) || !this.isVisible(index)) {
        return;
      }
      if (first === -1) {
        first = index;
      }
      if (heading.visibleLine <= offset) {
        best = index;
      }
    });
    return best === -1 ? first : best;
  }

  nextHeading(offset: number): HeadingStop | null {
    const stops = this.visibleStops();
    if (stops.length === 0) {
      return null;
    }
    return stops.find((stop) => stop.line > offset) ?? stops[0];
  }

  previousHeading(offset: number): HeadingStop | null {
    const stops = this.visibleStops();
    if (stops.length === 0) {
      return null;
    }
    for (let index = stops.length - 1; index >= 0; index -= 1) {
      if (stops[index].line < offset) {
        return stops[index];
      }
    }
    return stops[stops.length - 1];
  }

  private visibleStops(): HeadingStop[] {
    return this.headings
      .map((heading, index) => ({ index, line: heading.visibleLine }))
      .filter((stop) => this.isVisible(stop.index));
  }

  private rebuild(): void {
    const skips: LineRange[] = this.headings
      .filter((heading) => heading.collapsed && heading.level > 1)
      .map((heading) => ({ start: heading.renderedLine + 1, end: heading.endLine }));
    const isSkipped = (line: number) =>
      skips.some((range) => line >= range.start && line < range.end);

    const headingAtLine = new Map<number, number>();
    this.headings.forEach((heading, index) => headingAtLine.set(heading.renderedLine, index));

    this.hidden.clear();
    this.headings.forEach((heading, index) => {
      if (isSkipped(heading.renderedLine)) {
        this.hidden.add(index);
      }
    });

    const visible: string[] = [];
    this.fullLines.forEach((line, lineIndex) => {
      if (isSkipped(lineIndex)) {
        return;
      }
      const headingIndex = headingAtLine.get(lineIndex);
      if (headingIndex === undefined) {
        visible.push(line);
        return;
      }

      const heading = this.headings[headingIndex];
      heading.visibleLine = visible.length;
      visible.push(
        heading.level > 1
          ? insertAfterAnsiPrefix(
              line,
              heading.collapsed ? COLLAPSED_INDICATOR : EXPANDED_INDICATOR
            )
          : line
      );
    });

    this.visible = visible;
  }
}
