import { resetHyperlink, setHyperlink, stripHyperlinks } from '../application/ansi-text';
import { resolveFullUrl, URL_FRAGMENT_PATTERN } from '../application/url-resolution';
import type { LinkEntry } from '../domain';

const ZONE_MARKER_PATTERN = /\u001b\[(\d+)z/y;
const ESCAPE_PATTERN = /\u001b(?:[\]_P][^\u0007\u001b]*(?:\u0007|\u001b\\)|\[[0-9;?<>=]*[ -/]*[@-~])/y;

interface ZoneSpan {
  id: string;
  row: number;
  startColumn: number;
  endColumn: number;
}

export class ZoneRegistry {
  private readonly idsByMarker = new Map<number, string>();
  private spans: ZoneSpan[] = [];
  private nextMarker = 1;

  reset(): void {
    this.idsByMarker.clear();
    this.spans = [];
    this.nextMarker = 1;
  }

  mark(id: string, text: string): string {
    const marker = this.nextMarker;
    this.nextMarker += 1;
    this.idsByMarker.set(marker, id);
    return `\u001b[${marker}z${text}\u001b[${marker}z`;
  }

  scan(frame: string): string {
    this.spans = [];
    return frame
      .split('\n')
      .map((line, row) => this.scanLine(line, row))
      .join('\n');
  }

  zoneAt(x: number, y: number): string | null {
    const span = this.spans.find(
      (candidate) => candidate.row === y && x >= candidate.startColumn && x <= candidate.endColumn
    );
    return span?.id ?? null;
  }

  private scanLine(line: string, row: number): string {
    const open = new Map<number, number>();
    let output = '';
    let column = 0;
    let index = 0;

    while (index < line.length) {
      ZONE_MARKER_PATTERN.lastIndex = index;
      const zone = ZONE_MARKER_PATTERN.exec(line);
      if (zone) {
        const marker = Number(zone[1]);
        const id = this.idsByMarker.get(marker);
        if (id !== undefined) {
          const start = open.get(marker);
          if (start === undefined) {
            open.set(marker, column);
          } else {
            open.delete(marker);
            if (column > start) {
              this.spans.push({ id, row, startColumn: start, endColumn: column - 1 });
            }
          }
        }
        index += zone[0].length;
        continue;
      }

      ESCAPE_PATTERN.lastIndex = index;
      const escape = ESCAPE_PATTERN.exec(line);
      if (escape) {
        output += escape[0];
        index += escape[0].length;
        continue;
      }

      const codePoint = line.codePointAt(index) ?? 0;
      const char = String.fromCodePoint(codePoint);
      output += char;
      column += 1;
      index += char.length;
    }

    return output;
  }
}

export interface WrappedFrame {
  frame: string;
  targets: Map<string, string>;
}

export function wrapUrlsForView(
  frame: string,
  links: readonly LinkEntry[],
  options: { hyperlinks: boolean; registry: ZoneRegistry }
): WrappedFrame {
  const targets = new Map<string, string>();
  let counter = 0;

  const wrapped = stripHyperlinks(frame).replace(URL_FRAGMENT_PATTERN, (fragment) => {
    const id = `url-${counter}`;
    counter += 1;
    const url = resolveFullUrl(fragment, links);
    targets.set(id, url);
    const display = options.hyperlinks
      ? `${setHyperlink(url)}${fragment}${resetHyperlink()}`
      : fragment;
    return options.registry.mark(id, display);
  });

  return { frame: wrapped, targets };
}
