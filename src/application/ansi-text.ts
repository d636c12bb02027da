const ESC = '\u001b';
const BEL = '\u0007';

const CSI_PATTERN = /\u001b\[[0-9;?<>=]*[ -/]*[@-~]/;
const LEADING_CSI_PATTERN = /^\u001b\[[0-9;]*[a-zA-Z]/;
// OSC, plus the APC and DCS strings terminal graphics protocols use.
const OSC_PATTERN = /\u001b[\]_P][^\u0007\u001b]*(?:\u0007|\u001b\\)/;
const HYPERLINK_PATTERN = /\u001b\]8;[^\u0007\u001b]*(?:\u0007|\u001b\\)/g;
const ESCAPE_SEQUENCE_PATTERN = new RegExp(`${OSC_PATTERN.source}|${CSI_PATTERN.source}`, 'g');

export function stripAnsi(value: string): string {
  return value.replace(ESCAPE_SEQUENCE_PATTERN, '');
}

export function stripHyperlinks(value: string): string {
  return value.replace(HYPERLINK_PATTERN, '');
}

export function visibleWidth(value: string): number {
  return Array.from(stripAnsi(value)).length;
}

export function insertAfterAnsiPrefix(line: string, insert: string): string {
  let position = 0;
  for (;;) {
    const match = LEADING_CSI_PATTERN.exec(line.slice(position));
    if (!match) {
      break;
    }
    position += match[0].length;
  }
  return `${line.slice(0, position)}${insert}${line.slice(position)}`;
}

export function setHyperlink(url: string): string {
  return `${ESC}]8;;${url}${BEL}`;
}

export function resetHyperlink(): string {
  return `${ESC}]8;;${BEL}`;
}

export function truncateVisible(value: string, width: number): string {
  if (width <= 0) {
    return '';
  }
  let visible = 0;
  let output = '';
  let index = 0;
  while (index < value.length) {
    if (value[index] === ESC) {
      const rest = value.slice(index);
      const sequence = OSC_PATTERN.exec(rest) ?? CSI_PATTERN.exec(rest);
      if (sequence && sequence.index === 0) {
        output += sequence[0];
        index += sequence[0].length;
        continue;
      }
    }
    const codePoint = value.codePointAt(index);
    if (codePoint === undefined) {
      break;
    }
    const char = String.fromCodePoint(codePoint);
    if (visible >= width) {
      index += char.length;
      continue;
    }
    output += char;
    visible += 1;
    index += char.length;
  }
  return output;
}
