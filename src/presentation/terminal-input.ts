export interface KeyEvent {
  type: 'key';
  name: string;
  ctrl: boolean;
  shift: boolean;
  sequence: string;
}

export type MouseButton = 'left' | 'middle' | 'right' | 'wheel-up' | 'wheel-down' | 'other';

export interface MouseEvent {
  type: 'mouse';
  button: MouseButton;
  // Zero-based cell coordinates.
  x: number;
  y: number;
  release: boolean;
  motion: boolean;
}

export type InputEvent = KeyEvent | MouseEvent;

const ESC = '\u001b';
const SGR_MOUSE_PATTERN = /^\u001b\[<(\d+);(\d+);(\d+)([Mm])/;
const CSI_PATTERN = /^\u001b\[[0-9;]*[~A-Za-z]/;
const SS3_PATTERN = /^\u001bO[A-Za-z]/;

const ESCAPE_KEY_NAMES: Record<string, string> = {
  '\u001b[A': 'up',
  '\u001b[B': 'down',
  '\u001b[C': 'right',
  '\u001b[D': 'left',
  '\u001bOA': 'up',
  '\u001bOB': 'down',
  '\u001bOC': 'right',
  '\u001bOD': 'left',
  '\u001b[H': 'home',
  '\u001b[F': 'end',
  '\u001bOH': 'home',
  '\u001bOF': 'end',
  '\u001b[1~': 'home',
  '\u001b[4~': 'end',
  '\u001b[7~': 'home',
  '\u001b[8~': 'end',
  '\u001b[5~': 'pageup',
  '\u001b[6~': 'pagedown',
  '\u001b[3~': 'delete',
  '\u001b[Z': 'tab',
};

// A chunk can carry several sequences when input arrives quickly.
export function parseTerminalInput(chunk: string): InputEvent[] {
  const events: InputEvent[] = [];
  let rest = chunk;

  while (rest.length > 0) {
    if (rest.startsWith(ESC)) {
      const mouse = SGR_MOUSE_PATTERN.exec(rest);
      if (mouse) {
        events.push(mouseEvent(Number(mouse[1]), Number(mouse[2]), Number(mouse[3]), mouse[4] === 'm'));
        rest = rest.slice(mouse[0].length);
        continue;
      }

      const sequence = CSI_PATTERN.exec(rest) ?? SS3_PATTERN.exec(rest);
      if (sequence) {
        const name = ESCAPE_KEY_NAMES[sequence[0]] ?? 'unknown';
        events.push(key(name, sequence[0], { shift: sequence[0] === '\u001b[Z' }));
        rest = rest.slice(sequence[0].length);
        continue;
      }

      events.push(key('escape', ESC));
      rest = rest.slice(ESC.length);
      continue;
    }

    const codePoint = rest.codePointAt(0) ?? 0;
    const char = String.fromCodePoint(codePoint);
    events.push(charEvent(char, codePoint));
    rest = rest.slice(char.length);
  }

  return events;
}

function charEvent(char: string, codePoint: number): KeyEvent {
  if (char === '\r' || char === '\n') {
    return key('return', char);
  }
  if (char === '\t') {
    return key('tab', char);
  }
  if (char === ' ') {
    return key('space', char);
  }
  if (char === '\u007f' || char === '\b') {
    return key('backspace', char);
  }
  if (codePoint >= 1 && codePoint <= 26) {
    return key(String.fromCharCode(codePoint + 96), char, { ctrl: true });
  }
  const lower = char.toLowerCase();
  return key(lower, char, { shift: lower !== char });
}

function mouseEvent(code: number, column: number, row: number, release: boolean): MouseEvent {
  const motion = (code & 32) !== 0;
  let button: MouseButton = 'other';
  if ((code & 64) !== 0) {
    button = (code & 1) === 0 ? 'wheel-up' : 'wheel-down';
  } else {
    const low = code & 3;
    button = low === 0 ? 'left' : low === 1 ? 'middle' : low === 2 ? 'right' : 'other';
  }
  return { type: 'mouse', button, x: column - 1, y: row - 1, release, motion };
}

function key(
  name: string,
  sequence: string,
  modifiers: { ctrl?: boolean; shift?: boolean } = {}
): KeyEvent {
  return {
    type: 'key',
    name,
    ctrl: modifiers.ctrl ?? false,
    shift: modifiers.shift ?? false,
    sequence,
  };
}

export const TERMINAL_SEQUENCES = {
  altScreenOn: '\u001b[?1049h',
  altScreenOff: '\u001b[?1049l',
  hideCursor: '\u001b[?25l',
  showCursor: '\u001b[?25h',
  cursorHome: '\u001b[H',
  clearScreen: '\u001b[2J',
  clearLine: '\u001b[2K',
  mouseOn: '\u001b[?1000h\u001b[?1006h',
  mouseOff: '\u001b[?1006l\u001b[?1000l',
} as const;
