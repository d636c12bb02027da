import { EventEmitter } from 'node:events';

import { Chalk } from 'chalk';
import { describe, expect, it, vi } from 'vitest';

import type { CompletionProvider } from '../application/ports';
import { DEFAULT_SETTINGS } from '../application/settings';
import type { LoadedReport, ReportAction } from '../domain';
import { ReportViewer } from './report-viewer';
import { TERMINAL_SEQUENCES } from './terminal-input';
import { TerminalRuntime } from './terminal-runtime';

const report: LoadedReport = {
  title: 'Notes',
  raw: 'one\ntwo',
  renderedLines: ['one', 'two'],
  headings: [],
  actions: [],
  links: [],
  hasCharts: false,
  imageTier: 'none',
};

function createTerminal(
  options: { signal?: AbortSignal; provider?: CompletionProvider; actions?: ReportAction[] } = {}
) {
  const input = Object.assign(new EventEmitter(), {
    isTTY: true,
    setRawMode: vi.fn((_mode: boolean) => undefined),
    setEncoding: vi.fn((_encoding: BufferEncoding) => undefined),
    resume: vi.fn(() => undefined),
    pause: vi.fn(() => undefined),
  });
  const writes: string[] = [];
  const output = Object.assign(new EventEmitter(), {
    columns: 40,
    rows: 6,
    write: (chunk: string) => {
      writes.push(chunk);
      return true;
    },
  });
  const viewer = new ReportViewer({
    report: { ...report, actions: options.actions ?? [] },
    reportPath: '/notes.md',
    settings: DEFAULT_SETTINGS,
    handoff: null,
    clipboard: { copy: async () => undefined },
    provider: options.provider ?? null,
    contextSource: null,
    chartLocator: { firstChartFile: async () => null },
    diagnostics: { record: () => undefined },
    style: new Chalk({ level: 0 }),
  });
  const runtime = new TerminalRuntime({
    viewer,
    input,
    output,
    diagnostics: { record: () => undefined },
    signal: options.signal,
  });
  return { input, output, writes, runtime };
}

describe('terminal-runtime (presentation)', () => {
  it('paints into the alternate screen and restores the terminal on quit', async () => {
    const { input, writes, runtime } = createTerminal();

    const done = runtime.run();
    expect(writes[0]).toBe(
      TERMINAL_SEQUENCES.altScreenOn + TERMINAL_SEQUENCES.hideCursor + TERMINAL_SEQUENCES.mouseOn
    );
    expect(input.setRawMode).toHaveBeenCalledWith(true);
    expect(writes[1]).toBe(
      '\u001b[H Notes\u001b[K\r\n\u001b[K\r\none\u001b[K\r\ntwo\u001b[K\r\n\u001b[K\r\n 100% │ q quit\u001b[K\u001b[J'
    );

    input.emit('data', 'q');
    await done;

    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
    expect(input.pause).toHaveBeenCalled();
    expect(writes.at(-1)).toBe(
      TERMINAL_SEQUENCES.mouseOff + TERMINAL_SEQUENCES.showCursor + TERMINAL_SEQUENCES.altScreenOff
    );
    expect(input.listenerCount('data')).toBe(0);
  });

  it('repaints on resize and ignores input after restore', async () => {
    const { input, output, writes, runtime } = createTerminal();
    const done = runtime.run();

    output.emit('resize');
    expect(writes).toHaveLength(3);

    runtime.restore();
    await done;
    const count = writes.length;
    input.emit('data', 'j');
    runtime.restore();
    expect(writes).toHaveLength(count);
  });

  it('restores the terminal when the caller aborts', async () => {
    const shutdown = new AbortController();
    const { input, writes, runtime } = createTerminal({ signal: shutdown.signal });
    const done = runtime.run();

    shutdown.abort();
    await done;

    expect(input.setRawMode).toHaveBeenLastCalledWith(false);
    expect(writes.at(-1)).toBe(
      TERMINAL_SEQUENCES.mouseOff + TERMINAL_SEQUENCES.showCursor + TERMINAL_SEQUENCES.altScreenOff
    );
    expect(input.listenerCount('data')).toBe(0);
  });

  it('cancels a running draft when the caller aborts', async () => {
    const shutdown = new AbortController();
    const draftSignals: AbortSignal[] = [];
    const provider: CompletionProvider = {
      complete: (signal) => {
        draftSignals.push(signal);
        return new Promise<string>(() => undefined);
      },
    };
    const { input, runtime } = createTerminal({
      signal: shutdown.signal,
      provider,
      actions: [{ kind: 'draft', description: 'Reply to Sam', target: '' }],
    });
    const done = runtime.run();

    input.emit('data', 'd');
    await vi.waitFor(() => expect(draftSignals).toHaveLength(1));
    expect(draftSignals[0].aborted).toBe(false);

    shutdown.abort();
    await done;

    expect(draftSignals[0].aborted).toBe(true);
  });

  it('does not take the terminal when already aborted', async () => {
    const shutdown = new AbortController();
    shutdown.abort();
    const { input, writes, runtime } = createTerminal({ signal: shutdown.signal });

    await runtime.run();

    expect(writes).toEqual([]);
    expect(input.setRawMode).not.toHaveBeenCalled();
  });
});
