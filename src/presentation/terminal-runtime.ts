import type { EventEmitter } from 'node:events';

import type { DiagnosticsRecorder } from '../application/diagnostics';
import { errorToMessage } from '../application/error-message';
import type { Command, ReportViewer, ViewerMessage } from './report-viewer';
import { parseTerminalInput, TERMINAL_SEQUENCES } from './terminal-input';

export interface TerminalInputStream extends EventEmitter {
  isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
}

export interface TerminalOutputStream extends EventEmitter {
  columns?: number;
  rows?: number;
  write(chunk: string): boolean;
}

interface TerminalRuntimeDeps {
  viewer: ReportViewer;
  input: TerminalInputStream;
  output: TerminalOutputStream;
  diagnostics: DiagnosticsRecorder;
  // Aborting it cancels running commands and hands the terminal back.
  signal?: AbortSignal;
}

export class TerminalRuntime {
  private readonly deps: TerminalRuntimeDeps;
  private readonly abortController = new AbortController();
  private active = false;
  private finish: (() => void) | null = null;

  private readonly onData = (chunk: string | Buffer) => {
    const text = typeof chunk === 'string' ? chunk : chunk.toString('utf8');
    for (const event of parseTerminalInput(text)) {
      if (!this.active) {
        return;
      }
      this.dispatch(
        event.type === 'key' ? { type: 'key', key: event } : { type: 'mouse', mouse: event }
      );
    }
  };

  private readonly onResize = () => {
    this.dispatch(this.resizeMessage());
  };

  private readonly onAbort = () => {
    this.restore();
  };

  constructor(deps: TerminalRuntimeDeps) {
    this.deps = deps;
  }

  run(): Promise<void> {
    if (this.active || this.deps.signal?.aborted) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.finish = resolve;
      this.active = true;
      const { input, output } = this.deps;

      output.write(
        TERMINAL_SEQUENCES.altScreenOn + TERMINAL_SEQUENCES.hideCursor + TERMINAL_SEQUENCES.mouseOn
      );
      input.setRawMode?.(true);
      input.setEncoding('utf8');
      input.resume();
      input.on('data', this.onData);
      output.on('resize', this.onResize);
      this.deps.signal?.addEventListener('abort', this.onAbort, { once: true });

      this.dispatch(this.resizeMessage());
    });
  }

  restore(): void {
    if (!this.active) {
      return;
    }
    this.active = false;
    this.abortController.abort();

    const { input, output } = this.deps;
    input.off('data', this.onData);
    output.off('resize', this.onResize);
    this.deps.signal?.removeEventListener('abort', this.onAbort);
    input.setRawMode?.(false);
    input.pause();
    output.write(
      TERMINAL_SEQUENCES.mouseOff + TERMINAL_SEQUENCES.showCursor + TERMINAL_SEQUENCES.altScreenOff
    );

    const finish = this.finish;
    this.finish = null;
    finish?.();
  }

  private dispatch(message: ViewerMessage): void {
    if (!this.active) {
      return;
    }

    const commands = this.deps.viewer.update(message);
    if (this.deps.viewer.isQuitting()) {
      this.restore();
      return;
    }

    commands.forEach((command) => this.execute(command));
    this.paint();
  }

  private execute(command: Command): void {
    const { signal } = this.abortController;
    void command(signal).then(
      (message) => {
        this.dispatch(message);
      },
      (error: unknown) => {
        if (signal.aborted) {
          return;
        }
        this.deps.diagnostics.record('crash', `command failed: ${errorToMessage(error)}`);
      }
    );
  }

  private paint(): void {
    const lines = this.deps.viewer.view().split('\n');
    // Raw mode turns off output post-processing, so rows end in CR LF.
    this.deps.output.write(
      TERMINAL_SEQUENCES.cursorHome +
        lines.map((line) => `${line}\u001b[K`).join('\r\n') +
        '\u001b[J'
    );
  }

  private resizeMessage(): ViewerMessage {
    return {
      type: 'resize',
      columns: this.deps.output.columns ?? 80,
      rows: this.deps.output.rows ?? 24,
    };
  }
}
