import type { ViewerSettings } from './settings';

export type DiagnosticsEventKind =
  | 'load'
  | 'render-failure'
  | 'dispatch'
  | 'outcome'
  | 'context-failure'
  | 'crash'
  | 'shutdown';

export interface DiagnosticsEvent {
  at: string;
  kind: DiagnosticsEventKind;
  detail: string;
}

export interface DiagnosticsRecorder {
  record(kind: DiagnosticsEventKind, detail: string): void;
}

const DEFAULT_CAPACITY = 200;

export class ViewerDiagnostics implements DiagnosticsRecorder {
  private readonly clock: () => Date;
  private readonly capacity: number;
  private readonly entries: DiagnosticsEvent[] = [];

  constructor(options: { clock?: () => Date; capacity?: number } = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.capacity = Math.max(1, options.capacity ?? DEFAULT_CAPACITY);
  }

  record(kind: DiagnosticsEventKind, detail: string): void {
    this.entries.push({ at: this.clock().toISOString(), kind, detail });
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }

  events(): readonly DiagnosticsEvent[] {
    return this.entries;
  }
}

export interface DiagnosticsReportInput {
  generatedAtIso: string;
  appVersion: string;
  reportPath: string | null;
  settings: ViewerSettings;
  events: readonly DiagnosticsEvent[];
}

export function diagnosticsReportFileName(generatedAtIso: string): string {
  const sanitized = generatedAtIso.replace(/[^0-9]/g, '');
  return `report-viewer-diagnostics-${sanitized}.json`;
}

export function buildDiagnosticsReport(input: DiagnosticsReportInput): string {
  const payload = {
    generatedAt: input.generatedAtIso,
    appVersion: input.appVersion,
    reportPath: input.reportPath,
    settings: {
      imageMode: input.settings.imageMode,
      hyperlinks: input.settings.hyperlinks,
      styleVariant: input.settings.styleVariant,
      wrapWidth: input.settings.wrapWidth,
      contextBudget: input.settings.contextBudget,
      statusDurationMs: input.settings.statusDurationMs,
    },
    events: input.events,
  };

  return JSON.stringify(payload, null, 2);
}
