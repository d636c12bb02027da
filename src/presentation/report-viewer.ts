import chalk, { type ChalkInstance } from 'chalk';
import { setTimeout as sleep } from 'node:timers/promises';

import {
  findFirstAction,
  formatOutcome,
  noActionsStatus,
  planAction,
  planCopyLink,
  planMailDraft,
  planOpenChart,
  planOpenUrl,
  type ActionOutcome,
  type ActionPlan,
} from '../application/action-dispatch';
import { truncateVisible } from '../application/ansi-text';
import type { DiagnosticsRecorder } from '../application/diagnostics';
import type {
  ChartFileLocator,
  Clipboard,
  CompletionProvider,
  ContextSource,
  Handoff,
} from '../application/ports';
import { SectionModel } from '../application/section-model';
import type { ViewerSettings } from '../application/settings';
import type { ActionKind, Draft, LinkEntry, LoadedReport, ReportAction } from '../domain';
import { wrapUrlsForView, ZoneRegistry } from './click-zones';
import { isQuitKey, resolveKeyboardShortcutIntent } from './keyboard-shortcuts';
import { ListOverlayController, type OverlayKeyResult } from './list-overlay-controller';
import { ScrollViewport } from './scroll-viewport';
import type { KeyEvent, MouseEvent } from './terminal-input';
import type { ViewerAction } from './viewer-actions';

export type ViewerMessage =
  | { type: 'key'; key: KeyEvent }
  | { type: 'mouse'; mouse: MouseEvent }
  | { type: 'resize'; columns: number; rows: number }
  | { type: 'action-result'; outcome: ActionOutcome }
  | { type: 'status-expired'; token: number };

// Runs off the update path; the resolved message goes back through `update`.
export type Command = (signal: AbortSignal) => Promise<ViewerMessage>;

interface ReportViewerDeps {
  report: LoadedReport;
  reportPath: string;
  settings: ViewerSettings;
  handoff: Handoff | null;
  clipboard: Clipboard;
  provider: CompletionProvider | null;
  contextSource: ContextSource | null;
  chartLocator: ChartFileLocator;
  diagnostics: DiagnosticsRecorder;
  style?: ChalkInstance;
  wait?: (ms: number, signal: AbortSignal) => Promise<void>;
}

const HEADER_ROWS = 2;
const WHEEL_LINES = 3;
const ACTIONS_TITLE = ' Actions (↑↓ navigate, enter execute, esc close):';
const LINKS_TITLE = ' Links (↑↓ navigate, enter copy, o open, esc close):';

interface StatusLine {
  text: string;
  token: number;
}

export class ReportViewer {
  private readonly deps: ReportViewerDeps;
  private readonly style: ChalkInstance;
  private readonly sections: SectionModel;
  private readonly viewport = new ScrollViewport();
  private readonly actionsOverlay = new ListOverlayController<ReportAction>({ toggleKey: 'a' });
  private readonly linksOverlay = new ListOverlayController<LinkEntry>({
    toggleKey: 'l',
    secondaryKey: 'o',
  });
  private readonly zones = new ZoneRegistry();
  private zoneTargets = new Map<string, string>();
  private columns = 80;
  private rows = 24;
  private busy = false;
  private quitting = false;
  private status: StatusLine | null = null;
  private pendingStatus: string | null = null;
  private statusToken = 0;
  private lastDraft: Draft | null = null;

  constructor(deps: ReportViewerDeps) {
    this.deps = deps;
    this.style = deps.style ?? chalk;
    this.sections = new SectionModel(deps.report.renderedLines, deps.report.headings);
    this.viewport.setContentLength(this.sections.visibleLines().length);
    this.layout();
  }

  isBusy(): boolean {
    return this.busy;
  }

  isQuitting(): boolean {
    return this.quitting;
  }

  scrollOffset(): number {
    return this.viewport.getOffset();
  }

  statusText(): string | null {
    if (this.busy) {
      return this.pendingStatus ?? 'Working...';
    }
    return this.status?.text ?? null;
  }

  visibleContent(): string {
    return this.sections.visibleContent();
  }

  update(message: ViewerMessage): Command[] {
    switch (message.type) {
      case 'key':
        return this.handleKey(message.key);
      case 'mouse':
        return this.handleMouse(message.mouse);
      case 'resize':
        this.columns = Math.max(1, message.columns);
        this.rows = Math.max(1, message.rows);
        this.layout();
        return [];
      case 'action-result':
        return this.handleOutcome(message.outcome);
      case 'status-expired':
        if (this.status?.token === message.token) {
          this.status = null;
        }
        return [];
    }
  }

  view(): string {
    const { style } = this;
    const header = style.bold.magenta(` ${this.deps.report.title}`);
    const body = this.viewport.visibleSlice(this.sections.visibleLines());
    const padding = Array.from(
      { length: Math.max(0, this.viewport.getHeight() - body.length) },
      () => ''
    );

    this.zones.reset();
    const wrapped = wrapUrlsForView(
      body.map((line) => truncateVisible(line, this.columns)).join('\n'),
      this.deps.report.links,
      { hyperlinks: this.hyperlinksEnabled(), registry: this.zones }
    );
    this.zoneTargets = wrapped.targets;

    const frame = [header, '', wrapped.frame, ...padding, '', ...this.footerLines()].join('\n');
    return this.zones.scan(frame);
  }

  // Terminals with an inline image protocol are the ones known to understand OSC 8.
  private hyperlinksEnabled(): boolean {
    return this.deps.settings.hyperlinks && this.deps.report.imageTier !== 'none';
  }

  private handleKey(key: KeyEvent): Command[] {
    if (this.busy) {
      if (isQuitKey(key)) {
        this.quitting = true;
      }
      return [];
    }

    if (this.actionsOverlay.isVisible()) {
      return this.handleOverlayResult(this.actionsOverlay.handleKey(key), (action) =>
        this.runPlan(this.planFor(action), `${action.kind}: ${action.description}`)
      );
    }

    if (this.linksOverlay.isVisible()) {
      const result = this.linksOverlay.handleKey(key);
      if (result.type === 'secondary') {
        this.layout();
        return this.runPlan(
          planOpenUrl(result.item.url, this.deps.handoff, this.deps.reportPath),
          `open link: ${result.item.url}`
        );
      }
      return this.handleOverlayResult(result, (link) =>
        this.runPlan(planCopyLink(link, this.deps.clipboard), `copy link: ${link.url}`)
      );
    }

    const intent = resolveKeyboardShortcutIntent(key);
    return intent.type === 'none' ? [] : this.handleAction(intent.type);
  }

  private handleOverlayResult<T>(
    result: OverlayKeyResult<T>,
    commit: (item: T) => Command[]
  ): Command[] {
    switch (result.type) {
      case 'quit':
        this.quitting = true;
        return [];
      case 'commit':
        this.layout();
        return commit(result.item);
      case 'close':
      case 'secondary':
        this.layout();
        return [];
      case 'handled':
        return [];
    }
  }

  private handleAction(action: ViewerAction): Command[] {
    switch (action) {
      case 'next-section':
        this.jumpTo(this.sections.nextHeading(this.viewport.getOffset())?.line);
        return [];
      case 'previous-section':
        this.jumpTo(this.sections.previousHeading(this.viewport.getOffset())?.line);
        return [];
      case 'toggle-section':
        this.toggleCurrentSection();
        return [];
      case 'collapse-all':
        if (this.sections.collapseAll()) {
          this.viewport.setContentLength(this.sections.visibleLines().length);
        }
        return [];
      case 'expand-all':
        if (this.sections.expandAll()) {
          this.viewport.setContentLength(this.sections.visibleLines().length);
        }
        return [];
      case 'show-actions':
        return this.openOverlay(this.actionsOverlay, this.deps.report.actions, 'No actions found');
      case 'show-links':
        return this.openOverlay(this.linksOverlay, this.deps.report.links, 'No links found');
      case 'quick-draft':
        return this.runFirstAction('draft');
      case 'quick-open':
        return this.runFirstAction('open');
      case 'quick-play':
        return this.runFirstAction('play');
      case 'open-chart':
        return this.runPlan(planOpenChart(this.deps.chartLocator, this.deps.handoff), 'open chart');
      case 'mail-draft':
        return this.runPlan(planMailDraft(this.lastDraft, this.deps.handoff), 'mail draft');
      case 'line-down':
        this.viewport.scrollBy(1);
        return [];
      case 'line-up':
        this.viewport.scrollBy(-1);
        return [];
      case 'page-down':
        this.viewport.pageDown();
        return [];
      case 'page-up':
        this.viewport.pageUp();
        return [];
      case 'scroll-top':
        this.viewport.toTop();
        return [];
      case 'scroll-bottom':
        this.viewport.toBottom();
        return [];
      case 'quit':
        this.quitting = true;
        return [];
    }
  }

  private handleMouse(mouse: MouseEvent): Command[] {
    if (mouse.button === 'wheel-up' || mouse.button === 'wheel-down') {
      this.viewport.scrollBy(mouse.button === 'wheel-up' ? -WHEEL_LINES : WHEEL_LINES);
      return [];
    }

    if (
      mouse.button !== 'left' ||
      mouse.release ||
      mouse.motion ||
      this.busy ||
      this.actionsOverlay.isVisible() ||
      this.linksOverlay.isVisible()
    ) {
      return [];
    }

    const zone = this.zones.zoneAt(mouse.x, mouse.y);
    const url = zone === null ? undefined : this.zoneTargets.get(zone);
    if (url === undefined) {
      return [];
    }
    return this.runPlan(planOpenUrl(url, this.deps.handoff, this.deps.reportPath), `click: ${url}`);
  }

  private handleOutcome(outcome: ActionOutcome): Command[] {
    this.busy = false;
    this.pendingStatus = null;
    if (outcome.ok && outcome.draft) {
      this.lastDraft = outcome.draft;
    }
    const text = formatOutcome(outcome);
    this.deps.diagnostics.record('outcome', text);
    return this.setStatus(text);
  }

  private toggleCurrentSection(): void {
    const index = this.sections.currentSectionIndex(this.viewport.getOffset());
    if (index < 0 || !this.sections.toggle(index)) {
      return;
    }
    this.viewport.setContentLength(this.sections.visibleLines().length);
    this.viewport.setOffset(this.sections.sections[index].visibleLine);
  }

  private jumpTo(line: number | undefined): void {
    if (line !== undefined) {
      this.viewport.setOffset(line);
    }
  }

  private openOverlay<T>(
    overlay: ListOverlayController<T>,
    items: readonly T[],
    emptyStatus: string
  ): Command[] {
    if (!overlay.open(items)) {
      return this.setStatus(emptyStatus);
    }
    this.layout();
    return [];
  }

  private runFirstAction(kind: ActionKind): Command[] {
    const action = findFirstAction(this.deps.report.actions, kind);
    if (!action) {
      return this.setStatus(noActionsStatus(kind));
    }
    return this.runPlan(this.planFor(action), `${action.kind}: ${action.description}`);
  }

  private planFor(action: ReportAction): ActionPlan {
    return planAction(action, {
      handoff: this.deps.handoff,
      clipboard: this.deps.clipboard,
      provider: this.deps.provider,
      contextSource: this.deps.contextSource,
      contextBudget: this.deps.settings.contextBudget,
      reportPath: this.deps.reportPath,
      diagnostics: this.deps.diagnostics,
    });
  }

  private runPlan(plan: ActionPlan, label: string): Command[] {
    if (plan.type === 'status') {
      return this.setStatus(plan.message);
    }

    this.busy = true;
    this.pendingStatus = plan.pendingStatus;
    this.deps.diagnostics.record('dispatch', label);
    return [async (signal) => ({ type: 'action-result', outcome: await plan.run(signal) })];
  }

  private setStatus(text: string): Command[] {
    this.statusToken += 1;
    const token = this.statusToken;
    this.status = { text, token };
    const wait = this.deps.wait ?? defaultWait;
    const duration = this.deps.settings.statusDurationMs;
    return [
      async (signal) => {
        await wait(duration, signal);
        return { type: 'status-expired', token };
      },
    ];
  }

  private layout(): void {
    const footerRows = this.footerHeight();
    this.viewport.setHeight(this.rows - HEADER_ROWS - 1 - footerRows);
  }

  private footerHeight(): number {
    return Math.max(1, this.actionsOverlay.height(), this.linksOverlay.height());
  }

  private footerLines(): string[] {
    const { style } = this;
    if (this.actionsOverlay.isVisible()) {
      return [
        style.gray(ACTIONS_TITLE),
        ...this.actionsOverlay.rows().map((row) => {
          const target = row.item.target ? ` (${row.item.target})` : '';
          return this.overlayRow(`[${row.item.kind}] ${row.item.description}${target}`, row.selected);
        }),
      ];
    }

    if (this.linksOverlay.isVisible()) {
      return [
        style.gray(LINKS_TITLE),
        ...this.linksOverlay.rows().map((row) =>
          this.overlayRow(
            row.item.label === row.item.url ? row.item.url : `${row.item.label}  ${row.item.url}`,
            row.selected
          )
        ),
      ];
    }

    return [style.gray(truncateVisible(this.hints() + this.statusSuffix(), this.columns))];
  }

  private overlayRow(label: string, selected: boolean): string {
    const text = truncateVisible(`${selected ? '▸ ' : '  '}  ${label}`, this.columns);
    return selected ? this.style.bold.magenta(text) : this.style.white(text);
  }

  private hints(): string {
    const { report } = this.deps;
    let hints = ` ${String(this.viewport.scrollPercent()).padStart(3)}%`;
    if (report.headings.length > 0) {
      hints += ' │ n/N sections │ enter fold │ c/e all';
    }
    if (report.actions.length > 0) {
      hints += ' │ a actions';
    }
    if (report.links.length > 0) {
      hints += ' │ l links';
    }
    if (report.hasCharts && this.deps.handoff) {
      hints += ' │ i open chart';
    }
    if (report.actions.some((action) => action.kind === 'play')) {
      hints += ' │ p play';
    }
    return `${hints} │ q quit`;
  }

  private statusSuffix(): string {
    if (this.busy) {
      return ` • ${this.pendingStatus ?? 'Working...'}`;
    }
    return this.status ? ` • ${this.status.text}` : '';
  }
}

async function defaultWait(ms: number, signal: AbortSignal): Promise<void> {
  await sleep(ms, undefined, { signal, ref: false });
}
