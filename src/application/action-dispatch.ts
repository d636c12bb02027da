import type { ActionKind, Draft, LinkEntry, ReportAction } from '../domain';
import type { DiagnosticsRecorder } from './diagnostics';
import { generateDraft } from './draft';
import { errorToMessage } from './error-message';
import { resolveTargetIntent } from './link-navigation';
import type {
  ChartFileLocator,
  Clipboard,
  CompletionProvider,
  ContextSource,
  Handoff,
} from './ports';

export type ActionOutcome =
  | { ok: true; status: string; draft?: Draft }
  | { ok: false; label: string; error: string };

export type ActionPlan =
  | { type: 'status'; message: string }
  | {
      type: 'task';
      pendingStatus: string | null;
      run(signal: AbortSignal): Promise<ActionOutcome>;
    };

export interface ActionDispatchDeps {
  handoff: Handoff | null;
  clipboard: Clipboard;
  provider: CompletionProvider | null;
  contextSource: ContextSource | null;
  contextBudget: number;
  reportPath: string | null;
  diagnostics?: DiagnosticsRecorder;
}

const NO_OPEN_TARGET = 'No handoff configured or no target URL';
const NO_MEDIA_TARGET = 'No handoff configured or no media target';

export function planAction(action: ReportAction, deps: ActionDispatchDeps): ActionPlan {
  switch (action.kind) {
    case 'open':
      return planOpen(action, deps);
    case 'draft':
      return planDraft(action, deps);
    case 'configure':
      return { type: 'status', message: `Configure: ${action.description}` };
    case 'play':
      return planPlay(action, deps);
    default:
      return assertNever(action.kind);
  }
}

function planOpen(action: ReportAction, deps: ActionDispatchDeps): ActionPlan {
  const { handoff } = deps;
  if (!handoff || !action.target) {
    return { type: 'status', message: NO_OPEN_TARGET };
  }
  const target = action.target;
  return task(null, 'Error', async () => {
    await openTarget(handoff, target, deps.reportPath);
    return `Opened: ${target}`;
  });
}

function planPlay(action: ReportAction, deps: ActionDispatchDeps): ActionPlan {
  const { handoff } = deps;
  if (!handoff || !action.target) {
    return { type: 'status', message: NO_MEDIA_TARGET };
  }
  const target = action.target;
  return task(null, 'Error', async () => {
    await handoff.playMedia(mediaPath(target, deps.reportPath));
    return `Playing: ${target}`;
  });
}

function mediaPath(target: string, reportPath: string | null): string {
  const intent = resolveTargetIntent({ target, reportPath });
  switch (intent.type) {
    case 'open-external-url':
      return intent.url;
    case 'open-local-file':
      return intent.path;
    case 'blocked-external-protocol':
      throw new Error(`blocked link protocol ${intent.protocol}`);
    case 'none':
      throw new Error(`cannot play ${target}`);
    default:
      return assertNever(intent);
  }
}

function planDraft(action: ReportAction, deps: ActionDispatchDeps): ActionPlan {
  const instruction = action.target || action.description;
  const { provider, clipboard } = deps;

  if (!provider) {
    return task(null, 'Error', async () => {
      await copyToClipboard(clipboard, instruction);
      return 'Draft instruction copied to clipboard';
    });
  }

  return {
    type: 'task',
    pendingStatus: 'Generating draft...',
    async run(signal) {
      try {
        const contextData = await gatherContext(deps);
        const draft = await generateDraft({ signal, provider, instruction, contextData });
        await copyToClipboard(clipboard, draft.raw);
        return { ok: true, status: 'Draft copied to clipboard', draft };
      } catch (error) {
        return { ok: false, label: 'Draft error', error: errorToMessage(error) };
      }
    },
  };
}

async function gatherContext(deps: ActionDispatchDeps): Promise<string> {
  if (!deps.contextSource) {
    return '';
  }
  try {
    return await deps.contextSource.gatherContext(deps.contextBudget);
  } catch (error) {
    deps.diagnostics?.record('context-failure', errorToMessage(error));
    return '';
  }
}

export function planCopyLink(link: LinkEntry, clipboard: Clipboard): ActionPlan {
  return task(null, 'Error', async () => {
    await copyToClipboard(clipboard, link.url);
    return `Copied: ${link.url}`;
  });
}

export function planOpenUrl(
  url: string,
  handoff: Handoff | null,
  reportPath: string | null
): ActionPlan {
  if (!handoff || !url) {
    return { type: 'status', message: NO_OPEN_TARGET };
  }
  return task(null, 'Error', async () => {
    await openTarget(handoff, url, reportPath);
    return `Opened: ${url}`;
  });
}

export function planOpenChart(locator: ChartFileLocator, handoff: Handoff | null): ActionPlan {
  if (!handoff) {
    return { type: 'status', message: 'No handoff configured' };
  }
  return task(null, 'Error', async () => {
    const chartPath = await locator.firstChartFile();
    if (!chartPath) {
      return 'No chart images found';
    }
    await handoff.openFile(chartPath);
    return `Opened: ${chartPath}`;
  });
}

export function planMailDraft(draft: Draft | null, handoff: Handoff | null): ActionPlan {
  if (!draft) {
    return { type: 'status', message: 'No draft generated yet' };
  }
  if (!handoff) {
    return { type: 'status', message: 'No handoff configured' };
  }
  return task(null, 'Error', async () => {
    await handoff.openMailto(draft.to, draft.subject, draft.body);
    return 'Opened in email app';
  });
}

export function findFirstAction(
  actions: readonly ReportAction[],
  kind: ActionKind
): ReportAction | null {
  return actions.find((action) => action.kind === kind) ?? null;
}

export function noActionsStatus(kind: ActionKind): string {
  return `No ${kind} actions found`;
}

export function formatOutcome(outcome: ActionOutcome): string {
  return outcome.ok ? outcome.status : `${outcome.label}: ${outcome.error}`;
}

async function openTarget(handoff: Handoff, target: string, reportPath: string | null) {
  const intent = resolveTargetIntent({ target, reportPath });
  switch (intent.type) {
    case 'open-external-url':
      await handoff.openUrl(intent.url);
      return;
    case 'open-local-file':
      await handoff.openFile(intent.path);
      return;
    case 'blocked-external-protocol':
      throw new Error(`blocked link protocol ${intent.protocol}`);
    case 'none':
      throw new Error(`cannot open ${target}`);
    default:
      assertNever(intent);
  }
}

async function copyToClipboard(clipboard: Clipboard, text: string): Promise<void> {
  try {
    await clipboard.copy(text);
  } catch (error) {
    throw new Error(`clipboard: ${errorToMessage(error)}`);
  }
}

function task(
  pendingStatus: string | null,
  label: string,
  effect: () => Promise<string>
): ActionPlan {
  return {
    type: 'task',
    pendingStatus,
    async run() {
      try {
        return { ok: true, status: await effect() };
      } catch (error) {
        return { ok: false, label, error: errorToMessage(error) };
      }
    },
  };
}

function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${JSON.stringify(value)}`);
}
