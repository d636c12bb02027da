import type { StyleVariant } from '../domain';

export type ImageMode = 'auto' | 'inline' | 'external' | 'text';

export interface HandoffApps {
  browser: string;
  editor: string;
  email: string;
  media: string;
}

export interface ViewerSettings {
  imageMode: ImageMode;
  hyperlinks: boolean;
  styleVariant: StyleVariant;
  wrapWidth: number;
  contextBudget: number;
  statusDurationMs: number;
  apps: HandoffApps;
}

export const DEFAULT_SETTINGS: ViewerSettings = {
  imageMode: 'auto',
  hyperlinks: true,
  styleVariant: 'dark',
  wrapWidth: 0,
  contextBudget: 50_000,
  statusDurationMs: 5_000,
  apps: {
    browser: 'default',
    editor: 'default',
    email: 'default',
    media: 'default',
  },
};

const WRAP_WIDTH_RANGE = { min: 40, max: 200 };
const CONTEXT_BUDGET_RANGE = { min: 1_000, max: 200_000 };
const STATUS_DURATION_RANGE = { min: 1_000, max: 30_000 };
const IMAGE_MODES: ImageMode[] = ['auto', 'inline', 'external', 'text'];
const STYLE_VARIANTS: StyleVariant[] = ['dark', 'light'];

export function mergeViewerSettings(parsed: unknown): ViewerSettings {
  const source = asRecord(parsed);
  const appsSource = asRecord(source.apps);

  return {
    ...DEFAULT_SETTINGS,
    imageMode: asOneOf(source.imageMode, IMAGE_MODES, DEFAULT_SETTINGS.imageMode),
    hyperlinks: asBoolean(source.hyperlinks, DEFAULT_SETTINGS.hyperlinks),
    styleVariant: asOneOf(source.styleVariant, STYLE_VARIANTS, DEFAULT_SETTINGS.styleVariant),
    wrapWidth: asWrapWidth(source.wrapWidth),
    contextBudget: asNumberInRange(
      source.contextBudget,
      DEFAULT_SETTINGS.contextBudget,
      CONTEXT_BUDGET_RANGE.min,
      CONTEXT_BUDGET_RANGE.max,
      true
    ),
    statusDurationMs: asNumberInRange(
      source.statusDurationMs,
      DEFAULT_SETTINGS.statusDurationMs,
      STATUS_DURATION_RANGE.min,
      STATUS_DURATION_RANGE.max,
      true
    ),
    apps: {
      browser: asAppName(appsSource.browser, DEFAULT_SETTINGS.apps.browser),
      editor: asAppName(appsSource.editor, DEFAULT_SETTINGS.apps.editor),
      email: asAppName(appsSource.email, DEFAULT_SETTINGS.apps.email),
      media: asAppName(appsSource.media, DEFAULT_SETTINGS.apps.media),
    },
  };
}

export function effectiveWrapWidth(settings: ViewerSettings, terminalColumns: number): number {
  if (settings.wrapWidth > 0) {
    return settings.wrapWidth;
  }
  if (!Number.isFinite(terminalColumns) || terminalColumns <= 0) {
    return 80;
  }
  return Math.max(WRAP_WIDTH_RANGE.min, Math.floor(terminalColumns) - 2);
}

function asRecord(value: unknown): Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return {};
  }
  return value as Record<string, unknown>;
}

function asBoolean(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

function asOneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  if (typeof value !== 'string') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  return allowed.find((candidate) => candidate === normalized) ?? fallback;
}

function asAppName(value: unknown, fallback: string): string {
  if (typeof value !== 'string') {
    return fallback;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function asWrapWidth(value: unknown): number {
  if (value === 0) {
    return 0;
  }
  return asNumberInRange(
    value,
    DEFAULT_SETTINGS.wrapWidth,
    WRAP_WIDTH_RANGE.min,
    WRAP_WIDTH_RANGE.max,
    true
  );
}

function asNumberInRange(
  value: unknown,
  fallback: number,
  min: number,
  max: number,
  round = false
): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return fallback;
  }
  const clamped = Math.min(max, Math.max(min, value));
  return round ? Math.round(clamped) : clamped;
}
