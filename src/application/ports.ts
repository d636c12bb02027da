import type { ChartDirective, ImageTier, StyleVariant } from '../domain';
import type { ImageMode, ViewerSettings } from './settings';

export interface ReportFileReader {
  readReport(path: string): Promise<string>;
}

export interface MarkdownRenderer {
  render(markdown: string, width: number, styleVariant: StyleVariant): Promise<string>;
}

export interface Handoff {
  openUrl(url: string): Promise<void>;
  openFile(path: string): Promise<void>;
  openMailto(to: string, subject: string, body: string): Promise<void>;
  playMedia(path: string): Promise<void>;
}

export interface Clipboard {
  copy(text: string): Promise<void>;
}

export interface CompletionProvider {
  complete(signal: AbortSignal, systemPrompt: string, userPrompt: string): Promise<string>;
}

export interface ContextSource {
  gatherContext(maxUnits: number): Promise<string>;
}

export interface ChartSource {
  findDirectives(markdown: string): ChartDirective[];
  replaceDirectives(markdown: string, tokens: string[]): string;
  renderFallback(directive: ChartDirective): string;
  loadImage(directive: ChartDirective, index: number): Promise<Uint8Array | null>;
}

export interface ImageTransport {
  detectTier(mode: ImageMode): ImageTier;
  encodeInline(png: Uint8Array, tier: ImageTier): string | null;
}

export interface ChartFileLocator {
  firstChartFile(): Promise<string | null>;
}

export interface ViewerSettingsStore {
  load(): Promise<ViewerSettings>;
}

export interface DiagnosticsReportWriter {
  saveReport(fileName: string, content: string): Promise<string>;
}

export interface AppVersionProvider {
  getAppVersion(): Promise<string>;
}
