export type ActionKind = 'draft' | 'open' | 'configure' | 'play';

export interface ReportAction {
  kind: ActionKind;
  description: string;
  target: string;
}

export interface ParsedHeading {
  text: string;
  level: number;
  rawLine: number;
}

export interface SectionHeading extends ParsedHeading {
  renderedLine: number;
  visibleLine: number;
  endLine: number;
  collapsed: boolean;
}

export interface LinkEntry {
  url: string;
  label: string;
}

export interface Draft {
  to: string;
  subject: string;
  body: string;
  raw: string;
}

export type ChartType = 'bar' | 'line' | 'pie';

export interface ChartDirective {
  type: ChartType;
  title: string;
  labels: string[];
  values: number[];
}

export type ImageTier = 'none' | 'kitty' | 'iterm';

export type StyleVariant = 'dark' | 'light';

export interface LoadedReport {
  title: string;
  raw: string;
  renderedLines: string[];
  headings: SectionHeading[];
  actions: ReportAction[];
  links: LinkEntry[];
  hasCharts: boolean;
  imageTier: ImageTier;
}
