import type { LoadedReport } from '../domain';
import { renderWithCharts } from './chart-markers';
import type { DiagnosticsRecorder } from './diagnostics';
import { errorToMessage } from './error-message';
import { mapHeadingPositions } from './heading-positions';
import type {
  ChartSource,
  ImageTransport,
  MarkdownRenderer,
  ReportFileReader,
} from './ports';
import { parseActions, parseHeadings, parseLinks } from './report-structure';
import { effectiveWrapWidth, type ViewerSettings } from './settings';

interface ReportLoadUseCaseDeps {
  reader: ReportFileReader;
  renderer: MarkdownRenderer;
  charts: ChartSource;
  images: ImageTransport;
  getSettings: () => ViewerSettings;
  diagnostics?: DiagnosticsRecorder;
}

export class ReportLoadUseCase {
  private readonly deps: ReportLoadUseCaseDeps;

  constructor(deps: ReportLoadUseCaseDeps) {
    this.deps = deps;
  }

  async load(path: string, terminalColumns: number): Promise<LoadedReport> {
    const markdown = await this.deps.reader.readReport(path);
    return this.build(markdown, fileTitle(path), terminalColumns);
  }

  async build(markdown: string, fallbackTitle: string, terminalColumns: number): Promise<LoadedReport> {
    const settings = this.deps.getSettings();
    const tier = this.deps.images.detectTier(settings.imageMode);

    let rendered: string;
    try {
      const result = await renderWithCharts({
        markdown,
        width: effectiveWrapWidth(settings, terminalColumns),
        styleVariant: settings.styleVariant,
        tier,
        renderer: this.deps.renderer,
        charts: this.deps.charts,
        images: this.deps.images,
      });
      rendered = result.rendered;
    } catch (error) {
      this.deps.diagnostics?.record('render-failure', errorToMessage(error));
      throw error;
    }

    const parsedHeadings = parseHeadings(markdown);
    const renderedLines = rendered.split('\n');
    const headings = mapHeadingPositions(parsedHeadings, renderedLines);
    const report: LoadedReport = {
      title: parsedHeadings.find((heading) => heading.level === 1)?.text ?? fallbackTitle,
      raw: markdown,
      renderedLines,
      headings,
      actions: parseActions(markdown),
      links: parseLinks(markdown),
      hasCharts: markdown.includes('```chart'),
      imageTier: tier,
    };

    this.deps.diagnostics?.record(
      'load',
      `${report.headings.length} headings, ${report.actions.length} actions, ${report.links.length} links`
    );
    return report;
  }
}

function fileTitle(path: string): string {
  const name = path.replaceAll('\\', '/').split('/').pop() ?? path;
  return name.replace(/\.(md|markdown)$/i, '') || path;
}
