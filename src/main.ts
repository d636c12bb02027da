import { dirname, resolve } from 'node:path';

import {
  buildDiagnosticsReport,
  diagnosticsReportFileName,
  ViewerDiagnostics,
} from './application/diagnostics';
import { errorToMessage } from './application/error-message';
import { ReportLoadUseCase } from './application/report-load-use-case';
import type { ViewerSettings } from './application/settings';
import type { LoadedReport } from './domain';
import { DirectoryContextSource } from './infrastructure/directory-context-source';
import { FencedChartSource } from './infrastructure/fenced-chart-source';
import { FileDiagnosticsReportWriter } from './infrastructure/file-diagnostics-report-writer';
import { JsonFileViewerSettingsStore } from './infrastructure/json-settings-store';
import { PackageVersionProvider } from './infrastructure/package-version-provider';
import {
  ChartDirectoryLocator,
  chartsDirectoryFor,
  FsReportFileReader,
} from './infrastructure/report-files';
import { SystemClipboard } from './infrastructure/system-clipboard';
import { SystemHandoff } from './infrastructure/system-handoff';
import { TerminalImageTransport } from './infrastructure/terminal-image-transport';
import { TerminalMarkdownRenderer } from './infrastructure/terminal-markdown-renderer';
import { AppCrashHandlerController } from './presentation/app-crash-handler-controller';
import { ReportViewer } from './presentation/report-viewer';
import { TerminalRuntime } from './presentation/terminal-runtime';

const DIAGNOSTICS_ENV = 'REPORT_VIEWER_DIAGNOSTICS';
const CONTEXT_DIR_ENV = 'REPORT_VIEWER_CONTEXT_DIR';

async function saveDiagnostics(
  diagnostics: ViewerDiagnostics,
  settings: ViewerSettings,
  reportPath: string
): Promise<void> {
  if (process.env[DIAGNOSTICS_ENV] !== '1') {
    return;
  }

  try {
    const generatedAtIso = new Date().toISOString();
    const content = buildDiagnosticsReport({
      generatedAtIso,
      appVersion: await new PackageVersionProvider().getAppVersion(),
      reportPath,
      settings,
      events: diagnostics.events(),
    });
    const path = await new FileDiagnosticsReportWriter().saveReport(
      diagnosticsReportFileName(generatedAtIso),
      content
    );
    process.stderr.write(`Diagnostics written to ${path}\n`);
  } catch (error) {
    process.stderr.write(`Could not write diagnostics: ${errorToMessage(error)}\n`);
  }
}

async function bootstrap(argv: string[]): Promise<number> {
  const argument = argv[2]?.trim();
  if (!argument) {
    process.stderr.write('usage: report-viewer <report.md>\n');
    return 2;
  }

  const reportPath = resolve(argument);
  const settings = await new JsonFileViewerSettingsStore().load();
  const diagnostics = new ViewerDiagnostics();
  const chartsDirectory = chartsDirectoryFor(reportPath);
  const images = new TerminalImageTransport();

  const loadUseCase = new ReportLoadUseCase({
    reader: new FsReportFileReader(),
    renderer: new TerminalMarkdownRenderer(),
    charts: new FencedChartSource(chartsDirectory),
    images,
    getSettings: () => settings,
    diagnostics,
  });

  let report: LoadedReport;
  try {
    report = await loadUseCase.load(reportPath, process.stdout.columns ?? 80);
  } catch (error) {
    process.stderr.write(`report-viewer: ${errorToMessage(error)}\n`);
    await saveDiagnostics(diagnostics, settings, reportPath);
    return 1;
  }

  // Piped output gets the rendered report without the interactive viewer.
  if (!process.stdin.isTTY || !process.stdout.isTTY) {
    process.stdout.write(`${report.renderedLines.join('\n')}\n`);
    return 0;
  }

  const viewer = new ReportViewer({
    report,
    reportPath,
    settings,
    handoff: new SystemHandoff(settings.apps),
    clipboard: new SystemClipboard(),
    // No completion backend ships with the viewer; drafts copy their instruction.
    provider: null,
    contextSource: new DirectoryContextSource({
      directory: process.env[CONTEXT_DIR_ENV]?.trim() || dirname(reportPath),
      exclude: [reportPath],
    }),
    chartLocator: new ChartDirectoryLocator(chartsDirectory),
    diagnostics,
  });

  const shutdown = new AbortController();
  const onShutdownSignal = (signal: NodeJS.Signals) => {
    diagnostics.record('shutdown', signal);
    shutdown.abort();
  };

  const runtime = new TerminalRuntime({
    viewer,
    input: process.stdin,
    output: process.stdout,
    diagnostics,
    signal: shutdown.signal,
  });

  let crashed = false;
  const crashHandlers = new AppCrashHandlerController({
    target: process,
    currentReportPath: () => reportPath,
    onCrash: (reason, detail) => {
      crashed = true;
      diagnostics.record('crash', `${reason}: ${detail}`);
      runtime.restore();
      process.stderr.write(`${reason}: ${detail}\n`);
    },
  });

  crashHandlers.install();
  process.once('SIGTERM', onShutdownSignal);
  process.once('SIGHUP', onShutdownSignal);
  try {
    await runtime.run();
  } finally {
    process.off('SIGTERM', onShutdownSignal);
    process.off('SIGHUP', onShutdownSignal);
    crashHandlers.dispose();
  }

  await saveDiagnostics(diagnostics, settings, reportPath);
  return crashed ? 1 : 0;
}

bootstrap(process.argv).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    process.stderr.write(`report-viewer: ${errorToMessage(error)}\n`);
    process.exitCode = 1;
  }
);
