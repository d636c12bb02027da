import type { EventEmitter } from 'node:events';

import { errorToMessage } from '../application/error-message';

interface AppCrashHandlerControllerDeps {
  target: EventEmitter;
  currentReportPath: () => string | null;
  onCrash: (reason: string, detail: string, reportPath: string | null) => void;
}

export class AppCrashHandlerController {
  private readonly deps: AppCrashHandlerControllerDeps;
  private uncaughtExceptionHandler: ((error: unknown) => void) | null = null;
  private unhandledRejectionHandler: ((reason: unknown) => void) | null = null;

  constructor(deps: AppCrashHandlerControllerDeps) {
    this.deps = deps;
  }

  install(): void {
    if (!this.uncaughtExceptionHandler) {
      this.uncaughtExceptionHandler = (error) => {
        this.deps.onCrash('Runtime error detected', errorToMessage(error), this.deps.currentReportPath());
      };
      this.deps.target.on('uncaughtException', this.uncaughtExceptionHandler);
    }

    if (!this.unhandledRejectionHandler) {
      this.unhandledRejectionHandler = (reason) => {
        this.deps.onCrash(
          'Unhandled promise rejection',
          errorToMessage(reason),
          this.deps.currentReportPath()
        );
      };
      this.deps.target.on('unhandledRejection', this.unhandledRejectionHandler);
    }
  }

  dispose(): void {
    if (this.uncaughtExceptionHandler) {
      this.deps.target.off('uncaughtException', this.uncaughtExceptionHandler);
      this.uncaughtExceptionHandler = null;
    }

    if (this.unhandledRejectionHandler) {
      this.deps.target.off('unhandledRejection', this.unhandledRejectionHandler);
      this.unhandledRejectionHandler = null;
    }
  }
}
