import pc from 'picocolors';
import { AppError, scrubErrorMessage } from '@repoindex/shared';

/**
 * JSON to stdout under `--json`, otherwise whatever the command prints.
 */
export class OutputRenderer {
  constructor(readonly isJson: boolean) {}

  render(data: unknown, human: () => void): void {
    if (this.isJson) {
      console.log(JSON.stringify(data, null, 2));
    } else {
      human();
    }
  }

  log(message: string): void {
    if (this.isJson) {
      // JSON mode should not have logs
    } else {
      console.log(pc.gray(message));
    }
  }

  error(error: unknown, verbose = false): void {
    const message = scrubErrorMessage(error);
    if (this.isJson) {
      console.log(
        JSON.stringify({
          error: {
            code: error instanceof AppError ? error.code : 'UnknownError',
            message,
            ...(error instanceof AppError && error.details !== undefined
              ? { details: error.details }
              : {}),
          },
        }),
      );
      return;
    }

    console.error(pc.red(`Error: ${message}`));
    if (error instanceof AppError && error.details) {
      const details =
        typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2);
      console.error(`  Details: ${details}`);
    }
    if (verbose && error instanceof Error && error.stack) {
      console.error(`\nStack Trace:\n${scrubErrorMessage(error.stack)}`);
    } else {
      console.error(pc.gray('\nFor more details, run with the --verbose flag.'));
    }
  }
}
