import { ParloopError, ErrorCode } from '@parloop/core';
import { Logger } from './cli-helpers.js';

export const SUGGESTIONS: Partial<Record<ErrorCode, string[]>> = {
  [ErrorCode.CONFIG_INVALID]: [
    'Check the PARLOOP_* variables in your environment or .env file',
    'PARLOOP_UPDATE_PERIOD takes seconds, for example 0.5',
  ],
  [ErrorCode.INPUT_INVALID]: [
    'Iterations and workers must be positive whole numbers',
    'Run the command with --help to see every option',
  ],
  [ErrorCode.POOL_MISSING]: ['Pass --workers with at least one worker'],
  [ErrorCode.TRANSPORT_BIND_FAILED]: [
    'Check that PARLOOP_HOST names an address of this machine',
    'Use 127.0.0.1 when every worker runs locally',
  ],
  [ErrorCode.WORKER_FAILED]: [
    'Re-run with VERBOSE=true to see worker diagnostics',
    'Lower --workers if the machine is short of memory',
  ],
};

export const ErrorHandler = {
  formatError(error: unknown): void {
    if (error instanceof ParloopError) {
      Logger.fail(error.userMessage);
      if (Object.keys(error.context).length > 0) {
        console.error('   Extra details:');
        for (const [key, value] of Object.entries(error.context)) {
          if (value !== undefined && value !== null) {
            console.error(`   ${key}: ${String(value)}`);
          }
        }
      }
      console.error(`   Code: ${error.code}`);
      const hints = SUGGESTIONS[error.code];
      if (hints && hints.length > 0) {
        console.error('\n💡 Hints:');
        hints.forEach((hint) => {
          Logger.info(`• ${hint}`);
        });
      }
    } else if (error instanceof Error) {
      Logger.fail(error.message);
    } else {
      Logger.fail(`Something went wrong unexpectedly: ${String(error)}`);
    }
  },
  getExitCode(error: unknown): number {
    if (error instanceof ParloopError) {
      switch (error.code) {
        case ErrorCode.CONFIG_INVALID:
        case ErrorCode.INPUT_INVALID:
          return 2;
        case ErrorCode.POOL_MISSING:
          return 3;
        case ErrorCode.TRANSPORT_BIND_FAILED:
        case ErrorCode.TRANSPORT_SEND_FAILED:
          return 4;
        case ErrorCode.WORKER_FAILED:
          return 5;
        default:
          return 1;
      }
    }
    return 1;
  },
  handleCliError(error: unknown): never {
    ErrorHandler.formatError(error);
    const exitCode = ErrorHandler.getExitCode(error);
    process.exit(exitCode);
  },
} as const;
