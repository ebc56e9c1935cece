import { flushLoggers, getLogger } from '@bankwire/logger';
import * as p from '@clack/prompts';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, exitCodeToErrorCode } from './cli-response.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * OutputManager handles formatting and displaying CLI output.
 * Supports both human-readable text output and machine-readable JSON.
 */
export class OutputManager {
  private startTime: number = Date.now();

  constructor(private format: OutputFormat = 'text') {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Output a success response (only in JSON mode).
   */
  json<T>(command: string, data: T, metadata?: Record<string, unknown>): void {
    if (this.format === 'json') {
      const duration_ms = Date.now() - this.startTime;
      const response = createSuccessResponse(command, data, {
        duration_ms,
        ...metadata,
      });
      console.log(JSON.stringify(response, undefined, 2));
    }
  }

  /**
   * Output an error response and exit.
   */
  error(command: string, error: Error, exitCode: ExitCode = ExitCodes.GENERAL_ERROR, details?: unknown): never {
    const errorCode = exitCodeToErrorCode(exitCode);
    const response = createErrorResponse(command, error, errorCode, details);

    if (this.format === 'json') {
      // stdout, so callers can parse the response
      console.log(JSON.stringify(response, undefined, 2));
    } else {
      this.displayTextError(error, errorCode);
    }

    flushLoggers();
    process.exit(exitCode);
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  /**
   * Heading for one step of a multi-step command.
   */
  step(message: string): void {
    if (this.format === 'text') {
      p.log.step(pc.bold(message));
    }
  }

  log(message: string): void {
    if (this.format === 'text') {
      p.log.message(message, { spacing: 0 });
    }
  }

  success(message: string): void {
    if (this.format === 'text') {
      p.log.success(pc.green(message));
    }
  }

  /**
   * Report a failure that does not end the command (only in text mode).
   */
  failure(message: string): void {
    if (this.format === 'text') {
      p.log.error(pc.red(message));
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      // In JSON mode, warnings go to the log sinks
      logger.warn(message);
    }
  }

  private displayTextError(error: Error, code: string): void {
    p.log.error(`${pc.red('Error')}: ${error.message}`);

    if (code === 'INVALID_ARGS') {
      p.note('Check your command arguments and try again.\nRun with --help for usage information.', 'Tip');
    } else if (code === 'AUTHENTICATION_ERROR') {
      p.note('Check --username and --password, then try again.', 'How to fix');
    } else if (code === 'NETWORK_ERROR' || code === 'TIMEOUT') {
      p.note(
        'Check that the banking service is running and reachable.\nSet the address with --base-url or BANKWIRE_BASE_URL.',
        'How to fix'
      );
    } else if (code === 'CONFIG_ERROR') {
      p.note('Check the BANKWIRE_* variables in your environment or .env file.', 'How to fix');
    }

    if (process.env['NODE_ENV'] === 'development' && error.stack) {
      logger.debug(`Stack trace:\n${error.stack}`);
    }
  }
}
