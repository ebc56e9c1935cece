import {
  loadBankingClientConfig,
  type BankingClient,
  type BankingClientOptions,
  type BankingError,
} from '@bankwire/banking-client';
import { ConsoleSink, FileSink, initLogger, isLogLevel, type LogLevel, type Sink } from '@bankwire/logger';
import { err, ok, type Result } from 'neverthrow';
import type { ZodType, ZodTypeDef } from 'zod';

import { exitCodeForAuthError, exitCodeForError } from './error-mapping.js';
import { ExitCodes, type ExitCode } from './exit-codes.js';
import { OutputManager } from './output.js';
import type { AuthOptions, GlobalOptions } from './schemas.js';

type Env = Readonly<Record<string, string | undefined>>;

export interface CommandFailure {
  error: BankingError;
  exitCode: ExitCode;
}

export interface PreparedCommand<TOptions> {
  clientOptions: BankingClientOptions;
  options: TOptions;
  output: OutputManager;
}

export interface LoggingOptions {
  json?: boolean | undefined;
  logFile?: string | undefined;
  verbose?: boolean | undefined;
}

/**
 * --verbose wins, then LOG_LEVEL, then warn.
 */
export function resolveLogLevel(options: LoggingOptions, env: Env = process.env): LogLevel {
  if (options.verbose) {
    return 'debug';
  }
  const fromEnv = env['LOG_LEVEL']?.trim().toLowerCase();
  if (fromEnv !== undefined && isLogLevel(fromEnv)) {
    return fromEnv;
  }
  return 'warn';
}

/**
 * Logs go to stderr so stdout carries only command output. --log-file adds a JSON-lines file.
 */
export function configureCliLogging(options: LoggingOptions, env: Env = process.env): void {
  const sinks: Sink[] = [new ConsoleSink({ color: !options.json && process.stderr.isTTY, routing: 'stderr' })];
  if (options.logFile) {
    sinks.push(new FileSink({ path: options.logFile }));
  }
  initLogger({ level: resolveLogLevel(options, env), sinks });
}

/**
 * Client configuration from BANKWIRE_* variables, overridden by global flags.
 */
export function resolveClientOptions(options: GlobalOptions, env: Env = process.env): Result<BankingClientOptions, Error> {
  return loadBankingClientConfig(env, {
    baseUrl: options.baseUrl,
    timeoutMs: options.timeout === undefined ? undefined : options.timeout * 1000,
    maxRetries: options.maxRetries,
  }).map((config) => ({ config }));
}

/**
 * Validate options at the CLI boundary, set up logging and build the client
 * options. Exits with INVALID_ARGS or CONFIG_ERROR on failure.
 */
export function prepareCommand<TOptions extends GlobalOptions & { json?: boolean | undefined }>(
  commandName: string,
  schema: ZodType<TOptions, ZodTypeDef, unknown>,
  rawOptions: unknown
): PreparedCommand<TOptions> {
  // Check for --json early (even before validation) to determine output format
  const isJsonMode =
    typeof rawOptions === 'object' && rawOptions !== null && 'json' in rawOptions && rawOptions.json === true;

  const validationResult = schema.safeParse(rawOptions);
  if (!validationResult.success) {
    const output = new OutputManager(isJsonMode ? 'json' : 'text');
    const firstError = validationResult.error.issues[0];
    return output.error(commandName, new Error(firstError?.message ?? 'Invalid options'), ExitCodes.INVALID_ARGS);
  }

  const options = validationResult.data;
  const output = new OutputManager(options.json ? 'json' : 'text');
  configureCliLogging(options);

  const clientOptions = resolveClientOptions(options);
  if (clientOptions.isErr()) {
    return output.error(commandName, clientOptions.error, ExitCodes.CONFIG_ERROR);
  }

  return { clientOptions: clientOptions.value, options, output };
}

export function toFailure(error: BankingError): CommandFailure {
  return { error, exitCode: exitCodeForError(error) };
}

/**
 * Authenticate when --auth was given. Resolves to whether a token is now held.
 */
export async function authenticateIfRequested(
  client: BankingClient,
  options: AuthOptions
): Promise<Result<boolean, CommandFailure>> {
  if (!options.auth) {
    return ok(false);
  }

  const result = await client.authenticate(options.username, options.password);
  if (result.isErr()) {
    return err({ error: result.error, exitCode: exitCodeForAuthError(result.error) });
  }
  return ok(true);
}

export function exitWithFailure(output: OutputManager, commandName: string, failure: CommandFailure): never {
  return output.error(commandName, failure.error, failure.exitCode, failure.error.toJSON());
}
