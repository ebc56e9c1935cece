import { getLogger, type Logger } from '@bankwire/logger';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch } from 'undici';
import type { ZodType, ZodTypeDef } from 'zod';

import * as HttpUtils from './core/http-utils.js';
import type { FetchResponse, HttpEffects } from './core/types.js';
import { createRetryPolicy } from './core/types.js';
import type {
  HttpClientConfig,
  HttpClientError,
  HttpClientHooks,
  HttpMethod,
  HttpRequestOptions,
  HttpRequestOptionsWithSchema,
  RetryPolicy,
} from './types.js';
import {
  ClientClosedError,
  HttpError,
  NetworkError,
  ResponseParseError,
  ResponseValidationError,
  RetryExhaustedError,
} from './types.js';

type ResponseSchema = ZodType<unknown, ZodTypeDef, unknown>;

type AttemptOutcome =
  | { kind: 'network'; error: NetworkError }
  | { kind: 'response'; response: FetchResponse; text: string };

interface RequestContext {
  attempts: number;
  endpoint: string;
  method: HttpMethod;
  sanitizedEndpoint: string;
  startTime: number;
  url: string;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class HttpClient {
  private readonly config: HttpClientConfig;
  private readonly retryPolicy: RetryPolicy;
  private readonly defaultHeaders: Record<string, string>;
  private readonly timeout: number;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Set once by close(); its presence is the terminal closed state
  private closePromise: Promise<void> | undefined;

  constructor(config: HttpClientConfig, effects?: Partial<HttpEffects>) {
    this.config = config;
    this.retryPolicy = createRetryPolicy(config.retry);
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      throw new Error(`Invalid HTTP client configuration: timeout must be a positive number, got ${this.timeout}`);
    }
    this.defaultHeaders = {
      Accept: 'application/json',
      'User-Agent': 'bankwire/1.0.0',
      ...config.defaultHeaders,
    };

    this.logger = config.logger ?? getLogger(`HttpClient:${config.clientName}`);

    // Pooled keep-alive connections, released by close()
    this.agent = new Agent({
      keepAliveTimeout: config.pool?.keepAliveTimeoutMs ?? 10_000,
      keepAliveMaxTimeout: config.pool?.keepAliveMaxTimeoutMs ?? 60_000,
      pipelining: 1,
      ...(config.pool?.connections !== undefined ? { connections: config.pool.connections } : {}),
    });

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      log: (level, message, metadata) => {
        if (metadata) {
          this.logger[level](metadata, message);
        } else {
          this.logger[level](message);
        }
      },
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP client initialized - BaseUrl: ${HttpUtils.stripTrailingSlashes(config.baseUrl)}, Timeout: ${this.timeout}ms, MaxRetries: ${this.retryPolicy.maxRetries}, BackoffFactor: ${this.retryPolicy.backoffFactorMs}ms`
    );
  }

  get isClosed(): boolean {
    return this.closePromise !== undefined;
  }

  get policy(): Readonly<RetryPolicy> {
    return this.retryPolicy;
  }

  /**
   * GET with schema validation of the response body
   */
  async get<T>(endpoint: string, options: Omit<HttpRequestOptionsWithSchema<T>, 'method' | 'body'>): Promise<Result<T, HttpClientError>>;
  /**
   * GET returning the parsed JSON body unvalidated
   */
  async get(endpoint: string, options?: Omit<HttpRequestOptions, 'method' | 'body'>): Promise<Result<unknown, HttpClientError>>;
  async get(
    endpoint: string,
    options: Omit<HttpRequestOptions, 'method' | 'body'> & { schema?: ResponseSchema | undefined } = {}
  ): Promise<Result<unknown, HttpClientError>> {
    const { schema, ...rest } = options;
    return this.execute(endpoint, { ...rest, method: 'GET' }, schema);
  }

  /**
   * POST with schema validation of the response body
   */
  async post<T>(
    endpoint: string,
    body: string | object | undefined,
    options: Omit<HttpRequestOptionsWithSchema<T>, 'method' | 'body'>
  ): Promise<Result<T, HttpClientError>>;
  /**
   * POST returning the parsed JSON body unvalidated
   */
  async post(
    endpoint: string,
    body?: string | object,
    options?: Omit<HttpRequestOptions, 'method' | 'body'>
  ): Promise<Result<unknown, HttpClientError>>;
  async post(
    endpoint: string,
    body?: string | object,
    options: Omit<HttpRequestOptions, 'method' | 'body'> & { schema?: ResponseSchema | undefined } = {}
  ): Promise<Result<unknown, HttpClientError>> {
    const { schema, ...rest } = options;
    return this.execute(endpoint, { ...rest, body, method: 'POST' }, schema);
  }

  /**
   * Make an HTTP request with retries, per-attempt timeout and error classification
   */
  async request<T>(endpoint: string, options: HttpRequestOptionsWithSchema<T>): Promise<Result<T, HttpClientError>>;
  async request(endpoint: string, options?: HttpRequestOptions): Promise<Result<unknown, HttpClientError>>;
  async request(
    endpoint: string,
    options: HttpRequestOptions & { schema?: ResponseSchema | undefined } = {}
  ): Promise<Result<unknown, HttpClientError>> {
    const { schema, ...rest } = options;
    return this.execute(endpoint, rest, schema);
  }

  /**
   * Release pooled connections. Idempotent: every call returns the same promise,
   * and requests made after the first call fail with ClientClosedError. A failed
   * agent shutdown is logged, not rejected.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private async execute(
    endpoint: string,
    options: HttpRequestOptions,
    schema: ResponseSchema | undefined
  ): Promise<Result<unknown, HttpClientError>> {
    const method = options.method ?? 'GET';
    const url = HttpUtils.buildUrl(this.config.baseUrl, endpoint);
    const sanitizedEndpoint = HttpUtils.sanitizeEndpoint(endpoint);

    if (this.isClosed) {
      this.effects.log('warn', `Request rejected, client is closed - Method: ${method}, Endpoint: ${sanitizedEndpoint}`);
      return err(new ClientClosedError(this.config.clientName));
    }

    const timeout = options.timeout ?? this.timeout;
    const maxAttempts = this.retryPolicy.maxRetries + 1;
    const retryableMethod = HttpUtils.isRetryableMethod(method, this.retryPolicy);
    const hooks = this.config.hooks;

    const headers: Record<string, string> = {
      ...this.defaultHeaders,
      ...options.headers,
    };

    // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
    let body: string | null = null;
    if (options.body !== undefined) {
      if (typeof options.body === 'object') {
        body = JSON.stringify(options.body);
        headers['Content-Type'] ??= 'application/json';
      } else {
        body = options.body;
      }
    }

    const context: RequestContext = {
      attempts: 0,
      endpoint,
      method,
      sanitizedEndpoint,
      startTime: this.effects.now(),
      url,
    };
    hooks?.onRequestStart?.({ endpoint: sanitizedEndpoint, method, timestamp: context.startTime });

    for (let attempt = 1; ; attempt++) {
      if (attempt > 1 && this.isClosed) {
        return this.fail(context, new ClientClosedError(this.config.clientName), hooks);
      }

      context.attempts = attempt;
      const outcome = await this.attempt(url, method, headers, body, timeout, attempt, maxAttempts);

      if (outcome.kind === 'response' && outcome.response.ok) {
        const parsed = this.parseBody(outcome.text, outcome.response.status, context, schema);
        if (parsed.isErr()) {
          return this.fail(context, parsed.error, hooks, outcome.response.status);
        }
        hooks?.onRequestSuccess?.({
          attempts: attempt,
          durationMs: this.effects.now() - context.startTime,
          endpoint: sanitizedEndpoint,
          method,
          status: outcome.response.status,
        });
        return ok(parsed.value);
      }

      const failure =
        outcome.kind === 'network'
          ? outcome.error
          : new HttpError(`HTTP ${outcome.response.status}: ${outcome.text}`, outcome.response.status, outcome.text);
      const status = outcome.kind === 'response' ? outcome.response.status : undefined;
      const retryableOutcome =
        outcome.kind === 'network' || HttpUtils.classifyStatus(outcome.response.status, this.retryPolicy).shouldRetry;

      this.effects.log(
        'warn',
        `Request failed - URL: ${HttpUtils.sanitizeUrl(url)}, Attempt: ${attempt}/${maxAttempts}, Error: ${failure.message}`,
        { clientName: this.config.clientName, method, status }
      );

      if (!retryableOutcome || !retryableMethod) {
        return this.fail(context, failure, hooks, status);
      }

      if (attempt >= maxAttempts) {
        const exhausted =
          attempt > 1
            ? new RetryExhaustedError(
                `Request failed after ${attempt} attempts: ${failure.message}`,
                attempt,
                status,
                failure
              )
            : failure;
        return this.fail(context, exhausted, hooks, status);
      }

      const retryDelay = HttpUtils.resolveRetryDelay(
        attempt,
        this.retryPolicy,
        outcome.kind === 'response' ? outcome.response : undefined,
        this.effects.now()
      );
      this.effects.log(
        'debug',
        `Retrying after delay - Delay: ${retryDelay.delayMs}ms, Source: ${retryDelay.source}, NextAttempt: ${attempt + 1}`
      );
      hooks?.onBackoff?.({
        attemptNumber: attempt,
        delayMs: retryDelay.delayMs,
        reason: outcome.kind === 'network' ? 'network' : 'status',
        status,
      });
      await this.effects.delay(retryDelay.delayMs);
    }
  }

  /**
   * One physical attempt. The body is read inside the timeout window, so a
   * stalled body counts as a timeout as well.
   */
  private async attempt(
    url: string,
    method: HttpMethod,
    headers: Record<string, string>,
    body: string | null,
    timeout: number,
    attempt: number,
    maxAttempts: number
  ): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      this.effects.log(
        'debug',
        `Making HTTP request - URL: ${HttpUtils.sanitizeUrl(url)}, Method: ${method}, Attempt: ${attempt}/${maxAttempts}`
      );

      const response = await this.effects.fetch(url, {
        body,
        headers,
        method,
        signal: controller.signal,
      });
      const text = await response.text();
      return { kind: 'response', response, text };
    } catch (error) {
      const timedOut = controller.signal.aborted;
      const message = timedOut
        ? `Request timeout after ${timeout}ms`
        : `Network error: ${error instanceof Error ? error.message : String(error)}`;
      return { kind: 'network', error: new NetworkError(message, timedOut, { cause: error }) };
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private parseBody(
    text: string,
    status: number,
    context: RequestContext,
    schema: ResponseSchema | undefined
  ): Result<unknown, ResponseParseError | ResponseValidationError> {
    let data: unknown;
    if (status !== 204 && text.trim() !== '') {
      try {
        data = JSON.parse(text);
      } catch (error) {
        const truncatedPayload = text.slice(0, 500);
        this.effects.log('error', `Response body is not valid JSON - URL: ${HttpUtils.sanitizeUrl(context.url)}`, {
          clientName: this.config.clientName,
          error,
          status,
          truncatedPayload,
        });
        return err(
          new ResponseParseError(`Response body is not valid JSON (HTTP ${status})`, context.endpoint, truncatedPayload)
        );
      }
    }

    if (!schema) {
      return ok(data);
    }

    const parseResult = schema.safeParse(data);
    if (parseResult.success) {
      return ok(parseResult.data);
    }

    const allIssues = parseResult.error.issues.map((issue) => ({
      message: issue.message,
      path: issue.path.join('.'),
    }));

    const firstFiveErrors = allIssues
      .slice(0, 5)
      .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
      .join('; ');

    const truncatedPayload = (JSON.stringify(data) ?? '').slice(0, 500);

    this.effects.log(
      'error',
      `Response validation failed (showing first 5 of ${allIssues.length} errors): ${firstFiveErrors}`,
      {
        clientName: this.config.clientName,
        method: context.method,
        status,
        truncatedPayload,
        url: HttpUtils.sanitizeUrl(context.url),
      }
    );

    return err(
      new ResponseValidationError(
        `Response validation failed: ${firstFiveErrors}`,
        this.config.clientName,
        context.endpoint,
        allIssues,
        truncatedPayload
      )
    );
  }

  private fail(
    context: RequestContext,
    error: HttpClientError,
    hooks: HttpClientHooks | undefined,
    status?: number
  ): Result<never, HttpClientError> {
    hooks?.onRequestFailure?.({
      attempts: context.attempts,
      durationMs: this.effects.now() - context.startTime,
      endpoint: context.sanitizedEndpoint,
      error: error.message,
      method: context.method,
      status,
    });
    return err(error);
  }
}
