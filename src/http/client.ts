/**
 * Rate-limited HTTP client for one external service.
 *
 * Each attempt acquires a token from the service's limiter, then issues a GET
 * with a timeout. Outcomes are classified as success, retry or fail; only
 * connection failures, timeouts and HTTP 429 are retried, with exponential
 * backoff. Results are returned as values, never thrown.
 */

import { describeError } from "../errors.js";
import { createLogger, type Logger } from "../logger.js";
import type { RateLimiter } from "./rate-limiter.js";

export const USER_AGENT = "accession-metadata/0.1.0";

/** Default timeout for JSON metadata calls */
export const METADATA_TIMEOUT_MS = 30_000;
/** Default timeout for large file downloads */
export const DOWNLOAD_TIMEOUT_MS = 90_000;

export type HttpResult<T> = { ok: true; value: T } | { ok: false; error: string };

export interface RetryOptions {
  /** Total attempts per call (default: 3) */
  retries?: number;
  /** Base delay before the first retry in ms (default: 1000) */
  retryDelay?: number;
  /** Upper bound on a single backoff delay in ms (default: 10000) */
  maxRetryDelay?: number;
}

export interface ServiceClientOptions extends RetryOptions {
  /** Service name used in logs and error messages */
  name: string;
  limiter: RateLimiter;
  /** Query parameters added to every request (e.g. api_key) */
  defaultParams?: Record<string, string>;
  /** Per-call timeout in ms (default: 30000) */
  timeoutMs?: number;
  userAgent?: string;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

export interface RequestOptions {
  timeoutMs?: number;
}

export interface ServiceClient {
  readonly name: string;
  getJson(
    url: string,
    params?: Record<string, string>,
    options?: RequestOptions
  ): Promise<HttpResult<unknown>>;
  getBytes(
    url: string,
    params?: Record<string, string>,
    options?: RequestOptions
  ): Promise<HttpResult<Buffer>>;
}

export type StatusClass = "success" | "retry" | "fail";

/**
 * Classify an HTTP status code.
 * 429 is treated like a dropped connection so that it backs off instead of failing.
 */
export function classifyStatus(status: number): StatusClass {
  if (status >= 200 && status < 300) return "success";
  if (status === 429) return "retry";
  return "fail";
}

/**
 * Backoff before retrying after the given (1-based) attempt:
 * base, 2*base, 4*base, ... capped at maxDelay.
 */
export function backoffDelay(attempt: number, baseDelay: number, maxDelay: number): number {
  const exponential = baseDelay * 2 ** (attempt - 1);
  return Math.min(Math.max(exponential, baseDelay), maxDelay);
}

function isTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/** Hide credentials before a URL is written to the log */
export function redactUrl(url: string): string {
  const target = new URL(url);
  if (target.searchParams.has("api_key")) target.searchParams.set("api_key", "***");
  return target.toString();
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

type AttemptResult<T> =
  | { kind: "success"; value: T }
  | { kind: "fail"; error: string }
  | { kind: "retry"; error: string };

type BodyReader<T> = (response: Response) => Promise<T>;

/** 204 No Content reads as null */
const readJson: BodyReader<unknown> = (response) =>
  response.status === 204 ? Promise.resolve(null) : response.json();

const readBytes: BodyReader<Buffer> = async (response) =>
  Buffer.from(await response.arrayBuffer());

/**
 * Create a client bound to one service's limiter and defaults.
 */
export function createServiceClient(options: ServiceClientOptions): ServiceClient {
  const retries = Math.max(1, options.retries ?? 3);
  const retryDelay = options.retryDelay ?? 1000;
  const maxRetryDelay = options.maxRetryDelay ?? 10_000;
  const defaultTimeout = options.timeoutMs ?? METADATA_TIMEOUT_MS;
  const userAgent = options.userAgent ?? USER_AGENT;
  const logger = options.logger ?? createLogger({ level: "warn" });
  const sleep = options.sleep ?? defaultSleep;

  function buildUrl(url: string, params?: Record<string, string>): string {
    const target = new URL(url);
    for (const [key, value] of Object.entries(options.defaultParams ?? {})) {
      target.searchParams.set(key, value);
    }
    for (const [key, value] of Object.entries(params ?? {})) {
      target.searchParams.set(key, value);
    }
    return target.toString();
  }

  async function attempt<T>(
    url: string,
    timeoutMs: number,
    read: BodyReader<T>
  ): Promise<AttemptResult<T>> {
    await options.limiter.acquire();

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { "User-Agent": userAgent },
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (err) {
      return { kind: "retry", error: describeError(err) };
    }

    const statusClass = classifyStatus(response.status);
    if (statusClass !== "success") {
      // Release the connection
      await response.body?.cancel();
      return { kind: statusClass, error: `HTTP ${response.status} ${response.statusText}` };
    }

    try {
      return { kind: "success", value: await read(response) };
    } catch (err) {
      if (isTimeout(err)) return { kind: "retry", error: describeError(err) };
      return { kind: "fail", error: `Invalid response body: ${describeError(err)}` };
    }
  }

  async function request<T>(
    url: string,
    params: Record<string, string> | undefined,
    requestOptions: RequestOptions | undefined,
    read: BodyReader<T>
  ): Promise<HttpResult<T>> {
    const fullUrl = buildUrl(url, params);
    const logUrl = redactUrl(fullUrl);
    const timeoutMs = requestOptions?.timeoutMs ?? defaultTimeout;
    let lastError = "Request failed";

    for (let n = 1; n <= retries; n++) {
      const outcome = await attempt(fullUrl, timeoutMs, read);
      if (outcome.kind === "success") return { ok: true, value: outcome.value };
      if (outcome.kind === "fail") {
        logger.debug(`${options.name} request failed`, { url: logUrl, error: outcome.error });
        return { ok: false, error: outcome.error };
      }

      lastError = outcome.error;
      if (n < retries) {
        const delay = backoffDelay(n, retryDelay, maxRetryDelay);
        logger.warn(`${options.name} request failed, retrying`, {
          url: logUrl,
          attempt: n,
          delayMs: delay,
          error: outcome.error,
        });
        await sleep(delay);
      }
    }

    logger.warn(`${options.name} request gave up after ${retries} attempts`, {
      url: logUrl,
      error: lastError,
    });
    return { ok: false, error: lastError };
  }

  return {
    name: options.name,
    getJson: (url, params, requestOptions) => request(url, params, requestOptions, readJson),
    getBytes: (url, params, requestOptions) => request(url, params, requestOptions, readBytes),
  };
}
