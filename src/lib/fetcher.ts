import { BASE_DELAY_MS, MAX_ATTEMPTS } from "./constants";
import { FetchExhausted, RateLimited, SourceRejected, TransportFailure, toError } from "./errors";
import { silentLogger, type Logger } from "./log";

export type Transport = (url: string, init: RequestInit) => Promise<Response>;
export type Sleeper = (ms: number) => Promise<void>;
export type QueryParams = Record<string, string | number | boolean | undefined>;
export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export interface FetcherOptions {
  transport?: Transport;
  sleep?: Sleeper;
  logger?: Logger;
  maxAttempts?: number;
  baseDelayMs?: number;
  now?: () => number;
}

export const defaultTransport: Transport = (url, init) => fetch(url, init);

export const realSleep: Sleeper = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Adds the token header every upstream request needs. Readwise expects the `Token` scheme,
 * GitHub accepts both `token` and `Bearer`.
 */
export function createTokenTransport(token: string, scheme = "Token", inner: Transport = defaultTransport): Transport {
  return (url, init) => {
    const headers = new Headers(init.headers);
    headers.set("Authorization", `${scheme} ${token}`);
    if (!headers.has("Content-Type")) {
      headers.set("Content-Type", "application/json");
    }
    return inner(url, { ...init, headers });
  };
}

export function buildUrl(url: string, params: QueryParams = {}): string {
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * Parses a `Retry-After` header: either delta-seconds or an HTTP-date.
 * Returns null when the value is missing or cannot be read.
 */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number(trimmed) * 1000;
  }
  const date = Date.parse(trimmed);
  if (Number.isNaN(date)) return null;
  return Math.max(0, date - now);
}

/**
 * JSON-over-HTTP helper shared by the Readwise sources. Transport failures and 429s are
 * retried with exponential backoff; anything else that is not 2xx is surfaced immediately.
 * Sleeps are never cancelled, so a run can block for the sum of every backoff delay.
 */
export class ResilientFetcher {
  private readonly transport: Transport;
  private readonly sleep: Sleeper;
  private readonly logger: Logger;
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;
  private readonly now: () => number;

  constructor(options: FetcherOptions = {}) {
    this.transport = options.transport ?? defaultTransport;
    this.sleep = options.sleep ?? realSleep;
    this.logger = options.logger ?? silentLogger;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? MAX_ATTEMPTS);
    this.baseDelayMs = options.baseDelayMs ?? BASE_DELAY_MS;
    this.now = options.now ?? Date.now;
  }

  async fetch(method: HttpMethod, url: string, params: QueryParams = {}): Promise<unknown> {
    const target = buildUrl(url, params);
    let lastError: Error = new TransportFailure(`No attempt made for ${method} ${target}`);

    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      try {
        return await this.attempt(method, target);
      } catch (error) {
        if (error instanceof SourceRejected) {
          throw error;
        }
        lastError = toError(error);
        if (attempt === this.maxAttempts - 1) {
          break;
        }
        const delay = this.delayFor(lastError, attempt);
        if (lastError instanceof RateLimited) {
          this.logger.warn(`Rate limited. Waiting ${delay / 1000}s before retry ${attempt + 1}/${this.maxAttempts - 1}`);
        } else {
          this.logger.warn(`Request failed (attempt ${attempt + 1}/${this.maxAttempts}): ${lastError.message}`);
        }
        await this.sleep(delay);
      }
    }

    throw new FetchExhausted(
      `Request failed after ${this.maxAttempts} attempts: ${lastError.message}`,
      this.maxAttempts,
      lastError
    );
  }

  private async attempt(method: HttpMethod, url: string): Promise<unknown> {
    let response: Response;
    try {
      response = await this.transport(url, { method });
    } catch (error) {
      throw new TransportFailure(`${method} ${url} failed: ${toError(error).message}`, { cause: error });
    }

    if (response.status === 429) {
      const hint = parseRetryAfter(response.headers.get("Retry-After"), this.now());
      await response.body?.cancel();
      throw new RateLimited(`${method} ${url} returned 429`, hint);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "(no body)");
      throw new SourceRejected(`${method} ${url} returned ${response.status}: ${text.slice(0, 200)}`, response.status, text);
    }

    try {
      return await response.json();
    } catch (error) {
      throw new TransportFailure(`${method} ${url} returned an unreadable body`, { cause: error });
    }
  }

  private delayFor(error: Error, attempt: number): number {
    if (error instanceof RateLimited && error.retryAfterMs !== null) {
      return error.retryAfterMs;
    }
    return this.baseDelayMs * Math.pow(2, attempt);
  }
}
