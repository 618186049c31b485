import axios, { AxiosRequestConfig } from "axios";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
  /** Stops retrying, and any pending backoff, once aborted. */
  signal?: AbortSignal;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

/** One JSON GET: axios settings plus the retry and per-host breaker policy around it. */
export interface JsonRequest extends Omit<AxiosRequestConfig, "url" | "method"> {
  retry?: Omit<RetryOptions, "signal">;
  breaker?: CircuitBreakerOptions;
}

/** Cancellations and client errors (4xx other than 429) are final. */
export function isRetryable(error: unknown): boolean {
  if (axios.isCancel(error)) {
    return false;
  }
  if (axios.isAxiosError(error) && error.response) {
    const { status } = error.response;
    return status >= 500 || status === 429;
  }
  return true;
}

function backoff(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, delayMs);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2, signal } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries || signal?.aborted || !isRetryable(error)) {
        throw error;
      }
      await backoff(delay, signal);
      delay *= factor;
      attempt += 1;
    }
  }
}

/**
 * Opens after `failureThreshold` consecutive upstream failures and rejects
 * every call until `cooldownMs` has passed. Cancelled calls say nothing about
 * the upstream and leave the count untouched.
 */
export class CircuitBreaker {
  private failures = 0;

  private openedAt: number | null = null;

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor({ failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  get isOpen(): boolean {
    if (this.openedAt === null) {
      return false;
    }
    if (Date.now() - this.openedAt > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }

  exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen) {
      return Promise.reject(new CircuitOpenError());
    }

    return action()
      .then((result) => {
        this.reset();
        return result;
      })
      .catch((error: unknown) => {
        if (!axios.isCancel(error)) {
          this.recordFailure();
        }
        throw error;
      });
  }

  private recordFailure(): void {
    this.failures += 1;
    if (this.failures >= this.failureThreshold) {
      this.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.failures = 0;
    this.openedAt = null;
  }
}

export class CircuitOpenError extends Error {
  constructor() {
    super("Circuit breaker is open");
    this.name = "CircuitOpenError";
  }
}

const breakersByHost = new Map<string, CircuitBreaker>();

function breakerFor(url: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const host = new URL(url).host.toLowerCase();
  const existing = breakersByHost.get(host);
  if (existing) {
    return existing;
  }
  const breaker = new CircuitBreaker(options);
  breakersByHost.set(host, breaker);
  return breaker;
}

export async function fetchJson(url: string, request: JsonRequest = {}): Promise<unknown> {
  const { retry, breaker: breakerOptions, ...config } = request;
  const signal = config.signal instanceof AbortSignal ? config.signal : undefined;
  const get = () => axios.get<unknown>(url, config).then((response) => response.data);
  return breakerFor(url, breakerOptions).exec(() => withRetry(get, { ...retry, signal }));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isBlank(value: string): boolean {
  return value.trim().length === 0;
}
