import { errorMessage, isBlank } from "../utils";
import { ResolutionCache } from "./cache";
import { BackendTimeoutError, ResolutionCancelledError } from "./errors";
import {
  AttemptOutcome,
  BackendAttempt,
  Logger,
  Malformed,
  Resolution,
  ResolutionAuditEntry,
  ResolutionAuditSink,
  ResolvedValue,
  ResolverBackend,
  StrategyId
} from "./types";

export const DEFAULT_BACKEND_TIMEOUT_MS = 15_000;

export interface ChainedResolverOptions<T> {
  /** Label used in logs and audit entries, e.g. "task" or "command". */
  category: string;
  backends: ReadonlyArray<ResolverBackend<T>>;
  cache?: ResolutionCache<T>;
  timeoutMs?: number;
  logger?: Logger;
  audit?: ResolutionAuditSink;
  isEmpty?: (payload: T) => boolean;
  now?: () => Date;
}

export interface ResolveOptions {
  /** Cancels the traversal. Only the caller that starts a resolution can cancel it. */
  signal?: AbortSignal;
}

type Invocation<T> =
  | { found: true; payload: T; record: BackendAttempt }
  | { found: false; record: BackendAttempt };

export function checkQuery(query: unknown): string | Malformed {
  if (typeof query !== "string") {
    return { status: "malformed", reason: "Query must be a string." };
  }
  if (isBlank(query)) {
    return { status: "malformed", reason: "Query must be a non-empty string." };
  }
  return query;
}

export function isEmptyPayload(payload: unknown): boolean {
  if (payload === null || payload === undefined) {
    return true;
  }
  if (typeof payload === "string") {
    return isBlank(payload);
  }
  return false;
}

export class ChainedResolver<T> {
  readonly category: string;

  readonly cache: ResolutionCache<T>;

  private readonly backends: ReadonlyArray<ResolverBackend<T>>;

  private readonly timeoutMs: number;

  private readonly logger: Logger;

  private readonly audit?: ResolutionAuditSink;

  private readonly isEmpty: (payload: T) => boolean;

  private readonly now: () => Date;

  private readonly controllers = new Map<string, AbortController>();

  constructor(options: ChainedResolverOptions<T>) {
    this.category = options.category;
    this.backends = [...options.backends];
    this.cache = options.cache ?? new ResolutionCache<T>();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.logger = options.logger ?? console;
    this.audit = options.audit;
    this.isEmpty = options.isEmpty ?? isEmptyPayload;
    this.now = options.now ?? (() => new Date());
  }

  get strategies(): StrategyId[] {
    return this.backends.map((backend) => backend.strategy);
  }

  resolve(query: unknown, options: ResolveOptions = {}): Promise<Resolution<T>> {
    const checked = checkQuery(query);
    if (typeof checked !== "string") {
      return Promise.resolve(checked);
    }

    const hit = this.cache.get(checked);
    if (hit) {
      return Promise.resolve({ status: "resolved", value: hit, cached: true, attempts: [] });
    }

    const pending = this.cache.inFlight(checked);
    if (pending) {
      return pending;
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      forwardAbort();
    } else {
      options.signal?.addEventListener("abort", forwardAbort, { once: true });
    }
    this.controllers.set(checked, controller);

    const run = this.traverse(checked, controller.signal).finally(() => {
      options.signal?.removeEventListener("abort", forwardAbort);
      if (this.controllers.get(checked) === controller) {
        this.controllers.delete(checked);
      }
    });

    return this.cache.track(checked, run);
  }

  /**
   * Aborts the in-flight resolution of a query. Every caller waiting on it
   * receives an unresolved result carrying the cancellation fault.
   */
  cancel(query: string, reason?: string): boolean {
    const controller = this.controllers.get(query);
    if (!controller) {
      return false;
    }
    controller.abort(new ResolutionCancelledError(query, reason));
    return true;
  }

  /** Writes a payload directly, replacing whatever was cached for the query. */
  store(query: unknown, payload: T, strategy: StrategyId): Resolution<T> {
    const checked = checkQuery(query);
    if (typeof checked !== "string") {
      return checked;
    }
    const value = this.cache.put(checked, { payload, sourceStrategy: strategy, timestamp: this.now().toISOString() });
    return { status: "resolved", value, cached: false, attempts: [] };
  }

  private async traverse(query: string, signal: AbortSignal): Promise<Resolution<T>> {
    const attempts: BackendAttempt[] = [];
    try {
      for (const backend of this.backends) {
        if (signal.aborted) {
          return await this.finishUnresolved(query, attempts, errorMessage(signal.reason));
        }

        const invocation = await this.invoke(backend, query, signal);
        attempts.push(invocation.record);

        if (invocation.record.outcome === "aborted") {
          return await this.finishUnresolved(query, attempts, invocation.record.error);
        }

        if (invocation.found) {
          return await this.finishResolved(query, backend.strategy, invocation.payload, attempts);
        }
      }
      return await this.finishUnresolved(query, attempts);
    } catch (error) {
      this.logger.error("Chain traversal failed", { category: this.category, query, error: errorMessage(error) });
      return { status: "unresolved", attempts, fault: errorMessage(error) };
    }
  }

  private async invoke(backend: ResolverBackend<T>, query: string, parentSignal: AbortSignal): Promise<Invocation<T>> {
    const startedAt = new Date().toISOString();
    const timeoutMs = backend.timeoutMs ?? this.timeoutMs;
    const controller = new AbortController();
    const onParentAbort = () => controller.abort(parentSignal.reason);
    parentSignal.addEventListener("abort", onParentAbort, { once: true });

    const timer =
      Number.isFinite(timeoutMs) && timeoutMs > 0
        ? setTimeout(() => controller.abort(new BackendTimeoutError(backend.strategy, timeoutMs)), timeoutMs)
        : undefined;

    const stopped = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    const record = (outcome: AttemptOutcome, error?: string): BackendAttempt => ({
      strategy: backend.strategy,
      outcome,
      ...(error === undefined ? {} : { error }),
      startedAt,
      finishedAt: new Date().toISOString()
    });

    try {
      const payload = await Promise.race([backend.resolve(query, { signal: controller.signal }), stopped]);
      if (payload === null || payload === undefined || this.isEmpty(payload)) {
        return { found: false, record: record("empty") };
      }
      return { found: true, payload, record: record("resolved") };
    } catch (error) {
      if (parentSignal.aborted) {
        const message = errorMessage(parentSignal.reason);
        this.logger.warn("Resolution aborted", { category: this.category, query, strategy: backend.strategy, error: message });
        return { found: false, record: record("aborted", message) };
      }

      const message = errorMessage(error);
      if (error instanceof BackendTimeoutError) {
        this.logger.warn("Resolver backend timed out", { category: this.category, query, strategy: backend.strategy, error: message });
        return { found: false, record: record("timeout", message) };
      }

      this.logger.warn("Resolver backend failed", { category: this.category, query, strategy: backend.strategy, error: message });
      return { found: false, record: record("fault", message) };
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
      parentSignal.removeEventListener("abort", onParentAbort);
    }
  }

  private async finishResolved(
    query: string,
    strategy: StrategyId,
    payload: T,
    attempts: BackendAttempt[]
  ): Promise<Resolution<T>> {
    // An explicit store may have landed while the chain was running; it wins.
    const existing = this.cache.get(query);
    if (existing) {
      this.logger.info(`[${this.category}] "${query}" was stored during resolution; keeping ${existing.sourceStrategy}`);
      return { status: "resolved", value: existing, cached: true, attempts };
    }

    const value: ResolvedValue<T> = this.cache.put(query, { payload, sourceStrategy: strategy, timestamp: this.now().toISOString() });
    this.logger.info(`[${this.category}] resolved "${query}" via ${strategy}`);
    await this.recordAudit({ category: this.category, query, status: "resolved", strategy, payload, attempts });
    return { status: "resolved", value, cached: false, attempts };
  }

  private async finishUnresolved(query: string, attempts: BackendAttempt[], fault?: string): Promise<Resolution<T>> {
    this.logger.warn(`[${this.category}] no strategy resolved "${query}"`, {
      tried: attempts.map((attempt) => `${attempt.strategy}:${attempt.outcome}`)
    });
    await this.recordAudit({
      category: this.category,
      query,
      status: "unresolved",
      attempts,
      ...(fault === undefined ? {} : { fault })
    });
    return fault === undefined ? { status: "unresolved", attempts } : { status: "unresolved", attempts, fault };
  }

  private async recordAudit(entry: ResolutionAuditEntry): Promise<void> {
    if (!this.audit) {
      return;
    }
    try {
      await this.audit.record(entry);
    } catch (error) {
      this.logger.error("Failed to record resolution audit entry", errorMessage(error));
    }
  }
}
