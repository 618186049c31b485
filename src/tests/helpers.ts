import { vi } from "vitest";
import type {
  BackendContext,
  Resolution,
  ResolutionAuditEntry,
  ResolutionAuditSink,
  Resolved,
  ResolverBackend,
  StrategyId
} from "../resolution/types";

type Behaviour<T> = (query: string, context: BackendContext) => Promise<T | null | undefined> | T | null | undefined;

export class FakeBackend<T> implements ResolverBackend<T> {
  readonly calls: string[] = [];

  readonly signals: AbortSignal[] = [];

  constructor(
    readonly strategy: StrategyId,
    private readonly behaviour: Behaviour<T>,
    readonly timeoutMs?: number
  ) {}

  async resolve(query: string, context: BackendContext): Promise<T | null | undefined> {
    this.calls.push(query);
    this.signals.push(context.signal);
    return this.behaviour(query, context);
  }
}

export function createLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export class MemoryAuditSink implements ResolutionAuditSink {
  readonly entries: ResolutionAuditEntry[] = [];

  async record(entry: ResolutionAuditEntry): Promise<void> {
    this.entries.push(entry);
  }
}

export function expectResolved<T>(resolution: Resolution<T>): Resolved<T> {
  if (resolution.status !== "resolved") {
    throw new Error(`Expected a resolved value, got ${resolution.status}`);
  }
  return resolution;
}

export function deferred<T>(): { promise: Promise<T>; resolve: (value: T) => void } {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((settle) => {
    resolve = settle;
  });
  return { promise, resolve };
}

export function never<T>(): Promise<T> {
  return new Promise<T>(() => undefined);
}
