import type { StrategyId } from "./types";

export class BackendTimeoutError extends Error {
  constructor(readonly strategy: StrategyId, readonly timeoutMs: number) {
    super(`${strategy} timed out after ${timeoutMs}ms`);
    this.name = "BackendTimeoutError";
  }
}

export class ResolutionCancelledError extends Error {
  constructor(readonly query: string, reason?: string) {
    super(reason ? `Resolution of "${query}" cancelled: ${reason}` : `Resolution of "${query}" cancelled`);
    this.name = "ResolutionCancelledError";
  }
}
