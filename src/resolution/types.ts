export const TASK_STRATEGIES = ["explicit", "reference_lookup", "summarizer_a", "summarizer_b"] as const;
export const COMMAND_STRATEGIES = ["pattern_match", "generative_extraction"] as const;

export type TaskStrategy = (typeof TASK_STRATEGIES)[number];
export type CommandStrategy = (typeof COMMAND_STRATEGIES)[number];
export type StrategyId = TaskStrategy | CommandStrategy;

export type Logger = Pick<Console, "info" | "warn" | "error">;

export interface BackendContext {
  /** Aborted when the invocation times out or the resolution is cancelled. */
  signal: AbortSignal;
}

/**
 * One fallible strategy in a chain. Returning null, undefined or a blank
 * string means "no answer"; throwing is treated the same way.
 */
export interface ResolverBackend<T> {
  readonly strategy: StrategyId;
  readonly timeoutMs?: number;
  resolve(query: string, context: BackendContext): Promise<T | null | undefined>;
}

export interface ResolvedValue<T> {
  readonly payload: T;
  readonly sourceStrategy: StrategyId;
  /** ISO-8601 instant the value was stored. */
  readonly timestamp: string;
}

export type AttemptOutcome = "resolved" | "empty" | "fault" | "timeout" | "aborted";

export interface BackendAttempt {
  strategy: StrategyId;
  outcome: AttemptOutcome;
  error?: string;
  startedAt: string;
  finishedAt: string;
}

export interface Resolved<T> {
  status: "resolved";
  value: ResolvedValue<T>;
  cached: boolean;
  attempts: BackendAttempt[];
}

export interface Unresolved {
  status: "unresolved";
  attempts: BackendAttempt[];
  fault?: string;
}

export interface Malformed {
  status: "malformed";
  reason: string;
}

export type Resolution<T> = Resolved<T> | Unresolved | Malformed;

export interface ResolutionAuditEntry {
  category: string;
  query: string;
  status: "resolved" | "unresolved";
  strategy?: StrategyId;
  payload?: unknown;
  attempts: BackendAttempt[];
  fault?: string;
}

export interface ResolutionAuditSink {
  record(entry: ResolutionAuditEntry): Promise<void>;
}

export function isResolved<T>(resolution: Resolution<T>): resolution is Resolved<T> {
  return resolution.status === "resolved";
}
