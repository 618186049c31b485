import type { TextGenerator } from "../llm/client";
import { buildSummarySystemPrompt, buildSummaryUserPrompt } from "../llm/prompt";
import type { BackendContext, ResolverBackend, TaskStrategy } from "../resolution/types";

export interface SummarizerProfile {
  strategy: Extract<TaskStrategy, "summarizer_a" | "summarizer_b">;
  model: string;
  /** Upper bound on the returned summary, in characters. */
  maxLength: number;
  minWords?: number;
  maxWords?: number;
  timeoutMs?: number;
}

/**
 * Asks a generative model to describe a task. Profiles A and B share this
 * contract and differ only in model, cost and length settings.
 */
export class GenerativeSummarizerBackend implements ResolverBackend<string> {
  readonly strategy: SummarizerProfile["strategy"];

  readonly timeoutMs?: number;

  constructor(
    private readonly profile: SummarizerProfile,
    private readonly generator: TextGenerator
  ) {
    this.strategy = profile.strategy;
    this.timeoutMs = profile.timeoutMs;
  }

  async resolve(task: string, { signal }: BackendContext): Promise<string | null> {
    const minWords = this.profile.minWords ?? 40;
    const maxWords = this.profile.maxWords ?? 100;
    const text = await this.generator.complete(
      [
        { role: "system", content: buildSummarySystemPrompt() },
        { role: "user", content: buildSummaryUserPrompt(task, minWords, maxWords) }
      ],
      { model: this.profile.model, maxTokens: Math.ceil(maxWords * 2), signal }
    );
    const summary = clampSummary(text, this.profile.maxLength);
    return summary.length > 0 ? summary : null;
  }
}

/** Collapses whitespace and cuts at the last word boundary within maxLength. */
export function clampSummary(text: string, maxLength: number): string {
  const normalized = text.replace(/\s+/g, " ").trim();
  if (normalized.length <= maxLength) {
    return normalized;
  }
  const cut = normalized.slice(0, maxLength);
  const lastSpace = cut.lastIndexOf(" ");
  return (lastSpace > 0 ? cut.slice(0, lastSpace) : cut).trim();
}
