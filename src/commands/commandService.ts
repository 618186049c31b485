import { ChainedResolver, checkQuery, DEFAULT_BACKEND_TIMEOUT_MS } from "../resolution/chain";
import { BackendTimeoutError } from "../resolution/errors";
import type {
  BackendContext,
  Logger,
  Malformed,
  Resolution,
  ResolutionAuditSink,
  ResolverBackend
} from "../resolution/types";
import { errorMessage } from "../utils";
import { CommandLanguageModel, GenerativeExtraction, runGenerativeExtraction } from "./extraction";
import { CommandIntent, matchCommandPattern, PatternMatchResult } from "./patterns";
import { LexiconTagger, SyntacticAnnotator, TaggedToken } from "./tagger";

export type CommandInterpretation =
  | { kind: "intent"; rule: string; intent: CommandIntent }
  | { kind: "task"; task: string; paraphrase: string };

export type ProbeResult<T> =
  | { status: "ok"; result: T }
  | { status: "absent"; error?: string }
  | Malformed;

export interface CommandInspection {
  command: string;
  pattern: ProbeResult<PatternMatchResult>;
  annotation: ProbeResult<TaggedToken[]>;
  extraction: ProbeResult<GenerativeExtraction>;
}

export interface CommandInterpretationServiceOptions {
  model: CommandLanguageModel;
  annotator?: SyntacticAnnotator;
  timeoutMs?: number;
  logger?: Logger;
  audit?: ResolutionAuditSink;
}

class PatternMatchBackend implements ResolverBackend<CommandInterpretation> {
  readonly strategy = "pattern_match" as const;

  async resolve(command: string, _context: BackendContext): Promise<CommandInterpretation | null> {
    const match = matchCommandPattern(command);
    return match.recognized ? { kind: "intent", rule: match.rule, intent: match.intent } : null;
  }
}

class GenerativeExtractionBackend implements ResolverBackend<CommandInterpretation> {
  readonly strategy = "generative_extraction" as const;

  constructor(
    private readonly model: CommandLanguageModel,
    private readonly logger: Logger
  ) {}

  async resolve(command: string, { signal }: BackendContext): Promise<CommandInterpretation | null> {
    const extraction = await runGenerativeExtraction(this.model, command, this.logger, signal);
    return extraction ? { kind: "task", ...extraction } : null;
  }
}

/**
 * Interprets raw commands. Each strategy can be probed on its own; interpret()
 * composes rule matching and generative extraction into a cached fallback
 * chain, with syntactic annotation logged alongside.
 */
export class CommandInterpretationService {
  private readonly resolver: ChainedResolver<CommandInterpretation>;

  private readonly model: CommandLanguageModel;

  private readonly annotator: SyntacticAnnotator;

  private readonly logger: Logger;

  private readonly timeoutMs: number;

  constructor(options: CommandInterpretationServiceOptions) {
    this.model = options.model;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_BACKEND_TIMEOUT_MS;
    this.annotator = options.annotator ?? new LexiconTagger();
    this.logger = options.logger ?? console;
    this.resolver = new ChainedResolver<CommandInterpretation>({
      category: "command",
      backends: [new PatternMatchBackend(), new GenerativeExtractionBackend(this.model, this.logger)],
      timeoutMs: this.timeoutMs,
      logger: this.logger,
      audit: options.audit
    });
  }

  matchPattern(command: unknown): ProbeResult<PatternMatchResult> {
    const checked = checkQuery(command);
    if (typeof checked !== "string") {
      return checked;
    }
    return { status: "ok", result: matchCommandPattern(checked) };
  }

  async annotate(command: unknown): Promise<ProbeResult<TaggedToken[]>> {
    const checked = checkQuery(command);
    if (typeof checked !== "string") {
      return checked;
    }
    try {
      return { status: "ok", result: await this.annotator.annotate(checked) };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn("Syntactic annotation failed", { command: checked, annotator: this.annotator.name, error: message });
      return { status: "absent", error: message };
    }
  }

  async extractTask(command: unknown): Promise<ProbeResult<GenerativeExtraction>> {
    const checked = checkQuery(command);
    if (typeof checked !== "string") {
      return checked;
    }
    const timeoutMs = this.timeoutMs;
    const controller = new AbortController();
    const timer =
      Number.isFinite(timeoutMs) && timeoutMs > 0
        ? setTimeout(() => controller.abort(new BackendTimeoutError("generative_extraction", timeoutMs)), timeoutMs)
        : undefined;
    const stopped = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
    });

    try {
      const extraction = await Promise.race([
        runGenerativeExtraction(this.model, checked, this.logger, controller.signal),
        stopped
      ]);
      return extraction ? { status: "ok", result: extraction } : { status: "absent" };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn("Generative extraction timed out", { command: checked, error: message });
      return { status: "absent", error: message };
    } finally {
      if (timer !== undefined) {
        clearTimeout(timer);
      }
    }
  }

  async interpret(command: unknown): Promise<Resolution<CommandInterpretation>> {
    const [resolution, annotation] = await Promise.all([this.resolver.resolve(command), this.annotate(command)]);
    if (annotation.status === "ok") {
      this.logger.info(`Command annotation: ${formatAnnotation(annotation.result)}`);
    }
    return resolution;
  }

  async inspect(command: unknown): Promise<CommandInspection | Malformed> {
    const checked = checkQuery(command);
    if (typeof checked !== "string") {
      return checked;
    }
    const [annotation, extraction] = await Promise.all([this.annotate(checked), this.extractTask(checked)]);
    return {
      command: checked,
      pattern: this.matchPattern(checked),
      annotation,
      extraction
    };
  }
}

export function formatAnnotation(tokens: TaggedToken[]): string {
  return tokens.map(({ token, tag }) => `${token}/${tag}`).join(" ");
}
