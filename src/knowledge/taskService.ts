import pLimit from "p-limit";
import { ChainedResolver, checkQuery } from "../resolution/chain";
import { isResolved } from "../resolution/types";
import type {
  BackendContext,
  Logger,
  Resolution,
  ResolutionAuditSink,
  ResolverBackend,
  StrategyId
} from "../resolution/types";
import { errorMessage, isBlank } from "../utils";
import { TaskNameExtractor, WordLengthExtractor } from "./extractors";

export const TASK_NOT_FOUND = "Task not found in the library.";

export interface TaskKnowledgeServiceOptions {
  /** External reference lookup, tried right after explicit descriptions. */
  lookup: ResolverBackend<string>;
  /** Generative summarizers in priority order (profile A, then B). */
  summarizers: ReadonlyArray<ResolverBackend<string>>;
  extractor?: TaskNameExtractor;
  timeoutMs?: number;
  concurrency?: number;
  logger?: Logger;
  audit?: ResolutionAuditSink;
}

export interface TaskRegistration {
  task: string;
  resolution: Resolution<string>;
}

export interface BulkRegistrationReport {
  extractor: string;
  candidates: string[];
  registrations: TaskRegistration[];
}

export interface KnownTask {
  task: string;
  source: StrategyId;
  resolvedAt: string;
}

/** Chain head: descriptions supplied through registerTask. */
class ExplicitDescriptionBackend implements ResolverBackend<string> {
  readonly strategy = "explicit" as const;

  constructor(private readonly descriptions: ReadonlyMap<string, string>) {}

  async resolve(task: string, _context: BackendContext): Promise<string | null> {
    return this.descriptions.get(task) ?? null;
  }
}

export class TaskKnowledgeService {
  private readonly descriptions = new Map<string, string>();

  private readonly resolver: ChainedResolver<string>;

  private readonly extractor: TaskNameExtractor;

  private readonly logger: Logger;

  private readonly concurrency: number;

  constructor(options: TaskKnowledgeServiceOptions) {
    this.logger = options.logger ?? console;
    this.extractor = options.extractor ?? new WordLengthExtractor();
    this.concurrency = Math.max(1, options.concurrency ?? 3);
    this.resolver = new ChainedResolver<string>({
      category: "task",
      backends: [new ExplicitDescriptionBackend(this.descriptions), options.lookup, ...options.summarizers],
      timeoutMs: options.timeoutMs,
      logger: this.logger,
      audit: options.audit
    });
  }

  get strategies(): StrategyId[] {
    return this.resolver.strategies;
  }

  /**
   * Adds a task to the library. A description is authoritative and replaces
   * whatever was known before; without one, a known task is left untouched.
   */
  async registerTask(name: unknown, description?: string): Promise<Resolution<string>> {
    const checked = checkQuery(name);
    if (typeof checked !== "string") {
      return checked;
    }

    if (description !== undefined && !isBlank(description)) {
      this.descriptions.set(checked, description);
      const stored = this.resolver.store(checked, description, "explicit");
      this.logger.info(`Task added: ${checked} - custom description provided.`);
      return stored;
    }

    const existing = this.resolver.cache.get(checked);
    if (existing) {
      this.logger.info(`Task '${checked}' already exists in the library.`);
      return { status: "resolved", value: existing, cached: true, attempts: [] };
    }

    return this.resolveTask(checked);
  }

  resolveTask(name: unknown): Promise<Resolution<string>> {
    return this.resolver.resolve(name);
  }

  async describeTask(name: unknown): Promise<string> {
    const resolution = await this.resolveTask(name);
    return isResolved(resolution) ? resolution.value.payload : TASK_NOT_FOUND;
  }

  async bulkRegister(names: ReadonlyArray<unknown>): Promise<TaskRegistration[]> {
    const limit = pLimit(this.concurrency);
    return Promise.all(
      names.map((name) =>
        limit(async () => ({
          task: typeof name === "string" ? name : String(name),
          resolution: await this.registerTask(name)
        }))
      )
    );
  }

  async bulkDetectAndRegister(freeText: string): Promise<BulkRegistrationReport> {
    this.logger.info(`Detecting tasks from input data: ${freeText}`);
    let candidates: string[];
    try {
      candidates = await this.extractor.extract(freeText);
    } catch (error) {
      this.logger.warn("Task name extraction failed", { extractor: this.extractor.name, error: errorMessage(error) });
      return { extractor: this.extractor.name, candidates: [], registrations: [] };
    }
    const registrations = await this.bulkRegister(candidates);
    return { extractor: this.extractor.name, candidates, registrations };
  }

  knownTasks(): KnownTask[] {
    return this.resolver.cache.entries().map(([task, value]) => ({
      task,
      source: value.sourceStrategy,
      resolvedAt: value.timestamp
    }));
  }
}
