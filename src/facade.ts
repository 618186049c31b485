import type { CommandInspection, CommandInterpretation, CommandInterpretationService } from "./commands/commandService";
import type {
  BulkRegistrationReport,
  KnownTask,
  TaskKnowledgeService,
  TaskRegistration
} from "./knowledge/taskService";
import { TASK_NOT_FOUND } from "./knowledge/taskService";
import type { Malformed, Resolution, StrategyId } from "./resolution/types";

export type TaskAnswer =
  | { task: string; found: true; description: string; source: StrategyId; cached: boolean }
  | { task: string; found: false; description: string };

/** Entry point for callers; routes each request to the service that owns it. */
export class ResolutionFacade {
  constructor(
    private readonly tasks: TaskKnowledgeService,
    private readonly commands: CommandInterpretationService
  ) {}

  async resolveTask(name: unknown): Promise<TaskAnswer | Malformed> {
    const resolution = await this.tasks.resolveTask(name);
    return toTaskAnswer(name, resolution);
  }

  async registerTask(name: unknown, description?: string): Promise<TaskAnswer | Malformed> {
    const resolution = await this.tasks.registerTask(name, description);
    return toTaskAnswer(name, resolution);
  }

  bulkRegister(names: ReadonlyArray<unknown>): Promise<TaskRegistration[]> {
    return this.tasks.bulkRegister(names);
  }

  detectTasks(freeText: string): Promise<BulkRegistrationReport> {
    return this.tasks.bulkDetectAndRegister(freeText);
  }

  knownTasks(): KnownTask[] {
    return this.tasks.knownTasks();
  }

  interpretCommand(text: unknown): Promise<Resolution<CommandInterpretation>> {
    return this.commands.interpret(text);
  }

  inspectCommand(text: unknown): Promise<CommandInspection | Malformed> {
    return this.commands.inspect(text);
  }
}

function toTaskAnswer(name: unknown, resolution: Resolution<string>): TaskAnswer | Malformed {
  switch (resolution.status) {
    case "malformed":
      return resolution;
    case "resolved":
      return {
        task: String(name),
        found: true,
        description: resolution.value.payload,
        source: resolution.value.sourceStrategy,
        cached: resolution.cached
      };
    case "unresolved":
      return { task: String(name), found: false, description: TASK_NOT_FOUND };
  }
}
