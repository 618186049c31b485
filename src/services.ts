import { CommandInterpretationService } from "./commands/commandService";
import { ChatCommandModel } from "./commands/extraction";
import type { AppConfig } from "./config/env";
import { ResolutionFacade } from "./facade";
import { OpenAITextGenerator } from "./llm/client";
import { GenerativeSummarizerBackend } from "./knowledge/summarizers";
import { TaskKnowledgeService } from "./knowledge/taskService";
import { WikipediaLookupBackend } from "./knowledge/wikipedia";
import type { Logger, ResolutionAuditSink } from "./resolution/types";

export interface ServiceOverrides {
  logger?: Logger;
  audit?: ResolutionAuditSink;
}

export function buildFacade(config: AppConfig, overrides: ServiceOverrides = {}): ResolutionFacade {
  const generator = new OpenAITextGenerator(config.openaiApiKey);

  const tasks = new TaskKnowledgeService({
    lookup: new WikipediaLookupBackend({
      baseUrl: config.wikipedia.baseUrl,
      userAgent: config.wikipedia.userAgent
    }),
    summarizers: [
      new GenerativeSummarizerBackend(
        { strategy: "summarizer_a", model: config.summarizerA.model, maxLength: config.summaryMaxLength },
        generator
      ),
      new GenerativeSummarizerBackend(
        { strategy: "summarizer_b", model: config.summarizerB.model, maxLength: config.summaryMaxLength },
        generator
      )
    ],
    timeoutMs: config.backendTimeoutMs,
    concurrency: config.bulkRegisterConcurrency,
    logger: overrides.logger,
    audit: overrides.audit
  });

  const commands = new CommandInterpretationService({
    model: new ChatCommandModel({ apiKey: config.openaiApiKey, model: config.commandModel }),
    timeoutMs: config.backendTimeoutMs,
    logger: overrides.logger,
    audit: overrides.audit
  });

  return new ResolutionFacade(tasks, commands);
}
