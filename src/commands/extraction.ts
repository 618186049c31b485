import { ChatOpenAI } from "@langchain/openai";
import { HumanMessage, SystemMessage } from "@langchain/core/messages";
import { buildExtractTaskSystemPrompt, buildParaphraseSystemPrompt } from "../llm/prompt";
import type { Logger } from "../resolution/types";
import { errorMessage, isBlank } from "../utils";

/** Two-stage generative contract: compress the command, then label the task it asks for. */
export interface CommandLanguageModel {
  paraphrase(command: string, signal?: AbortSignal): Promise<string | null>;
  extractTask(text: string, signal?: AbortSignal): Promise<string | null>;
}

export interface GenerativeExtraction {
  paraphrase: string;
  task: string;
}

export interface ChatCommandModelOptions {
  apiKey?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
}

const NO_TASK = /^none\.?$/i;

function contentToText(content: unknown): string {
  if (typeof content === "string") {
    return content;
  }
  if (Array.isArray(content)) {
    return content
      .map((chunk: unknown) => {
        if (typeof chunk === "string") {
          return chunk;
        }
        if (chunk && typeof chunk === "object" && "text" in chunk && typeof chunk.text === "string") {
          return chunk.text;
        }
        return "";
      })
      .join(" ");
  }
  return "";
}

/** Strips quotes and a trailing period the model tends to add around a label. */
export function cleanModelText(raw: string): string | null {
  const text = raw
    .trim()
    .replace(/^["'`]+|["'`]+$/g, "")
    .replace(/\.$/, "")
    .trim();
  if (isBlank(text) || NO_TASK.test(text)) {
    return null;
  }
  return text;
}

export class ChatCommandModel implements CommandLanguageModel {
  private model: ChatOpenAI | null = null;

  constructor(private readonly options: ChatCommandModelOptions) {}

  private chat(): ChatOpenAI {
    if (!this.options.apiKey) {
      throw new Error("OPENAI_API_KEY is not configured");
    }
    if (!this.model) {
      this.model = new ChatOpenAI({
        model: this.options.model,
        apiKey: this.options.apiKey,
        temperature: this.options.temperature ?? 0.2,
        maxTokens: this.options.maxTokens ?? 128
      });
    }
    return this.model;
  }

  async paraphrase(command: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.chat().invoke(
      [new SystemMessage(buildParaphraseSystemPrompt()), new HumanMessage(command)],
      { signal }
    );
    return cleanModelText(contentToText(response.content));
  }

  async extractTask(text: string, signal?: AbortSignal): Promise<string | null> {
    const response = await this.chat().invoke(
      [new SystemMessage(buildExtractTaskSystemPrompt()), new HumanMessage(text)],
      { signal }
    );
    return cleanModelText(contentToText(response.content));
  }
}

/**
 * Runs paraphrase then task extraction. A fault or empty output at either
 * stage gives null; the fault is logged here and never rethrown.
 */
export async function runGenerativeExtraction(
  model: CommandLanguageModel,
  command: string,
  logger: Logger,
  signal?: AbortSignal
): Promise<GenerativeExtraction | null> {
  let paraphrase: string | null;
  try {
    paraphrase = await model.paraphrase(command, signal);
  } catch (error) {
    logger.warn("Command paraphrase failed", { command, error: errorMessage(error) });
    return null;
  }
  if (!paraphrase) {
    logger.info(`Paraphrase produced nothing for "${command}"`);
    return null;
  }

  let task: string | null;
  try {
    task = await model.extractTask(paraphrase, signal);
  } catch (error) {
    logger.warn("Task extraction failed", { command, paraphrase, error: errorMessage(error) });
    return null;
  }
  if (!task) {
    logger.info(`No task extracted from "${paraphrase}"`);
    return null;
  }

  return { paraphrase, task };
}
