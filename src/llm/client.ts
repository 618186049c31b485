import OpenAI from "openai";

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface CompletionOptions {
  model: string;
  maxTokens?: number;
  temperature?: number;
  signal?: AbortSignal;
}

export interface TextGenerator {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly openai: OpenAI | null;

  constructor(apiKey: string | undefined) {
    this.openai = apiKey ? new OpenAI({ apiKey }) : null;
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    if (!this.openai) {
      throw new Error("OPENAI_API_KEY is not configured");
    }

    const response = await this.openai.chat.completions.create(
      {
        model: options.model,
        temperature: options.temperature ?? 0.2,
        messages,
        max_tokens: options.maxTokens ?? 256
      },
      { signal: options.signal }
    );

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new Error("Model returned empty response");
    }
    return content;
  }
}
