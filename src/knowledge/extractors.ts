/**
 * Pulls candidate task names out of free text. Swappable so a real entity
 * extractor can replace the heuristic without touching the resolution chain.
 */
export interface TaskNameExtractor {
  readonly name: string;
  extract(text: string): string[] | Promise<string[]>;
}

export interface WordLengthExtractorOptions {
  /** Tokens must be strictly longer than this to count as candidates. */
  minExclusiveLength?: number;
}

/** Placeholder heuristic: every whitespace-delimited token longer than three characters, verbatim. */
export class WordLengthExtractor implements TaskNameExtractor {
  readonly name = "word_length";

  private readonly minExclusiveLength: number;

  constructor({ minExclusiveLength = 3 }: WordLengthExtractorOptions = {}) {
    this.minExclusiveLength = minExclusiveLength;
  }

  extract(text: string): string[] {
    return text
      .split(/\s+/)
      .filter((token) => token.length > this.minExclusiveLength);
  }
}
