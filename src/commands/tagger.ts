import lexiconData from "../../data/lexicon.json";

export interface TaggedToken {
  token: string;
  tag: string;
}

/** Produces (token, tag) pairs for a command. Observational only. */
export interface SyntacticAnnotator {
  readonly name: string;
  annotate(command: string): Promise<TaggedToken[]>;
}

const TOKEN_PATTERN = /[A-Za-z]+(?:'[A-Za-z]+)?|\d+(?:\.\d+)?|[^\sA-Za-z\d]/g;

const SUFFIX_RULES: Array<[RegExp, string]> = [
  [/ing$/, "VBG"],
  [/ed$/, "VBD"],
  [/ly$/, "RB"],
  [/(?:ous|ful|able|ible|al|ive)$/, "JJ"],
  [/[^s]s$/, "NNS"]
];

export function tokenize(command: string): string[] {
  return command.match(TOKEN_PATTERN) ?? [];
}

/**
 * Penn Treebank style tagger: lexicon lookup first, then number and
 * punctuation classes, capitalisation and word suffixes. Anything left is NN.
 */
export class LexiconTagger implements SyntacticAnnotator {
  readonly name = "lexicon";

  private readonly lexicon: ReadonlyMap<string, string>;

  constructor(lexicon: Record<string, string> = lexiconData) {
    this.lexicon = new Map(Object.entries(lexicon));
  }

  async annotate(command: string): Promise<TaggedToken[]> {
    return this.tagTokens(tokenize(command));
  }

  tagTokens(tokens: string[]): TaggedToken[] {
    return tokens.map((token, index) => ({ token, tag: this.tagFor(token, index) }));
  }

  private tagFor(token: string, index: number): string {
    const known = this.lexicon.get(token.toLowerCase());
    if (known) {
      return known;
    }
    if (/^\d+(?:\.\d+)?$/.test(token)) {
      return "CD";
    }
    if (/^[.!?]$/.test(token)) {
      return ".";
    }
    if (/^[^A-Za-z\d]$/.test(token)) {
      return token;
    }
    if (index > 0 && /^[A-Z]/.test(token)) {
      return "NNP";
    }
    const lower = token.toLowerCase();
    for (const [pattern, tag] of SUFFIX_RULES) {
      if (pattern.test(lower)) {
        return tag;
      }
    }
    return "NN";
  }
}
