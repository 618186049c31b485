export type CommandIntent =
  | { action: "play"; songNumber: number }
  | { action: "pause" };

export type PatternMatchResult =
  | { recognized: true; rule: string; intent: CommandIntent }
  | { recognized: false };

interface CommandRule {
  name: string;
  pattern: RegExp;
  build: (match: RegExpExecArray) => CommandIntent | null;
}

// First matching rule wins.
const COMMAND_RULES: CommandRule[] = [
  {
    name: "play_song",
    pattern: /\bplay\s+song\s+(\d+)\b/i,
    build: (match) => {
      const songNumber = Number(match[1]);
      return Number.isSafeInteger(songNumber) ? { action: "play", songNumber } : null;
    }
  },
  {
    name: "pause",
    pattern: /pause/i,
    build: () => ({ action: "pause" })
  }
];

export function matchCommandPattern(command: string): PatternMatchResult {
  for (const rule of COMMAND_RULES) {
    const match = rule.pattern.exec(command);
    if (!match) {
      continue;
    }
    const intent = rule.build(match);
    if (intent) {
      return { recognized: true, rule: rule.name, intent };
    }
  }
  return { recognized: false };
}
