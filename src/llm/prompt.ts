export function buildSummarySystemPrompt(): string {
  return "You are a knowledge assistant. Describe the named task or topic factually and succinctly in plain prose. Do not invent sources.";
}

export function buildSummaryUserPrompt(task: string, minWords: number, maxWords: number): string {
  return [
    `Write a description of "${task}" between ${minWords} and ${maxWords} words.`,
    "Reply with the description only."
  ].join("\n");
}

export function buildParaphraseSystemPrompt(): string {
  return "You rewrite user commands as one short imperative sentence. Keep every concrete detail, drop filler words.";
}

export function buildExtractTaskSystemPrompt(): string {
  return [
    "You label commands with the task they ask for.",
    "Reply with a short task label of at most five words, such as \"Play Music\" or \"Set Alarm\".",
    "Reply with NONE when the text does not ask for any task."
  ].join(" ");
}
