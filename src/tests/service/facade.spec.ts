import { describe, expect, it } from "vitest";
import { CommandInterpretationService } from "../../commands/commandService";
import { ResolutionFacade } from "../../facade";
import { TASK_NOT_FOUND, TaskKnowledgeService } from "../../knowledge/taskService";
import { createLogger, FakeBackend } from "../helpers";

function buildFacade() {
  const logger = createLogger();
  const tasks = new TaskKnowledgeService({
    lookup: new FakeBackend<string>("reference_lookup", (task) => (task === "Data Science" ? "Study of data." : null)),
    summarizers: [new FakeBackend<string>("summarizer_a", () => null)],
    logger
  });
  const commands = new CommandInterpretationService({
    model: { paraphrase: async () => null, extractTask: async () => null },
    logger
  });
  return new ResolutionFacade(tasks, commands);
}

describe("ResolutionFacade", () => {
  it("answers a resolvable task with its source", async () => {
    const facade = buildFacade();

    expect(await facade.resolveTask("Data Science")).toEqual({
      task: "Data Science",
      found: true,
      description: "Study of data.",
      source: "reference_lookup",
      cached: false
    });
  });

  it("answers an unknown task with the not-found text", async () => {
    const facade = buildFacade();

    expect(await facade.resolveTask("Basket Weaving")).toEqual({
      task: "Basket Weaving",
      found: false,
      description: TASK_NOT_FOUND
    });
  });

  it("passes malformed names through", async () => {
    const facade = buildFacade();
    expect(await facade.resolveTask("")).toEqual({ status: "malformed", reason: "Query must be a non-empty string." });
  });

  it("registers explicit descriptions and lists known tasks", async () => {
    const facade = buildFacade();

    const answer = await facade.registerTask("Basket Weaving", "Interlacing fibres into containers.");
    await facade.bulkRegister(["Data Science"]);

    expect(answer).toEqual({
      task: "Basket Weaving",
      found: true,
      description: "Interlacing fibres into containers.",
      source: "explicit",
      cached: false
    });
    expect(facade.knownTasks().map(({ task, source }) => [task, source])).toEqual([
      ["Basket Weaving", "explicit"],
      ["Data Science", "reference_lookup"]
    ]);
  });

  it("interprets commands", async () => {
    const facade = buildFacade();

    const resolution = await facade.interpretCommand("pause now");

    expect(resolution.status).toBe("resolved");
    if (resolution.status === "resolved") {
      expect(resolution.value.payload).toEqual({ kind: "intent", rule: "pause", intent: { action: "pause" } });
    }
    expect((await facade.interpretCommand("what is the weather")).status).toBe("unresolved");
  });
});
