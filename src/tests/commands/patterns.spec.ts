import { describe, expect, it } from "vitest";
import { matchCommandPattern } from "../../commands/patterns";

describe("matchCommandPattern", () => {
  it("extracts the song number from a play command", () => {
    expect(matchCommandPattern("play song 42")).toEqual({
      recognized: true,
      rule: "play_song",
      intent: { action: "play", songNumber: 42 }
    });
  });

  it("matches keywords case-insensitively", () => {
    expect(matchCommandPattern("PLAY Song 007 please")).toEqual({
      recognized: true,
      rule: "play_song",
      intent: { action: "play", songNumber: 7 }
    });
  });

  it("recognises pause anywhere in the command", () => {
    expect(matchCommandPattern("pause now")).toEqual({ recognized: true, rule: "pause", intent: { action: "pause" } });
    expect(matchCommandPattern("Could you PAUSE the music")).toEqual({
      recognized: true,
      rule: "pause",
      intent: { action: "pause" }
    });
  });

  it("reports anything else as unrecognized", () => {
    expect(matchCommandPattern("what is the weather")).toEqual({ recognized: false });
    expect(matchCommandPattern("play song")).toEqual({ recognized: false });
    expect(matchCommandPattern("display song 4")).toEqual({ recognized: false });
  });

  it("refuses song numbers beyond the safe integer range", () => {
    expect(matchCommandPattern("play song 99999999999999999999")).toEqual({ recognized: false });
  });
});
