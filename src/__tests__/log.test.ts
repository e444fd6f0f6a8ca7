import { describe, it, expect, beforeEach, vi } from "vitest";
import { subscribeRunnerUpdates } from "../agent/events.js";
import { appendLog, clearLog, formatTitle, getLog } from "../agent/log.js";

describe("formatTitle", () => {
  it("centers an even-padded title in 80 columns", () => {
    const line = formatTitle("CHAT");
    expect(line).toBe(`${"=".repeat(36)} CHAT ${"=".repeat(36)}`);
    expect(line).toHaveLength(80);
  });

  it("puts the extra '=' on the right for odd padding", () => {
    expect(formatTitle("ABC")).toBe(`${"=".repeat(36)} ABC ${"=".repeat(37)}`);
  });

  it("drops the rule entirely for long messages", () => {
    const message = "x".repeat(100);
    expect(formatTitle(message)).toBe(` ${message} `);
  });
});

describe("run log", () => {
  beforeEach(() => {
    clearLog();
  });

  it("keeps only the latest 100 lines", () => {
    for (let i = 0; i < 105; i++) appendLog(`line ${i}`);
    const log = getLog();
    expect(log).toHaveLength(100);
    expect(log[0]).toBe("line 5");
    expect(log[99]).toBe("line 104");
  });

  it("notifies subscribers on every append until they unsubscribe", () => {
    const updates: string[] = [];
    const unsubscribe = subscribeRunnerUpdates((update) => {
      updates.push(update);
    });
    appendLog("one");
    appendLog("two");
    unsubscribe();
    appendLog("three");
    expect(updates).toEqual(["log", "log"]);
  });

  it("keeps notifying the other subscribers when one throws", () => {
    const errors = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const seen: string[] = [];
    const unsubscribeBroken = subscribeRunnerUpdates(() => {
      throw new Error("listener broke");
    });
    const unsubscribe = subscribeRunnerUpdates((update) => seen.push(update));

    appendLog("still delivered");
    unsubscribeBroken();
    unsubscribe();

    expect(seen).toEqual(["log"]);
    expect(errors).toHaveBeenCalledWith("Runner log listener failed: listener broke");
    errors.mockRestore();
  });

  it("returns a copy of the log", () => {
    appendLog("kept");
    getLog().push("not kept");
    expect(getLog()).toEqual(["kept"]);
  });
});
