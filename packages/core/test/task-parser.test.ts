import { describe, expect, it } from "vitest";
import { categoryFromMarker, parseTasks } from "../src/task-parser.js";

describe("parseTasks", () => {
  it("maps trailing markers to categories and reports unmarked lines", () => {
    const raw = ["Fix login bug F", "Set up CI pipeline I", "Build auth service B", "Misc cleanup"].join("\n");
    const { tasks, malformed } = parseTasks(raw);

    expect(tasks).toEqual([
      { description: "Fix login bug", category: "Frontend", lineNumber: 1 },
      { description: "Set up CI pipeline", category: "Infrastructure", lineNumber: 2 },
      { description: "Build auth service", category: "Backend", lineNumber: 3 }
    ]);
    expect(malformed).toEqual([{ lineNumber: 4, line: "Misc cleanup", reason: "unknown-marker" }]);
  });

  it("strips separating punctuation before the marker", () => {
    const raw = ["Migrate build to Vite - F", "Tune DB indexes: B", "Provision staging | I", "Rotate keys, I"].join("\n");
    expect(parseTasks(raw).tasks.map((task) => task.description)).toEqual([
      "Migrate build to Vite",
      "Tune DB indexes",
      "Provision staging",
      "Rotate keys"
    ]);
  });

  it("does not read a marker glued to the last word", () => {
    const { tasks, malformed } = parseTasks("Add API");
    expect(tasks).toEqual([]);
    expect(malformed[0]?.reason).toBe("unknown-marker");
  });

  it("treats lower-case markers as malformed", () => {
    expect(parseTasks("Fix typo f").malformed).toEqual([
      { lineNumber: 1, line: "Fix typo f", reason: "unknown-marker" }
    ]);
  });

  it("reports a marker with no description", () => {
    expect(parseTasks("  - B").malformed).toEqual([{ lineNumber: 1, line: "- B", reason: "empty-description" }]);
  });

  it("skips blank lines while keeping source line numbers", () => {
    const raw = "\nFix login bug F\n\n  Set up CI pipeline I  \r\n";
    const { tasks, malformed } = parseTasks(raw);

    expect(tasks.map((task) => task.lineNumber)).toEqual([2, 4]);
    expect(tasks[1]?.description).toBe("Set up CI pipeline");
    expect(malformed).toEqual([]);
  });

  it("labels records and malformed lines with the source", () => {
    const { tasks, malformed } = parseTasks("Write docs\nShip dashboard F", { source: "11.txt" });
    expect(tasks[0]?.source).toBe("11.txt");
    expect(malformed[0]?.source).toBe("11.txt");
  });
});

describe("categoryFromMarker", () => {
  it("resolves known markers only", () => {
    expect(categoryFromMarker("I")).toBe("Infrastructure");
    expect(categoryFromMarker("F")).toBe("Frontend");
    expect(categoryFromMarker("B")).toBe("Backend");
    expect(categoryFromMarker("X")).toBeNull();
  });
});
