import { readFile } from "node:fs/promises";
import { describe, expect, it } from "vitest";
import {
  buildActivityReport,
  dropInitialCommit,
  hasAnomalies,
  runActivityReport,
  type EstimationInput,
  type TaskEstimator
} from "../src/report.js";

async function loadHistory(): Promise<string> {
  const url = new URL("./fixtures/history.fixture.txt", import.meta.url);
  return readFile(url, "utf-8");
}

const taskText = ["Fix login bug F", "Set up CI pipeline I", "Build auth service B", "Misc cleanup"].join("\n");

describe("buildActivityReport", () => {
  it("builds the daily table from the history", async () => {
    const report = buildActivityReport({ history: await loadHistory() });

    expect(report.daily).toEqual([
      { day: "2025-12-04", insertions: 13, deletions: 3, commitCount: 2 },
      { day: "2025-12-05", insertions: 0, deletions: 0, commitCount: 1 }
    ]);
    expect(report.summary).toEqual({
      totalCommits: 3,
      totalTasks: 0,
      activeDays: 2,
      totalInsertions: 13,
      totalDeletions: 3,
      averageInsertionsPerDay: 6.5,
      averageDeletionsPerDay: 1.5,
      firstDay: "2025-12-04",
      lastDay: "2025-12-05"
    });
    expect(hasAnomalies(report)).toBe(false);
  });

  it("tallies task categories and reports malformed lines", () => {
    const report = buildActivityReport({ tasks: [{ text: taskText, source: "12.txt" }] });

    expect(report.categoryTally).toEqual({ Frontend: 1, Infrastructure: 1, Backend: 1 });
    expect(report.anomalies.malformedTaskLines).toEqual([
      { lineNumber: 4, line: "Misc cleanup", reason: "unknown-marker", source: "12.txt" }
    ]);
    expect(hasAnomalies(report)).toBe(true);
  });

  it("merges several task sources", () => {
    const report = buildActivityReport({
      tasks: [{ text: "Ship dashboard F" }, { text: "Add queue worker B\nCache warmup B" }]
    });
    expect(report.categoryTally).toEqual({ Infrastructure: 0, Frontend: 1, Backend: 2 });
    expect(report.tasks).toHaveLength(3);
  });

  it("keeps task results when the history has no commit structure", () => {
    const report = buildActivityReport({ history: "not a git log", tasks: [{ text: taskText }] });

    expect(report.daily).toEqual([]);
    expect(report.categoryTally.Backend).toBe(1);
    expect(report.anomalies.failures).toHaveLength(1);
    expect(report.anomalies.failures[0]?.input).toBe("history");
  });

  it("counts commits with unreadable dates as unattributed", () => {
    const history = ["commit aaaa1111", "Author: Ana", "Date: someday", "", "    Tweak", ""].join("\n");
    const report = buildActivityReport({ history });

    expect(report.daily).toEqual([]);
    expect(report.commits).toHaveLength(1);
    expect(report.anomalies.unattributedCommits).toBe(1);
    expect(report.anomalies.unparsedCommitDates).toEqual([{ hash: "aaaa1111", rawDate: "someday" }]);
  });

  it("keeps undated commits reported and counted when a day range is applied", () => {
    const history = ["commit aaaa1111", "Author: Ana", "Date: garbage", "", "    Tweak", ""].join("\n");
    const report = buildActivityReport({ history }, { range: { since: "2025-01-01" } });

    expect(report.commits).toEqual([]);
    expect(report.anomalies.unparsedCommitDates).toEqual([{ hash: "aaaa1111", rawDate: "garbage" }]);
    expect(report.anomalies.unattributedCommits).toBe(1);
  });

  it("drops the undated bootstrap commit from the anomalies when it is skipped", () => {
    const history = [
      "commit bbbb2222",
      "Author: Ana",
      "Date: 2025-12-02",
      "",
      "    Add parser",
      "",
      "commit aaaa1111",
      "Author: Ana",
      "Date: garbage",
      "",
      "    Initial commit",
      ""
    ].join("\n");

    const report = buildActivityReport({ history }, { skipInitialCommit: true });
    expect(report.commits.map((commit) => commit.hash)).toEqual(["bbbb2222"]);
    expect(report.anomalies.unparsedCommitDates).toEqual([]);
    expect(report.anomalies.unattributedCommits).toBe(0);
  });

  it("restricts commits to a day range", async () => {
    const report = buildActivityReport({ history: await loadHistory() }, { range: { since: "2025-12-05" } });
    expect(report.daily).toEqual([{ day: "2025-12-05", insertions: 0, deletions: 0, commitCount: 1 }]);
    expect(report.summary.totalCommits).toBe(1);
  });

  it("filters tasks by category", () => {
    const report = buildActivityReport({ tasks: [{ text: taskText }] }, { category: "Backend" });
    expect(report.tasks.map((task) => task.description)).toEqual(["Build auth service"]);
    expect(report.categoryTally).toEqual({ Infrastructure: 0, Frontend: 0, Backend: 1 });
  });

  it("optionally drops the bootstrap commit", () => {
    const history = [
      "commit bbbb2222",
      "Author: Ana",
      "Date: 2025-12-02",
      "",
      "    Add parser",
      "",
      " 1 file changed, 20 insertions(+)",
      "commit aaaa1111",
      "Author: Ana",
      "Date: 2025-12-01",
      "",
      "    Initial commit",
      "",
      " 40 files changed, 9000 insertions(+)"
    ].join("\n");

    const report = buildActivityReport({ history }, { skipInitialCommit: true });
    expect(report.daily).toEqual([{ day: "2025-12-02", insertions: 20, deletions: 0, commitCount: 1 }]);
  });
});

describe("dropInitialCommit", () => {
  it("leaves a lone commit in place", () => {
    const report = buildActivityReport({
      history: ["commit aaaa1111", "Author: Ana", "Date: 2025-12-01", "", "    Initial commit"].join("\n")
    });
    expect(dropInitialCommit(report.commits)).toHaveLength(1);
  });
});

describe("runActivityReport", () => {
  it("hands tasks and daily rows to the estimator", async () => {
    const seen: number[] = [];
    const estimator: TaskEstimator = {
      estimate: ({ tasks, daily }) => {
        seen.push(tasks.length, daily.length);
        return { estimates: tasks.map((task) => ({ description: task.description, estimatedHours: 2 })) };
      }
    };

    const report = await runActivityReport(
      { history: await loadHistory(), tasks: [{ text: taskText }] },
      { estimator }
    );

    expect(seen).toEqual([3, 2]);
    expect(report.estimation?.estimates).toHaveLength(3);
    expect(report.estimation?.estimates[0]).toEqual({ description: "Fix login bug", estimatedHours: 2 });
  });

  it("hands the estimator copies of the report arrays", async () => {
    const received: EstimationInput[] = [];
    const estimator: TaskEstimator = {
      estimate: (input) => {
        received.push(input);
        return { estimates: [] };
      }
    };

    const report = await runActivityReport(
      { history: await loadHistory(), tasks: [{ text: taskText }] },
      { estimator }
    );

    expect(received).toHaveLength(1);
    expect(received[0]?.tasks).toEqual(report.tasks);
    expect(received[0]?.tasks).not.toBe(report.tasks);
    expect(received[0]?.daily).toEqual(report.daily);
    expect(received[0]?.daily).not.toBe(report.daily);
  });

  it("records estimator errors without dropping the report", async () => {
    const estimator: TaskEstimator = {
      estimate: async () => {
        throw new Error("model offline");
      }
    };

    const report = await runActivityReport({ tasks: [{ text: "Ship dashboard F" }] }, { estimator });
    expect(report.estimation).toBeUndefined();
    expect(report.categoryTally.Frontend).toBe(1);
    expect(report.anomalies.failures).toEqual([{ input: "estimator", message: "model offline" }]);
  });

  it("skips estimation when no estimator is given", async () => {
    const report = await runActivityReport({ tasks: [{ text: "Ship dashboard F" }] });
    expect(report.estimation).toBeUndefined();
  });
});
