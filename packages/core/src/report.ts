import { aggregateDaily, summarizeDaily } from "./aggregate.js";
import { HistoryStructureError, describeError } from "./errors.js";
import { parseHistory } from "./history-parser.js";
import { parseTasks } from "./task-parser.js";
import type {
  ActivityReport,
  CategoryTally,
  CommitRecord,
  DailyAggregate,
  DayRange,
  EstimationResult,
  HistoryParseResult,
  MalformedTaskLine,
  StructuralParseFailure,
  TaskCategory,
  TaskRecord
} from "./types.js";

export interface TaskSource {
  text: string;
  source?: string;
}

export interface ActivityInput {
  history?: string;
  tasks?: TaskSource[];
}

export interface ReportOptions {
  timezone?: string;
  range?: DayRange;
  skipInitialCommit?: boolean;
  category?: TaskCategory;
}

export interface EstimationInput {
  tasks: readonly TaskRecord[];
  daily: readonly DailyAggregate[];
}

/** Capability handed to {@link runActivityReport}; the core never creates one. */
export interface TaskEstimator {
  estimate: (input: EstimationInput) => Promise<EstimationResult> | EstimationResult;
}

export interface RunReportOptions extends ReportOptions {
  estimator?: TaskEstimator;
}

const INITIAL_COMMIT_PATTERN = /\b(initial|init|first)\b/i;

export function createEmptyTally(): CategoryTally {
  return { Infrastructure: 0, Frontend: 0, Backend: 0 };
}

export function countCategories(tasks: readonly TaskRecord[]): CategoryTally {
  const tally = createEmptyTally();
  for (const task of tasks) {
    tally[task.category] += 1;
  }
  return tally;
}

/**
 * Drops the oldest commit (the last one in `git log` order) when its title
 * reads like a repository bootstrap, e.g. "Initial commit".
 */
export function dropInitialCommit(commits: readonly CommitRecord[]): CommitRecord[] {
  const oldest = commits[commits.length - 1];
  if (commits.length > 1 && oldest && INITIAL_COMMIT_PATTERN.test(oldest.title)) {
    return commits.slice(0, -1);
  }
  return [...commits];
}

export function filterCommitsByDay(commits: readonly CommitRecord[], range: DayRange = {}): CommitRecord[] {
  const { since, until } = range;
  if (!since && !until) {
    return [...commits];
  }
  return commits.filter((commit) => {
    if (commit.date === null) {
      return false;
    }
    if (since && commit.date < since) {
      return false;
    }
    if (until && commit.date > until) {
      return false;
    }
    return true;
  });
}

function parseHistoryInput(
  history: string | undefined,
  timezone: string | undefined,
  failures: StructuralParseFailure[]
): HistoryParseResult {
  const empty: HistoryParseResult = { commits: [], unparsedDates: [], strayLines: 0 };
  if (history === undefined) {
    return empty;
  }

  try {
    return parseHistory(history, timezone ? { timezone } : {});
  } catch (error: unknown) {
    if (error instanceof HistoryStructureError) {
      failures.push({ input: "history", message: error.message });
      return empty;
    }
    throw error;
  }
}

export function buildActivityReport(input: ActivityInput, options: ReportOptions = {}): ActivityReport {
  const failures: StructuralParseFailure[] = [];
  const history = parseHistoryInput(input.history, options.timezone, failures);

  const kept = options.skipInitialCommit ? dropInitialCommit(history.commits) : history.commits;
  const commits = filterCommitsByDay(kept, options.range);
  const aggregation = aggregateDaily(commits);
  // Undated commits have no day for a range to test, so they stay reported after range filtering.
  const undated = kept.filter((commit) => commit.date === null);

  const malformedTaskLines: MalformedTaskLine[] = [];
  const parsedTasks: TaskRecord[] = [];
  for (const source of input.tasks ?? []) {
    const parsed = parseTasks(source.text, source.source ? { source: source.source } : {});
    parsedTasks.push(...parsed.tasks);
    malformedTaskLines.push(...parsed.malformed);
  }
  const tasks = options.category
    ? parsedTasks.filter((task) => task.category === options.category)
    : parsedTasks;

  const stats = summarizeDaily(aggregation.rows);
  const first = aggregation.rows[0];
  const last = aggregation.rows[aggregation.rows.length - 1];

  return {
    commits,
    tasks,
    daily: aggregation.rows,
    categoryTally: countCategories(tasks),
    summary: {
      totalCommits: commits.length,
      totalTasks: tasks.length,
      activeDays: stats.activeDays,
      totalInsertions: stats.totalInsertions,
      totalDeletions: stats.totalDeletions,
      averageInsertionsPerDay: stats.averageInsertionsPerDay,
      averageDeletionsPerDay: stats.averageDeletionsPerDay,
      firstDay: first?.day ?? null,
      lastDay: last?.day ?? null
    },
    anomalies: {
      malformedTaskLines,
      unparsedCommitDates: undated.map((commit) => ({ hash: commit.hash, rawDate: commit.rawDate })),
      unattributedCommits: undated.length,
      strayHistoryLines: history.strayLines,
      failures
    }
  };
}

export async function runActivityReport(
  input: ActivityInput,
  options: RunReportOptions = {}
): Promise<ActivityReport> {
  const { estimator, ...reportOptions } = options;
  const report = buildActivityReport(input, reportOptions);
  if (!estimator) {
    return report;
  }

  try {
    const estimation = await estimator.estimate({ tasks: [...report.tasks], daily: [...report.daily] });
    return { ...report, estimation };
  } catch (error: unknown) {
    report.anomalies.failures.push({ input: "estimator", message: describeError(error) });
    return report;
  }
}

export function hasAnomalies(report: ActivityReport): boolean {
  const { anomalies } = report;
  return (
    anomalies.malformedTaskLines.length > 0 ||
    anomalies.unparsedCommitDates.length > 0 ||
    anomalies.strayHistoryLines > 0 ||
    anomalies.failures.length > 0
  );
}
