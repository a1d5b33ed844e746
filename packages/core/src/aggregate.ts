import type { CommitRecord, DailyAggregate, DailyAggregation } from "./types.js";

export interface DailyStats {
  activeDays: number;
  totalInsertions: number;
  totalDeletions: number;
  totalCommits: number;
  averageInsertionsPerDay: number;
  averageDeletionsPerDay: number;
}

export interface DayDetails extends DailyAggregate {
  netChanges: number;
  averageCommitSize: number;
}

/**
 * Folds commits into one row per calendar day, ascending by day. Commits
 * without a parsed date are only counted in `unattributed`.
 */
export function aggregateDaily(commits: readonly CommitRecord[]): DailyAggregation {
  const byDay = new Map<string, { insertions: number; deletions: number; commitCount: number }>();
  let unattributed = 0;

  for (const commit of commits) {
    if (commit.date === null) {
      unattributed += 1;
      continue;
    }
    const existing = byDay.get(commit.date);
    if (existing) {
      existing.insertions += commit.insertions;
      existing.deletions += commit.deletions;
      existing.commitCount += 1;
      continue;
    }
    byDay.set(commit.date, {
      insertions: commit.insertions,
      deletions: commit.deletions,
      commitCount: 1
    });
  }

  const rows = Array.from(byDay.entries())
    .map(([day, totals]) => ({ day, ...totals }))
    .sort((a, b) => a.day.localeCompare(b.day));

  return { rows, unattributed };
}

export function describeDay(row: DailyAggregate): DayDetails {
  return {
    ...row,
    netChanges: row.insertions - row.deletions,
    averageCommitSize: row.commitCount > 0 ? (row.insertions + row.deletions) / row.commitCount : 0
  };
}

export function summarizeDaily(rows: readonly DailyAggregate[]): DailyStats {
  const totals = rows.reduce(
    (acc, row) => ({
      insertions: acc.insertions + row.insertions,
      deletions: acc.deletions + row.deletions,
      commits: acc.commits + row.commitCount
    }),
    { insertions: 0, deletions: 0, commits: 0 }
  );

  const activeDays = rows.length;
  return {
    activeDays,
    totalInsertions: totals.insertions,
    totalDeletions: totals.deletions,
    totalCommits: totals.commits,
    averageInsertionsPerDay: activeDays > 0 ? totals.insertions / activeDays : 0,
    averageDeletionsPerDay: activeDays > 0 ? totals.deletions / activeDays : 0
  };
}
