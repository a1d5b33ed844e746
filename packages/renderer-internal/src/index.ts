import { describeDay, type ActivityReport, type AnomalyReport, type EstimationResult, type TaskCategory } from "@shiplog/core";

const CATEGORY_ORDER: TaskCategory[] = ["Infrastructure", "Frontend", "Backend"];

function formatAverage(value: number): string {
  return value.toFixed(2);
}

function shortHash(hash: string): string {
  return hash.slice(0, 7);
}

function formatDailySection(report: ActivityReport): string[] {
  if (report.daily.length === 0) {
    return ["## Daily", "- (none)"];
  }

  const lines = [
    "## Daily",
    "| Day | Commits | Insertions | Deletions | Net |",
    "| --- | ---: | ---: | ---: | ---: |"
  ];
  for (const row of report.daily.map(describeDay)) {
    lines.push(`| ${row.day} | ${row.commitCount} | ${row.insertions} | ${row.deletions} | ${row.netChanges} |`);
  }
  lines.push("");
  lines.push(
    `Average per active day: +${formatAverage(report.summary.averageInsertionsPerDay)} / -${formatAverage(report.summary.averageDeletionsPerDay)}`
  );
  return lines;
}

function formatTaskSection(report: ActivityReport): string[] {
  return ["## Tasks", ...CATEGORY_ORDER.map((category) => `- ${category}: ${report.categoryTally[category]}`)];
}

function formatCommitSection(report: ActivityReport): string[] {
  if (report.commits.length === 0) {
    return ["## Commits", "- (none)"];
  }
  return [
    "## Commits",
    ...report.commits.map(
      (commit) =>
        `- ${commit.date ?? "unknown date"} ${shortHash(commit.hash)} ${commit.title || "(no title)"} (+${commit.insertions}/-${commit.deletions})`
    )
  ];
}

function formatEstimationSection(estimation: EstimationResult): string[] {
  const lines = ["## Estimates"];
  if (estimation.estimates.length === 0) {
    lines.push("- (none)");
  }
  for (const estimate of estimation.estimates) {
    const hours = typeof estimate.estimatedHours === "number" ? `: ${estimate.estimatedHours}h` : "";
    const skill = estimate.minSkillLevel ? ` (${estimate.minSkillLevel})` : "";
    lines.push(`- ${estimate.description}${hours}${skill}`);
  }
  if (estimation.notes?.trim()) {
    lines.push("");
    lines.push(estimation.notes.trim());
  }
  return lines;
}

export function formatAnomalies(anomalies: AnomalyReport): string[] {
  const lines: string[] = [];
  for (const failure of anomalies.failures) {
    lines.push(`- ${failure.input} failed: ${failure.message}`);
  }
  for (const entry of anomalies.malformedTaskLines) {
    const where = entry.source ? `${entry.source}:${entry.lineNumber}` : `line ${entry.lineNumber}`;
    lines.push(`- Malformed task (${where}, ${entry.reason}): ${entry.line}`);
  }
  for (const entry of anomalies.unparsedCommitDates) {
    lines.push(`- Unparsed commit date ${shortHash(entry.hash)}: ${entry.rawDate || "(empty)"}`);
  }
  if (anomalies.unattributedCommits > 0) {
    lines.push(`- Commits without a day: ${anomalies.unattributedCommits}`);
  }
  if (anomalies.strayHistoryLines > 0) {
    lines.push(`- Lines outside any commit block: ${anomalies.strayHistoryLines}`);
  }
  return lines;
}

export interface InternalRendererOptions {
  title?: string;
  repo?: string;
  includeCommits?: boolean;
  includeAnomalies?: boolean;
}

export function renderActivityReport(report: ActivityReport, options: InternalRendererOptions = {}): string {
  const includeCommits = options.includeCommits ?? false;
  const includeAnomalies = options.includeAnomalies ?? true;
  const { summary } = report;

  const lines: string[] = [];
  lines.push(`# ${options.title ?? "Activity report"}`);
  if (options.repo) {
    lines.push(`Repository: ${options.repo}`);
  }
  if (summary.firstDay && summary.lastDay) {
    lines.push(`Period: ${summary.firstDay} .. ${summary.lastDay}`);
  }
  lines.push("");
  lines.push(
    `Stats: commits=${summary.totalCommits}, active_days=${summary.activeDays}, insertions=${summary.totalInsertions}, deletions=${summary.totalDeletions}, tasks=${summary.totalTasks}`
  );
  lines.push("");

  lines.push(...formatDailySection(report));
  lines.push("");
  lines.push(...formatTaskSection(report));

  if (includeCommits) {
    lines.push("");
    lines.push(...formatCommitSection(report));
  }

  if (report.estimation) {
    lines.push("");
    lines.push(...formatEstimationSection(report.estimation));
  }

  if (includeAnomalies) {
    const anomalies = formatAnomalies(report.anomalies);
    lines.push("");
    lines.push("## Anomalies");
    lines.push(...(anomalies.length > 0 ? anomalies : ["- (none)"]));
  }

  return lines.join("\n");
}

export function renderActivityReportJson(report: ActivityReport): string {
  return JSON.stringify(
    {
      summary: report.summary,
      daily: report.daily,
      categoryTally: report.categoryTally,
      anomalies: report.anomalies,
      ...(report.estimation ? { estimation: report.estimation } : {})
    },
    null,
    2
  );
}
