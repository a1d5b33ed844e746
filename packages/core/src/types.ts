export type TaskCategory = "Infrastructure" | "Frontend" | "Backend";
export type CategoryMarker = "I" | "F" | "B";
export type SkillLevel = "junior" | "middle" | "senior" | "architect";

export interface CommitRecord {
  readonly hash: string;
  readonly author: string;
  /** Calendar day `YYYY-MM-DD`; `null` when the log's date could not be parsed. */
  readonly date: string | null;
  readonly timestamp: string | null;
  readonly rawDate: string;
  readonly title: string;
  readonly insertions: number;
  readonly deletions: number;
  readonly filesChanged: number;
  readonly mergeParents: readonly string[];
  readonly diff: string;
}

export interface TaskRecord {
  readonly description: string;
  readonly category: TaskCategory;
  readonly lineNumber: number;
  readonly source?: string;
}

export interface DailyAggregate {
  readonly day: string;
  readonly insertions: number;
  readonly deletions: number;
  readonly commitCount: number;
}

export type CategoryTally = Record<TaskCategory, number>;

export type MalformedTaskReason = "unknown-marker" | "empty-description";

export interface MalformedTaskLine {
  lineNumber: number;
  line: string;
  reason: MalformedTaskReason;
  source?: string;
}

export interface UnparsedCommitDate {
  hash: string;
  rawDate: string;
}

export type FailedInput = "history" | "estimator";

export interface StructuralParseFailure {
  input: FailedInput;
  message: string;
}

export interface HistoryParseResult {
  commits: CommitRecord[];
  unparsedDates: UnparsedCommitDate[];
  strayLines: number;
}

export interface TaskParseResult {
  tasks: TaskRecord[];
  malformed: MalformedTaskLine[];
}

export interface DailyAggregation {
  rows: DailyAggregate[];
  unattributed: number;
}

export interface AnomalyReport {
  malformedTaskLines: MalformedTaskLine[];
  unparsedCommitDates: UnparsedCommitDate[];
  unattributedCommits: number;
  strayHistoryLines: number;
  failures: StructuralParseFailure[];
}

export interface ActivitySummary {
  totalCommits: number;
  totalTasks: number;
  activeDays: number;
  totalInsertions: number;
  totalDeletions: number;
  averageInsertionsPerDay: number;
  averageDeletionsPerDay: number;
  firstDay: string | null;
  lastDay: string | null;
}

export interface TaskEstimate {
  description: string;
  estimatedHours?: number | null;
  minSkillLevel?: SkillLevel | null;
}

export interface EstimationResult {
  estimates: TaskEstimate[];
  notes?: string;
}

export interface ActivityReport {
  commits: CommitRecord[];
  tasks: TaskRecord[];
  daily: DailyAggregate[];
  categoryTally: CategoryTally;
  summary: ActivitySummary;
  anomalies: AnomalyReport;
  estimation?: EstimationResult;
}

export interface DayRange {
  since?: string;
  until?: string;
}
