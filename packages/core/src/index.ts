export * from "./types.js";
export { HistoryStructureError, describeError } from "./errors.js";
export { parseHistory, type HistoryParseOptions } from "./history-parser.js";
export { parseTasks, categoryFromMarker, CATEGORY_BY_MARKER, type TaskParseOptions } from "./task-parser.js";
export { aggregateDaily, describeDay, summarizeDaily, type DailyStats, type DayDetails } from "./aggregate.js";
export {
  resolveCommitDate,
  formatDateInTimeZone,
  isCalendarDay,
  type ResolvedCommitDate
} from "./rules/date-resolver.js";
export { classifyHistoryLine, type BlockPhase, type HistoryLine } from "./rules/line-classifier.js";
export {
  buildActivityReport,
  countCategories,
  createEmptyTally,
  dropInitialCommit,
  filterCommitsByDay,
  hasAnomalies,
  runActivityReport,
  type ActivityInput,
  type EstimationInput,
  type ReportOptions,
  type RunReportOptions,
  type TaskEstimator,
  type TaskSource
} from "./report.js";
