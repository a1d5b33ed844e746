import type { CategoryMarker, MalformedTaskLine, TaskCategory, TaskParseResult, TaskRecord } from "./types.js";

export interface TaskParseOptions {
  source?: string;
}

export const CATEGORY_BY_MARKER: Readonly<Record<CategoryMarker, TaskCategory>> = {
  I: "Infrastructure",
  F: "Frontend",
  B: "Backend"
};

// A marker must be separated from the description: "Add API" is not an "I" task.
const MARKER_PATTERN = /^(.*?)[\s\-–—:|,;/]+([IFB])$/;

function isCategoryMarker(value: string): value is CategoryMarker {
  return value === "I" || value === "F" || value === "B";
}

export function categoryFromMarker(marker: string): TaskCategory | null {
  return isCategoryMarker(marker) ? CATEGORY_BY_MARKER[marker] : null;
}

/**
 * Parses a closed-task list, one task per line, each ending with a category
 * marker (`I`, `F` or `B`). Lines that do not end with a separated marker are
 * returned in `malformed`; blank lines are skipped.
 */
export function parseTasks(raw: string, options: TaskParseOptions = {}): TaskParseResult {
  const tasks: TaskRecord[] = [];
  const malformed: MalformedTaskLine[] = [];
  const sourceField = options.source ? { source: options.source } : {};

  raw.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim();
    if (!line) {
      return;
    }

    const lineNumber = index + 1;
    const match = line.match(MARKER_PATTERN);
    const category = match?.[2] ? categoryFromMarker(match[2]) : null;
    if (!match || !category) {
      malformed.push({ lineNumber, line, reason: "unknown-marker", ...sourceField });
      return;
    }

    const description = (match[1] ?? "").trim();
    if (!description) {
      malformed.push({ lineNumber, line, reason: "empty-description", ...sourceField });
      return;
    }

    tasks.push({ description, category, lineNumber, ...sourceField });
  });

  return { tasks, malformed };
}
