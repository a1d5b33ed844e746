import { HistoryStructureError } from "./errors.js";
import { resolveCommitDate } from "./rules/date-resolver.js";
import { classifyHistoryLine, type BlockPhase, type HistoryLine } from "./rules/line-classifier.js";
import type { CommitRecord, HistoryParseResult, UnparsedCommitDate } from "./types.js";

export interface HistoryParseOptions {
  timezone?: string;
}

const PATCH_START = /^diff --git /;

interface CommitDraft {
  hash: string;
  phase: BlockPhase;
  author: string;
  rawDate: string;
  title: string | null;
  insertions?: number;
  deletions?: number;
  filesChanged?: number;
  mergeParents: string[];
  body: string[];
}

function createDraft(hash: string): CommitDraft {
  return {
    hash,
    phase: "metadata",
    author: "",
    rawDate: "",
    title: null,
    mergeParents: [],
    body: []
  };
}

function trimBlankEdges(lines: string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && (lines[start] ?? "").trim() === "") {
    start += 1;
  }
  while (end > start && (lines[end - 1] ?? "").trim() === "") {
    end -= 1;
  }
  return lines.slice(start, end);
}

function applyLine(draft: CommitDraft, line: Exclude<HistoryLine, { kind: "header" }>): void {
  switch (line.kind) {
    case "metadata":
      if (line.label === "Author") {
        draft.author = line.value;
      } else if (line.label === "Date" || line.label === "AuthorDate") {
        draft.rawDate = line.value;
      } else if (line.label === "Merge") {
        draft.mergeParents = line.value.split(/\s+/).filter(Boolean);
      }
      return;
    case "summary":
      draft.filesChanged = line.filesChanged;
      if (line.insertions !== undefined) {
        draft.insertions = line.insertions;
      }
      if (line.deletions !== undefined) {
        draft.deletions = line.deletions;
      }
      return;
    case "blank":
      if (draft.phase === "metadata") {
        draft.phase = "title";
      } else if (draft.phase === "body" || draft.phase === "patch") {
        draft.body.push("");
      }
      return;
    case "text":
      if (draft.phase === "body" || draft.phase === "patch") {
        if (PATCH_START.test(line.text)) {
          draft.phase = "patch";
        }
        draft.body.push(line.text);
        return;
      }
      draft.title = line.text.trim();
      draft.phase = "body";
      return;
  }
}

function finalizeDraft(draft: CommitDraft, options: HistoryParseOptions): CommitRecord {
  const resolved = resolveCommitDate(draft.rawDate, options);
  return {
    hash: draft.hash,
    author: draft.author,
    date: resolved?.day ?? null,
    timestamp: resolved?.timestamp ?? null,
    rawDate: draft.rawDate,
    title: draft.title ?? "",
    insertions: draft.insertions ?? 0,
    deletions: draft.deletions ?? 0,
    filesChanged: draft.filesChanged ?? 0,
    mergeParents: draft.mergeParents,
    diff: trimBlankEdges(draft.body).join("\n")
  };
}

/**
 * Parses a `git log` dump (optionally with `--stat`, `--shortstat` or
 * `--patch`) into commit records, in the order they appear in the text.
 *
 * Blocks whose date cannot be read are still returned, with `date: null`,
 * and listed in `unparsedDates`. Text that contains no commit header at all
 * throws {@link HistoryStructureError}.
 */
export function parseHistory(raw: string, options: HistoryParseOptions = {}): HistoryParseResult {
  const commits: CommitRecord[] = [];
  const unparsedDates: UnparsedCommitDate[] = [];
  let strayLines = 0;
  let current: CommitDraft | null = null;

  const flush = (): void => {
    if (!current) {
      return;
    }
    const record = finalizeDraft(current, options);
    if (record.date === null) {
      unparsedDates.push({ hash: record.hash, rawDate: record.rawDate });
    }
    commits.push(record);
    current = null;
  };

  for (const text of raw.split(/\r?\n/)) {
    const line = classifyHistoryLine(text, current?.phase ?? null);

    if (line.kind === "header") {
      flush();
      current = createDraft(line.hash);
      continue;
    }

    if (!current) {
      if (line.kind !== "blank") {
        strayLines += 1;
      }
      continue;
    }

    applyLine(current, line);
  }
  flush();

  if (commits.length === 0 && strayLines > 0) {
    throw new HistoryStructureError(
      `No commit header found in ${strayLines} non-blank line(s); expected blocks starting with "commit <hash>".`
    );
  }

  return { commits, unparsedDates, strayLines };
}
