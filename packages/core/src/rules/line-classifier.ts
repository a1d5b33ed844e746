export type BlockPhase = "metadata" | "title" | "body" | "patch";

export type MetadataLabel = "Author" | "AuthorDate" | "Commit" | "CommitDate" | "Date" | "Merge";

export type HistoryLine =
  | { kind: "header"; hash: string }
  | { kind: "metadata"; label: MetadataLabel; value: string }
  | { kind: "summary"; filesChanged: number; insertions?: number; deletions?: number }
  | { kind: "blank" }
  | { kind: "text"; text: string };

const HEADER_PATTERN = /^commit\s+([0-9a-fA-F]{4,64})(?:\s|$)/;
const METADATA_PATTERN = /^(Author|AuthorDate|Commit|CommitDate|Date|Merge):\s*(.*)$/;
// git prints the shortstat line with exactly one leading space; message lines are indented by four.
const SUMMARY_PATTERN =
  /^ ?(\d+) files? changed(?:, (\d+) insertions?\(\+\))?(?:, (\d+) deletions?\(-\))?\s*$/;

function isMetadataLabel(value: string): value is MetadataLabel {
  return (
    value === "Author" ||
    value === "AuthorDate" ||
    value === "Commit" ||
    value === "CommitDate" ||
    value === "Date" ||
    value === "Merge"
  );
}

/**
 * Classifies one line of a history dump. Metadata labels are only
 * recognised while the current block is still in its metadata phase, so a
 * diff line that happens to start with `Date:` stays part of the body.
 * Once a block reaches its patch, every line other than the next header is
 * text, including context lines that read like a shortstat.
 */
export function classifyHistoryLine(line: string, phase: BlockPhase | null): HistoryLine {
  const header = line.match(HEADER_PATTERN);
  if (header?.[1]) {
    return { kind: "header", hash: header[1] };
  }

  if (line.trim().length === 0) {
    return { kind: "blank" };
  }

  if (phase === "patch") {
    return { kind: "text", text: line };
  }

  if (phase === "metadata") {
    const metadata = line.match(METADATA_PATTERN);
    const label = metadata?.[1];
    if (metadata && label && isMetadataLabel(label)) {
      return { kind: "metadata", label, value: (metadata[2] ?? "").trim() };
    }
  }

  const summary = line.match(SUMMARY_PATTERN);
  if (summary) {
    return {
      kind: "summary",
      filesChanged: Number(summary[1]),
      ...(summary[2] !== undefined ? { insertions: Number(summary[2]) } : {}),
      ...(summary[3] !== undefined ? { deletions: Number(summary[3]) } : {})
    };
  }

  return { kind: "text", text: line };
}
