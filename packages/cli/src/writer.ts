import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

export interface WriteReportOptions {
  cwd: string;
  dir: string;
  label: string;
  extension: "md" | "json";
  content: string;
}

function sanitizeForFileName(value: string): string {
  return value.replace(/[^a-zA-Z0-9_-]/g, "-");
}

export async function writeReportFiles(
  options: WriteReportOptions
): Promise<{ reportFile: string; latestFile: string }> {
  const outputRoot = path.resolve(options.cwd, options.dir);
  const reportFile = path.join(outputRoot, `report-${sanitizeForFileName(options.label)}.${options.extension}`);
  const latestFile = path.join(outputRoot, `latest.${options.extension}`);

  await mkdir(outputRoot, { recursive: true });
  await writeFile(reportFile, options.content, "utf-8");
  await writeFile(latestFile, options.content, "utf-8");

  return { reportFile, latestFile };
}
