import { readFile } from "node:fs/promises";
import path from "node:path";
import { parse, stringify } from "yaml";
import { z } from "zod";

export const CONFIG_FILE_NAME = ".shiplog.yml";

function isValidTimeZone(value: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone: value });
    return true;
  } catch {
    return false;
  }
}

const historySchema = z
  .object({
    file: z.string().min(1).optional(),
    repoPath: z.string().min(1).default("."),
    maxCount: z.number().int().min(0).default(0),
    skipInitialCommit: z.boolean().default(false)
  })
  .default({});

const tasksSchema = z
  .object({
    dir: z.string().min(1).default("closed_tasks")
  })
  .default({});

const outputSchema = z
  .object({
    format: z.enum(["markdown", "json"]).default("markdown"),
    dir: z.string().min(1).default("shiplog"),
    includeCommits: z.boolean().default(false)
  })
  .default({});

export const shiplogConfigSchema = z.object({
  timezone: z.string().min(1).refine(isValidTimeZone, "Unknown IANA timezone").optional(),
  history: historySchema,
  tasks: tasksSchema,
  output: outputSchema,
  estimator: z.string().min(1).optional()
});

export type ShiplogConfig = z.infer<typeof shiplogConfigSchema>;
export type OutputFormat = ShiplogConfig["output"]["format"];

export function createDefaultConfig(): ShiplogConfig {
  return shiplogConfigSchema.parse({});
}

export function parseConfigString(raw: string): ShiplogConfig {
  const doc: unknown = parse(raw) ?? {};
  return shiplogConfigSchema.parse(doc);
}

export async function loadConfig(cwd: string, fileName = CONFIG_FILE_NAME): Promise<ShiplogConfig> {
  const configPath = path.join(cwd, fileName);
  const raw = await readFile(configPath, "utf-8");
  return parseConfigString(raw);
}

export function serializeConfig(config: ShiplogConfig): string {
  return stringify(config, {
    lineWidth: 0,
    defaultStringType: "PLAIN"
  });
}

export function formatConfigError(error: unknown): string {
  if (error instanceof z.ZodError) {
    return error.issues
      .map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${where}: ${issue.message}`;
      })
      .join("\n");
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}
