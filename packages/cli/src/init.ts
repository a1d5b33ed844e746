import { input, select } from "@inquirer/prompts";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import path from "node:path";
import {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  serializeConfig,
  shiplogConfigSchema,
  type OutputFormat
} from "./config.js";

interface SelectOption {
  name: string;
  value: string;
}

export interface PromptAdapter {
  select: (options: { message: string; choices: SelectOption[] }) => Promise<string>;
  input: (options: { message: string; default?: string }) => Promise<string>;
}

export interface InitWizardOptions {
  cwd: string;
  prompts?: PromptAdapter;
}

export interface InitPresetOptions {
  cwd: string;
  historyFile?: string;
  tasksDir?: string;
  format?: OutputFormat;
  timezone?: string;
  overwrite?: boolean;
}

export interface InitResult {
  configPath: string;
  createdFiles: string[];
}

interface InitPlan {
  cwd: string;
  historyFile?: string;
  tasksDir: string;
  format: OutputFormat;
  timezone?: string;
}

function defaultPrompts(): PromptAdapter {
  return {
    select: (options) => select(options),
    input: (options) => input(options)
  };
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === "markdown" || value === "json";
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await readFile(filePath, "utf-8");
    return true;
  } catch {
    return false;
  }
}

async function applyInitPlan(plan: InitPlan): Promise<InitResult> {
  const createdFiles: string[] = [];
  const configPath = path.join(plan.cwd, CONFIG_FILE_NAME);

  const config = createDefaultConfig();
  if (plan.historyFile) {
    config.history.file = plan.historyFile;
  }
  if (plan.timezone) {
    config.timezone = plan.timezone;
  }
  config.tasks.dir = plan.tasksDir;
  config.output.format = plan.format;

  await writeFile(configPath, serializeConfig(shiplogConfigSchema.parse(config)), "utf-8");
  createdFiles.push(configPath);

  const tasksDir = path.resolve(plan.cwd, plan.tasksDir);
  await mkdir(tasksDir, { recursive: true });
  createdFiles.push(tasksDir);

  return { configPath, createdFiles };
}

export async function runInitWizard(options: InitWizardOptions): Promise<InitResult> {
  const promptImpl = options.prompts ?? defaultPrompts();

  const configPath = path.join(options.cwd, CONFIG_FILE_NAME);
  if (await fileExists(configPath)) {
    const action = await promptImpl.select({
      message: `${CONFIG_FILE_NAME} already exists. What do you want to do?`,
      choices: [
        { name: "Overwrite it", value: "overwrite" },
        { name: "Cancel", value: "cancel" }
      ]
    });
    if (action !== "overwrite") {
      throw new Error("Initialization cancelled.");
    }
  }

  const source = await promptImpl.select({
    message: "History source",
    choices: [
      { name: "Run git log in this repository", value: "git" },
      { name: "Read a saved git log file", value: "file" }
    ]
  });

  let historyFile: string | undefined;
  if (source === "file") {
    historyFile = (await promptImpl.input({ message: "History file", default: "git.logs" })).trim() || "git.logs";
  }

  const tasksDir =
    (await promptImpl.input({ message: "Closed tasks directory", default: "closed_tasks" })).trim() ||
    "closed_tasks";

  const format = await promptImpl.select({
    message: "Report format",
    choices: [
      { name: "Markdown", value: "markdown" },
      { name: "JSON", value: "json" }
    ]
  });

  const timezone = (
    await promptImpl.input({
      message: "Timezone for day grouping (leave empty to use the dates as logged)",
      default: ""
    })
  ).trim();

  return applyInitPlan({
    cwd: options.cwd,
    ...(historyFile ? { historyFile } : {}),
    tasksDir,
    format: isOutputFormat(format) ? format : "markdown",
    ...(timezone ? { timezone } : {})
  });
}

export async function runInitPreset(options: InitPresetOptions): Promise<InitResult> {
  const configPath = path.join(options.cwd, CONFIG_FILE_NAME);
  if ((await fileExists(configPath)) && !options.overwrite) {
    throw new Error(`${CONFIG_FILE_NAME} already exists at ${configPath}. Re-run with --overwrite to replace it.`);
  }

  return applyInitPlan({
    cwd: options.cwd,
    ...(options.historyFile ? { historyFile: options.historyFile } : {}),
    tasksDir: options.tasksDir ?? "closed_tasks",
    format: options.format ?? "markdown",
    ...(options.timezone ? { timezone: options.timezone } : {})
  });
}
