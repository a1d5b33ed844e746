#!/usr/bin/env node
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  categoryFromMarker,
  hasAnomalies,
  isCalendarDay,
  runActivityReport,
  type ActivityReport,
  type DayRange,
  type TaskCategory,
  type TaskEstimator,
  type TaskSource
} from "@shiplog/core";
import { GitProviderClient, type GitHistory, type GitHistoryOptions } from "@shiplog/provider-git";
import { formatAnomalies, renderActivityReport, renderActivityReportJson } from "@shiplog/renderer-internal";
import { CONFIG_FILE_NAME, formatConfigError, loadConfig, type OutputFormat, type ShiplogConfig } from "./config.js";
import { loadEstimatorPlugin, withValidatedResult } from "./estimator-plugin.js";
import { runInitPreset, runInitWizard, type InitResult, type PromptAdapter } from "./init.js";
import { writeReportFiles } from "./writer.js";

type CliCommand = "report" | "validate" | "init" | "help";

export interface CliIO {
  log: (message: string) => void;
  error: (message: string) => void;
}

export interface GitHistoryProviderLike {
  fetchHistory: (options: GitHistoryOptions) => Promise<GitHistory>;
}

export interface CliRuntimeOptions {
  prompts?: PromptAdapter;
  io?: CliIO;
  createGitProvider?: () => GitHistoryProviderLike;
  loadEstimator?: (specifier: string, cwd: string) => Promise<TaskEstimator>;
}

interface ParsedCommand {
  command: CliCommand;
  args: string[];
}

interface ReportArgs {
  dryRun: boolean;
  strict: boolean;
  commits: boolean;
  history?: string;
  repo?: string;
  tasks?: string;
  since?: string;
  until?: string;
  format?: OutputFormat;
  category?: TaskCategory;
}

interface InitArgs {
  yes: boolean;
  overwrite: boolean;
  history?: string;
  tasks?: string;
  format?: OutputFormat;
  timezone?: string;
}

// Exit code for --strict runs that recovered from malformed input.
const EXIT_ANOMALIES = 2;

function defaultIO(): CliIO {
  return {
    log: (message) => console.log(message),
    error: (message) => console.error(message)
  };
}

function parseCommand(argv: string[]): ParsedCommand {
  const command = argv[0] ?? "help";
  const args = argv.slice(1);
  if (command === "report" || command === "validate" || command === "init") {
    return { command, args };
  }
  return { command: "help", args: [] };
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseFormat(value: string): OutputFormat {
  if (value !== "markdown" && value !== "json") {
    throw new Error(`Invalid --format value: ${value}`);
  }
  return value;
}

function parseDay(value: string, flag: string): string {
  if (!isCalendarDay(value)) {
    throw new Error(`Invalid ${flag} value: ${value}. Expected YYYY-MM-DD.`);
  }
  return value;
}

function parseReportArgs(args: string[]): ReportArgs {
  const result: ReportArgs = { dryRun: false, strict: false, commits: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--dry-run") {
      result.dryRun = true;
      continue;
    }

    if (arg === "--strict") {
      result.strict = true;
      continue;
    }

    if (arg === "--commits") {
      result.commits = true;
      continue;
    }

    if (arg === "--history") {
      result.history = requireValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--repo") {
      result.repo = requireValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--tasks") {
      result.tasks = requireValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--since") {
      result.since = parseDay(requireValue(args, i, arg), arg);
      i += 1;
      continue;
    }

    if (arg === "--until") {
      result.until = parseDay(requireValue(args, i, arg), arg);
      i += 1;
      continue;
    }

    if (arg === "--format") {
      result.format = parseFormat(requireValue(args, i, arg));
      i += 1;
      continue;
    }

    if (arg === "--category") {
      const value = requireValue(args, i, arg);
      const category = categoryFromMarker(value);
      if (!category) {
        throw new Error(`Invalid --category value: ${value}. Expected I, F or B.`);
      }
      result.category = category;
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  if (result.since && result.until && result.since > result.until) {
    throw new Error("--since must be earlier than --until");
  }

  return result;
}

function parseInitArgs(args: string[]): InitArgs {
  const result: InitArgs = { yes: false, overwrite: false };

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (!arg) {
      continue;
    }

    if (arg === "--yes") {
      result.yes = true;
      continue;
    }

    if (arg === "--overwrite") {
      result.overwrite = true;
      continue;
    }

    if (arg === "--history") {
      result.history = requireValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--tasks") {
      result.tasks = requireValue(args, i, arg);
      i += 1;
      continue;
    }

    if (arg === "--format") {
      result.format = parseFormat(requireValue(args, i, arg));
      i += 1;
      continue;
    }

    if (arg === "--timezone") {
      result.timezone = requireValue(args, i, arg);
      i += 1;
      continue;
    }

    throw new Error(`Unknown option: ${arg}`);
  }

  return result;
}

function isMissingPath(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function readTaskSources(dir: string): Promise<TaskSource[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && !entry.name.startsWith("."))
    .map((entry) => entry.name)
    .sort((a, b) => a.localeCompare(b));

  const sources: TaskSource[] = [];
  for (const name of files) {
    sources.push({ text: await readFile(path.join(dir, name), "utf-8"), source: name });
  }
  return sources;
}

async function loadHistory(
  cwd: string,
  config: ShiplogConfig,
  args: ReportArgs,
  runtimeOptions: CliRuntimeOptions
): Promise<{ text: string; repo?: string }> {
  const file = args.history ?? (args.repo ? undefined : config.history.file);
  if (file) {
    return { text: await readFile(path.resolve(cwd, file), "utf-8") };
  }

  const provider = runtimeOptions.createGitProvider?.() ?? new GitProviderClient();
  const fetchOptions: GitHistoryOptions = {
    repoPath: path.resolve(cwd, args.repo ?? config.history.repoPath)
  };
  if (config.history.maxCount > 0) {
    fetchOptions.maxCount = config.history.maxCount;
  }
  return provider.fetchHistory(fetchOptions);
}

async function loadTasks(cwd: string, config: ShiplogConfig, args: ReportArgs, io: CliIO): Promise<TaskSource[]> {
  const dir = path.resolve(cwd, args.tasks ?? config.tasks.dir);
  try {
    return await readTaskSources(dir);
  } catch (error: unknown) {
    if (isMissingPath(error)) {
      io.error(`Tasks directory not found: ${dir}. Continuing without tasks.`);
      return [];
    }
    throw error;
  }
}

async function loadEstimator(
  cwd: string,
  config: ShiplogConfig,
  runtimeOptions: CliRuntimeOptions,
  io: CliIO
): Promise<TaskEstimator | undefined> {
  const specifier = config.estimator ?? process.env.SHIPLOG_ESTIMATOR;
  if (!specifier) {
    return undefined;
  }

  const injected = runtimeOptions.loadEstimator;
  try {
    // Plugin modules are validated by the loader; injected estimators get the same check here.
    const estimator = injected
      ? withValidatedResult(await injected(specifier, cwd))
      : await loadEstimatorPlugin(specifier, cwd);
    io.log(`Loaded estimator plugin: ${specifier}`);
    return estimator;
  } catch (error: unknown) {
    io.error(`Estimator disabled: ${formatConfigError(error)}`);
    return undefined;
  }
}

function formatStatsLine(report: ActivityReport): string {
  const { summary, categoryTally } = report;
  return `Stats: commits=${summary.totalCommits}, active_days=${summary.activeDays}, tasks=${summary.totalTasks} (I=${categoryTally.Infrastructure}, F=${categoryTally.Frontend}, B=${categoryTally.Backend})`;
}

async function loadValidatedConfig(cwd: string, io: CliIO): Promise<ShiplogConfig | null> {
  try {
    return await loadConfig(cwd);
  } catch (error: unknown) {
    if (isMissingPath(error)) {
      io.error(`Cannot find ${CONFIG_FILE_NAME}. Run \`shiplog init\` first.`);
      return null;
    }
    io.error(`Cannot load ${CONFIG_FILE_NAME}`);
    io.error(formatConfigError(error));
    return null;
  }
}

async function runReport(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  const config = await loadValidatedConfig(cwd, io);
  if (!config) {
    return 1;
  }

  let parsedArgs: ReportArgs;
  try {
    parsedArgs = parseReportArgs(args);
  } catch (error: unknown) {
    io.error(formatConfigError(error));
    return 1;
  }

  try {
    const history = await loadHistory(cwd, config, parsedArgs, runtimeOptions);
    const tasks = await loadTasks(cwd, config, parsedArgs, io);
    const estimator = await loadEstimator(cwd, config, runtimeOptions, io);

    const range: DayRange = {
      ...(parsedArgs.since ? { since: parsedArgs.since } : {}),
      ...(parsedArgs.until ? { until: parsedArgs.until } : {})
    };
    const report = await runActivityReport(
      { history: history.text, tasks },
      {
        range,
        skipInitialCommit: config.history.skipInitialCommit,
        ...(config.timezone ? { timezone: config.timezone } : {}),
        ...(parsedArgs.category ? { category: parsedArgs.category } : {}),
        ...(estimator ? { estimator } : {})
      }
    );

    const anomalies = formatAnomalies(report.anomalies);
    if (anomalies.length > 0) {
      io.error("Anomalies:");
      anomalies.forEach((line) => io.error(line));
    }

    const format = parsedArgs.format ?? config.output.format;
    const content =
      format === "json"
        ? renderActivityReportJson(report)
        : renderActivityReport(report, {
            ...(history.repo ? { repo: history.repo } : {}),
            includeCommits: parsedArgs.commits || config.output.includeCommits
          });

    if (parsedArgs.dryRun) {
      io.log(content);
    } else {
      const files = await writeReportFiles({
        cwd,
        dir: config.output.dir,
        label: parsedArgs.until ?? report.summary.lastDay ?? "empty",
        extension: format === "json" ? "json" : "md",
        content
      });
      io.log(`Created ${files.reportFile}`);
      io.log(`Updated ${files.latestFile}`);
      io.log(formatStatsLine(report));
    }

    if (report.anomalies.failures.length > 0) {
      return 1;
    }
    if (parsedArgs.strict && hasAnomalies(report)) {
      return EXIT_ANOMALIES;
    }
    return 0;
  } catch (error: unknown) {
    io.error("Report failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

async function runValidate(cwd: string, io: CliIO): Promise<number> {
  try {
    const config = await loadConfig(cwd);
    io.log("Config is valid.");
    io.log(`History: ${config.history.file ?? `git log in ${config.history.repoPath}`}`);
    io.log(`Tasks directory: ${config.tasks.dir}`);
    io.log(`Timezone: ${config.timezone ?? "as logged"}`);
    return 0;
  } catch (error: unknown) {
    io.error("Config validation failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

function printInitResult(io: CliIO, result: InitResult): void {
  for (const file of result.createdFiles) {
    io.log(`Created ${file}`);
  }
}

async function runInit(
  cwd: string,
  io: CliIO,
  args: string[],
  runtimeOptions: CliRuntimeOptions
): Promise<number> {
  try {
    const parsed = parseInitArgs(args);

    if (parsed.yes) {
      const result = await runInitPreset({
        cwd,
        overwrite: parsed.overwrite,
        ...(parsed.history ? { historyFile: parsed.history } : {}),
        ...(parsed.tasks ? { tasksDir: parsed.tasks } : {}),
        ...(parsed.format ? { format: parsed.format } : {}),
        ...(parsed.timezone ? { timezone: parsed.timezone } : {})
      });
      printInitResult(io, result);
      return 0;
    }

    const result = await runInitWizard({
      cwd,
      ...(runtimeOptions.prompts ? { prompts: runtimeOptions.prompts } : {})
    });
    printInitResult(io, result);
    return 0;
  } catch (error: unknown) {
    io.error("Initialization failed.");
    io.error(formatConfigError(error));
    return 1;
  }
}

function printHelp(io: CliIO): void {
  io.log("shiplog CLI");
  io.log("Usage: shiplog <report|validate|init>");
  io.log("Commands:");
  io.log("  init      interactive or one-line setup of .shiplog.yml");
  io.log("  validate  validate .shiplog.yml");
  io.log("  report    parse history and closed tasks, then write the activity report");
  io.log("Report options:");
  io.log("  --history <file>    read a saved git log instead of running git");
  io.log("  --repo <path>       run git log in this repository");
  io.log("  --tasks <dir>       closed-task directory (one task per line, ending in I|F|B)");
  io.log("  --since <day>       first day to include (YYYY-MM-DD)");
  io.log("  --until <day>       last day to include (YYYY-MM-DD)");
  io.log("  --format <value>    markdown|json");
  io.log("  --category <I|F|B>  only count tasks of this category");
  io.log("  --commits           list every commit in the markdown report");
  io.log("  --dry-run           print the report without writing files");
  io.log(`  --strict            exit with code ${EXIT_ANOMALIES} when any input line was malformed`);
  io.log("Init options:");
  io.log("  --yes               non-interactive mode");
  io.log("  --overwrite         replace an existing .shiplog.yml");
  io.log("  --history <file>    saved git log file");
  io.log("  --tasks <dir>       closed-task directory");
  io.log("  --format <markdown|json>");
  io.log("  --timezone <IANA timezone>");
}

export async function runCli(
  argv: string[],
  cwd = process.cwd(),
  runtimeOptions: CliRuntimeOptions = {}
): Promise<number> {
  const io = runtimeOptions.io ?? defaultIO();
  const parsed = parseCommand(argv);

  switch (parsed.command) {
    case "report":
      return runReport(cwd, io, parsed.args, runtimeOptions);
    case "validate":
      return runValidate(cwd, io);
    case "init":
      return runInit(cwd, io, parsed.args, runtimeOptions);
    default:
      printHelp(io);
      return 0;
  }
}

const isMain = process.argv[1] === fileURLToPath(import.meta.url);
if (isMain) {
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error);
      process.exitCode = 1;
    });
}
