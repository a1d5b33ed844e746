import { spawn } from "node:child_process";
import path from "node:path";

export interface GitCommandResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface GitCommandRunner {
  run(command: string, args: string[], cwd: string): Promise<GitCommandResult>;
}

export interface GitHistoryOptions {
  repoPath?: string;
  since?: string;
  until?: string;
  author?: string;
  maxCount?: number;
  patch?: boolean;
}

export interface GitHistory {
  repo: string;
  text: string;
}

function defaultGitRunner(): GitCommandRunner {
  return {
    run(command, args, cwd) {
      return new Promise<GitCommandResult>((resolve, reject) => {
        const child = spawn(command, args, {
          cwd,
          stdio: ["ignore", "pipe", "pipe"]
        });

        let stdout = "";
        let stderr = "";

        child.stdout.on("data", (chunk: Buffer) => {
          stdout += chunk.toString("utf-8");
        });

        child.stderr.on("data", (chunk: Buffer) => {
          stderr += chunk.toString("utf-8");
        });

        child.on("error", (error) => {
          reject(error);
        });

        child.on("close", (exitCode) => {
          resolve({
            stdout,
            stderr,
            exitCode: exitCode ?? 1
          });
        });
      });
    }
  };
}

export function normalizeRepoFromRemote(remoteUrl: string): string | null {
  const normalized = remoteUrl.trim();
  const patterns = [
    /github\.com[:/](?<owner>[^/]+)\/(?<repo>[^/\s]+?)(?:\.git)?$/,
    /gitlab\.com[:/](?<owner>[^/]+)\/(?<repo>[^/\s]+?)(?:\.git)?$/,
    /bitbucket\.org[:/](?<owner>[^/]+)\/(?<repo>[^/\s]+?)(?:\.git)?$/
  ];

  for (const pattern of patterns) {
    const match = normalized.match(pattern);
    const owner = match?.groups?.owner;
    const repo = match?.groups?.repo;
    if (owner && repo) {
      return `${owner}/${repo}`;
    }
  }

  return null;
}

function repoFromPath(repoPath: string): string {
  return path.basename(path.resolve(repoPath));
}

export function buildLogArgs(options: GitHistoryOptions = {}): string[] {
  const args = ["log", "--shortstat", "--date=iso-strict"];

  if (options.patch) {
    args.push("--patch");
  }
  if (options.since) {
    args.push(`--since=${options.since}`);
  }
  if (options.until) {
    args.push(`--until=${options.until}`);
  }
  if (options.author) {
    args.push(`--author=${options.author}`);
  }
  if (options.maxCount && options.maxCount > 0) {
    args.push(`--max-count=${options.maxCount}`);
  }

  return args;
}

async function runGitOrThrow(
  runner: GitCommandRunner,
  args: string[],
  cwd: string
): Promise<string> {
  const result = await runner.run("git", args, cwd);
  if (result.exitCode !== 0) {
    throw new Error(`git ${args.join(" ")} failed: ${result.stderr.trim() || "unknown error"}`);
  }
  return result.stdout;
}

export class GitProviderClient {
  constructor(private readonly runner: GitCommandRunner = defaultGitRunner()) {}

  async resolveRepoLabel(repoPath: string): Promise<string> {
    let remoteUrl: string | null = null;
    try {
      const remoteRaw = await runGitOrThrow(this.runner, ["config", "--get", "remote.origin.url"], repoPath);
      const trimmed = remoteRaw.trim();
      remoteUrl = trimmed.length > 0 ? trimmed : null;
    } catch {
      // No origin remote configured; fall back to the directory name.
      remoteUrl = null;
    }

    return remoteUrl ? normalizeRepoFromRemote(remoteUrl) ?? repoFromPath(repoPath) : repoFromPath(repoPath);
  }

  /** Returns the raw `git log --shortstat` text, newest commit first. */
  async fetchHistory(options: GitHistoryOptions = {}): Promise<GitHistory> {
    const repoPath = options.repoPath ?? ".";
    const repo = await this.resolveRepoLabel(repoPath);
    const text = await runGitOrThrow(this.runner, buildLogArgs(options), repoPath);
    return { repo, text };
  }
}
