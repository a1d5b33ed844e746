import path from "node:path";
import { pathToFileURL } from "node:url";
import { z } from "zod";
import type { EstimationResult, TaskEstimator } from "@shiplog/core";
import { formatConfigError } from "./config.js";

const estimationResultSchema = z.object({
  estimates: z.array(
    z.object({
      description: z.string(),
      estimatedHours: z.number().nullable().optional(),
      minSkillLevel: z.enum(["junior", "middle", "senior", "architect"]).nullable().optional()
    })
  ),
  notes: z.string().optional()
});

function resolveImportSpecifier(specifier: string, cwd: string): string {
  if (specifier.startsWith(".") || specifier.startsWith("/") || /^[A-Za-z]:\\/.test(specifier)) {
    return pathToFileURL(path.resolve(cwd, specifier)).href;
  }
  return specifier;
}

function isEstimateFunction(value: unknown): value is (...args: unknown[]) => unknown {
  return typeof value === "function";
}

function parseEstimationResult(value: unknown): EstimationResult {
  const parsed = estimationResultSchema.safeParse(value);
  if (!parsed.success) {
    throw new Error(`Estimator returned an invalid result: ${formatConfigError(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Wraps an estimator so its output is checked before it reaches the report.
 * An invalid result is thrown, which the report records as an estimator failure.
 */
export function withValidatedResult(estimator: TaskEstimator): TaskEstimator {
  return {
    estimate: async (input) => parseEstimationResult(await estimator.estimate(input))
  };
}

export async function loadEstimatorPlugin(specifier: string, cwd: string): Promise<TaskEstimator> {
  const resolved = resolveImportSpecifier(specifier, cwd);
  const mod: Record<string, unknown> = await import(resolved);

  const direct = mod.estimate;
  if (isEstimateFunction(direct)) {
    return { estimate: async (input) => parseEstimationResult(await direct(input)) };
  }

  const pluginObj = mod.default;
  if (pluginObj && typeof pluginObj === "object" && "estimate" in pluginObj) {
    const nested = pluginObj.estimate;
    if (isEstimateFunction(nested)) {
      return { estimate: async (input) => parseEstimationResult(await nested.call(pluginObj, input)) };
    }
  }

  throw new Error("Estimator module must export `estimate(input)` or default.estimate(input).");
}
