// src/config/analysis-config.ts
// Settings for one analysis run: schema defaults < JSON config file < CLI flags.

import { readFileSync } from "fs";
import { z } from "zod";
import { ConfigurationError } from "../features/spatial/errors.js";
import { formatIssues } from "../utils/validation.js";

export const AnalysisConfigSchema = z.object({
  textPath: z.string().min(1, "text file path is required"),
  workbookPath: z.string().min(1, "snippet workbook path is required"),
  sheet: z.string().min(1).default("finalList"),
  column: z.string().min(1).default("context [5:]"),
  chunkCount: z.number().int().positive().default(50),
  boundaryMode: z.enum(["half-open", "legacy"]).default("half-open"),
  includeLastSnippet: z.boolean().default(true),
  onMissing: z.enum(["error", "skip"]).default("error"),
  format: z.enum(["ascii", "markdown", "json"]).default("ascii"),
  chartHeight: z.number().int().positive().default(12),
  outputPath: z.string().min(1).optional(),
});

export type AnalysisConfig = z.infer<typeof AnalysisConfigSchema>;

/** Unvalidated settings gathered from flags or a config file. */
export type RawConfig = Record<string, unknown>;

const VALUE_FLAGS: Record<string, string> = {
  "--sheet": "sheet",
  "--column": "column",
  "--chunks": "chunkCount",
  "--boundaries": "boundaryMode",
  "--format": "format",
  "--height": "chartHeight",
  "--out": "outputPath",
};
const NUMERIC_KEYS = new Set(["chunkCount", "chartHeight"]);

export interface ParsedArgs {
  config: RawConfig;
  configFile?: string;
}

/**
 * Parse `<text> <workbook> [flags]`. Unknown flags and missing flag values are
 * collected as configuration issues rather than ignored.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs {
  const config: RawConfig = {};
  const positionals: string[] = [];
  const issues: string[] = [];
  let configFile: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? "";
    if (!arg.startsWith("--")) {
      positionals.push(arg);
      continue;
    }
    switch (arg) {
      case "--legacy":
        config.boundaryMode = "legacy";
        config.includeLastSnippet = false;
        continue;
      case "--drop-last":
        config.includeLastSnippet = false;
        continue;
      case "--skip-missing":
        config.onMissing = "skip";
        continue;
    }
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      issues.push(`${arg}: missing value`);
      continue;
    }
    i++;
    if (arg === "--config") {
      configFile = next;
      continue;
    }
    const key = VALUE_FLAGS[arg];
    if (!key) {
      issues.push(`${arg}: unknown option`);
      continue;
    }
    config[key] = NUMERIC_KEYS.has(key) ? Number(next) : next;
  }

  if (positionals[0] !== undefined) config.textPath = positionals[0];
  if (positionals[1] !== undefined) config.workbookPath = positionals[1];
  if (positionals.length > 2) issues.push(`unexpected arguments: ${positionals.slice(2).join(" ")}`);

  if (issues.length) throw new ConfigurationError(issues);
  return { config, configFile };
}

export function readConfigFile(path: string): RawConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (e) {
    throw new ConfigurationError([`${path}: ${e instanceof Error ? e.message : String(e)}`]);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError([`${path}: expected a JSON object`]);
  }
  return { ...parsed };
}

/** Merge sources (later wins) and validate. Failures are thrown, not reported; the caller reports them. */
export function resolveConfig(...sources: RawConfig[]): AnalysisConfig {
  const merged: RawConfig = Object.assign({}, ...sources);
  const result = AnalysisConfigSchema.safeParse(merged);
  if (!result.success) throw new ConfigurationError(formatIssues(result.error));
  return result.data;
}

export function loadConfig(argv: readonly string[]): AnalysisConfig {
  const { config, configFile } = parseCliArgs(argv);
  const fileConfig = configFile ? readConfigFile(configFile) : {};
  return resolveConfig(fileConfig, config);
}
