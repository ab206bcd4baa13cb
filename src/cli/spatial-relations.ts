#!/usr/bin/env node
import { mkdirSync, realpathSync, writeFileSync } from "fs";
import { dirname } from "path";
import { pathToFileURL } from "url";
import { loadConfig } from "../config/analysis-config.js";
import { readTextSource } from "../features/spatial/normalizer.js";
import { loadSnippets } from "../features/spatial/snippet-loader.js";
import { runSpatialAnalysis } from "../features/spatial/pipeline.js";
import type { SpatialAnalysis } from "../features/spatial/pipeline.js";
import { buildChartSpec, createChartRenderer } from "../features/spatial/chart-renderer.js";
import { reportError } from "../utils/error-reporter.js";
import { log, timed } from "../lib/log.js";

const USAGE = `Usage: spare <text-file> <workbook.xlsx|snippets.csv> [options]

Options:
  --sheet <name>          worksheet holding the snippets (default: finalList)
  --column <name>         header of the snippet column (default: "context [5:]")
  --chunks <n>            number of text segments (default: 50)
  --boundaries <mode>     half-open | legacy (default: half-open)
  --legacy                legacy boundaries and skip the last snippet
  --drop-last             skip the last snippet
  --skip-missing          warn about unmatched snippets instead of failing
  --format <fmt>          ascii | markdown | json (default: ascii)
  --height <rows>         ascii chart height (default: 12)
  --out <file>            write the chart to a file instead of stdout
  --config <file.json>    read settings from a JSON file (flags take precedence)`;

export interface CliIO {
  stdout: (chunk: string) => void;
}

export interface CliResult {
  exitCode: number;
  analysis?: SpatialAnalysis;
  output?: string;
}

/** Runs one analysis. Never exits the process; the exit code is returned. */
export async function runSpareCli(
  argv: readonly string[],
  io: CliIO = { stdout: chunk => { process.stdout.write(chunk); } }
): Promise<CliResult> {
  if (argv.includes("--help") || argv.includes("-h")) {
    io.stdout(USAGE + "\n");
    return { exitCode: 0 };
  }

  try {
    const config = loadConfig(argv);

    log.info(`Loading text from ${config.textPath}...`);
    const rawText = readTextSource(config.textPath);

    log.info(`Loading snippets from ${config.workbookPath} [${config.sheet} / ${config.column}]...`);
    const { values, skippedRows } = await loadSnippets({
      path: config.workbookPath,
      sheet: config.sheet,
      column: config.column,
    });
    if (skippedRows.length) log.warn(`blank snippet cells skipped at rows ${skippedRows.join(", ")}`);

    const analysis = runSpatialAnalysis({
      rawText,
      snippets: values,
      chunkCount: config.chunkCount,
      boundaryMode: config.boundaryMode,
      locator: { includeLastSnippet: config.includeLastSnippet, onMissing: config.onMissing },
    });
    for (const w of analysis.warnings) log.warn(w);

    const { histogram, locations, words } = analysis;
    log.info(`✓ ${locations.length} of ${values.length} snippets anchored in ${analysis.text.length.toLocaleString("en-US")} characters`);
    log.info(`✓ ${histogram.segments.length} segments of ${histogram.chunkLength} characters (${histogram.mode} boundaries)`);
    if (words.tallies.length) {
      log.info(`  top indicators: ${words.tallies.slice(0, 5).map(t => `${t.word} ${t.count}`).join(", ")}`);
    }

    const renderer = createChartRenderer(config.format, { height: config.chartHeight });
    const output = timed("render", () => renderer.render(buildChartSpec(histogram)));

    if (config.outputPath) {
      mkdirSync(dirname(config.outputPath), { recursive: true });
      writeFileSync(config.outputPath, output + "\n", "utf-8");
      log.info(`✅ Chart saved to ${config.outputPath}`);
    } else {
      io.stdout(output + "\n");
    }
    return { exitCode: 0, analysis, output };
  } catch (e) {
    reportError(e instanceof Error ? e : new Error(String(e)));
    return { exitCode: 1 };
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (invokedDirectly()) {
  runSpareCli(process.argv.slice(2)).then(
    ({ exitCode }) => { process.exitCode = exitCode; },
    (e: unknown) => {
      console.error(e);
      process.exitCode = 1;
    }
  );
}
