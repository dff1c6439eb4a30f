#!/usr/bin/env node
/**
 * aggregate_timings.ts — reads a checkpoint timing log and prints per-tag
 * totals: sums for write and read tags, count and sum for residual tags.
 *
 * Usage:
 *   npx tsx scripts/src/aggregate_timings.ts [--input <log>] [--tags <yaml>]
 *     [--residual watchlist|all] [--on-malformed fail|skip] [--json <path>]
 *
 * Each log line looks like `WRITE1|duration:12.5,extra:foo`; only the tag and
 * the value of the first key:value pair are read.
 */

import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";

import type { TimingSample, TimingSummary } from "lib/timing/types.js";

import { resolveAggregatorConfig, type AggregatorConfig } from "./config/env.js";
import { FileNotFoundError, isLineError } from "./errors.js";
import { accumulateSample, createAccumulators } from "./timing/accumulate.js";
import { parseLogLine, splitLines } from "./timing/parse_line.js";
import { buildSummary, renderSummary, toExportable } from "./timing/report.js";
import { defaultTagSets, loadTagSets } from "./timing/tag_sets.js";
import { readTextFile, writeJsonFile } from "./utils/fs.js";
import { logger as defaultLogger, type Logger } from "./utils/logger.js";

export interface RunDependencies {
  write?: (line: string) => void;
  logger?: Logger;
}

const writeStdout = (line: string): void => {
  process.stdout.write(`${line}\n`);
};

/** Reads and aggregates the whole log. Throws on the first bad line unless the policy is "skip". */
export async function aggregateTimings(config: AggregatorConfig, logger: Logger = defaultLogger): Promise<TimingSummary> {
  const tagSets = config.tagsPath ? await loadTagSets(config.tagsPath) : defaultTagSets();

  const content = await readTextFile(config.inputPath);
  if (content === null) {
    throw new FileNotFoundError(config.inputPath);
  }

  const lines = splitLines(content);
  const accumulators = createAccumulators(tagSets);
  let linesSkipped = 0;

  lines.forEach((raw, index) => {
    const lineNumber = index + 1;
    let sample: TimingSample;
    try {
      sample = parseLogLine(raw, lineNumber);
    } catch (error) {
      if (config.onMalformed === "skip" && isLineError(error)) {
        linesSkipped += 1;
        logger.warn("Skipping malformed line", { lineNumber, reason: error.name, line: raw });
        return;
      }
      throw error;
    }
    const { newUnseededTag } = accumulateSample(accumulators, tagSets, sample);
    if (newUnseededTag) {
      logger.warn(
        config.residualMode === "all"
          ? "Residual tag outside the watch-list; reporting it after the watch-list"
          : "Residual tag outside the watch-list; it is stored but not printed",
        { tag: sample.tag, lineNumber }
      );
    }
  });

  logger.debug("Aggregated timing log", { inputPath: config.inputPath, lines: lines.length, skipped: linesSkipped });

  return buildSummary(accumulators, tagSets, {
    inputPath: config.inputPath,
    residualMode: config.residualMode,
    linesRead: lines.length,
    linesSkipped
  });
}

/** Aggregates, then prints. Nothing is printed when aggregation fails. */
export async function runAggregation(config: AggregatorConfig, deps: RunDependencies = {}): Promise<TimingSummary> {
  const write = deps.write ?? writeStdout;
  const logger = deps.logger ?? defaultLogger;

  const summary = await aggregateTimings(config, logger);
  for (const line of renderSummary(summary)) {
    write(line);
  }

  if (config.jsonOut) {
    await writeJsonFile(config.jsonOut, toExportable(summary));
    logger.info("Summary written", { path: config.jsonOut });
  }
  return summary;
}

const USAGE =
  `Usage: aggregate_timings [--input <log>] [--tags <yaml>] [--residual watchlist|all]\n` +
  `                         [--on-malformed fail|skip] [--json <path>]\n\n` +
  `  --input, -i      Timing log to read (env CKPT_LOG_PATH)\n` +
  `  --tags, -t       YAML file with write/read/residual tag lists (env CKPT_TAGS_PATH)\n` +
  `  --residual       Print only the residual watch-list, or every residual tag seen (env CKPT_RESIDUAL_MODE)\n` +
  `  --on-malformed   Abort on a bad line, or skip it with a warning (env CKPT_ON_MALFORMED)\n` +
  `  --json           Also write the summary as JSON to this path (env CKPT_JSON_OUT)`;

export async function main(argv: string[] = process.argv.slice(2), deps: RunDependencies = {}): Promise<void> {
  const { values } = parseArgs({
    args: argv,
    options: {
      input: { type: "string", short: "i" },
      tags: { type: "string", short: "t" },
      residual: { type: "string" },
      "on-malformed": { type: "string" },
      json: { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help) {
    (deps.write ?? writeStdout)(USAGE);
    return;
  }

  await runAggregation(resolveAggregatorConfig(values), deps);
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  return entry !== undefined && import.meta.url === pathToFileURL(entry).href;
}

/** CLI wrapper: failures are logged and turn into exit code 1. */
export async function runCli(argv: string[] = process.argv.slice(2), deps: RunDependencies = {}): Promise<void> {
  const logger = deps.logger ?? defaultLogger;
  try {
    await main(argv, deps);
  } catch (error: unknown) {
    logger.error("Timing aggregation failed", {
      error: error instanceof Error ? error.message : String(error),
      kind: error instanceof Error ? error.name : typeof error
    });
    process.exitCode = 1;
  }
}

if (isEntryPoint()) {
  void runCli();
}
