import type {
  Accumulators,
  ResidualMode,
  TagAggregate,
  TagSets,
  TimingSummary
} from "lib/timing/types.js";

import { unseededResidualTags } from "./accumulate.js";

export interface SummaryContext {
  inputPath: string;
  residualMode: ResidualMode;
  linesRead: number;
  linesSkipped: number;
}

function aggregate(tag: string, values: number[] | undefined): TagAggregate {
  const samples = values ?? [];
  // left-to-right from zero, so float rounding matches a plain running total
  const sum = samples.reduce((acc, value) => acc + value, 0);
  return { tag, count: samples.length, sum };
}

export function buildSummary(accumulators: Accumulators, tagSets: TagSets, context: SummaryContext): TimingSummary {
  return {
    inputPath: context.inputPath,
    residualMode: context.residualMode,
    linesRead: context.linesRead,
    linesSkipped: context.linesSkipped,
    write: tagSets.write.map((tag) => aggregate(tag, accumulators.write.get(tag))),
    read: tagSets.read.map((tag) => aggregate(tag, accumulators.read.get(tag))),
    residual: tagSets.residual.map((tag) => aggregate(tag, accumulators.residual.get(tag))),
    unseededResidual: unseededResidualTags(accumulators, tagSets).map((tag) =>
      aggregate(tag, accumulators.residual.get(tag))
    )
  };
}

/**
 * Formats a sum as a float: integral values below 1e16 keep a `.0` suffix,
 * magnitudes from 1e16 up use exponent form (`2e+16`), everything else uses
 * the shortest round-trip representation.
 */
export function formatFloat(value: number): string {
  if (Number.isNaN(value)) {
    return "nan";
  }
  if (!Number.isFinite(value)) {
    return value > 0 ? "inf" : "-inf";
  }
  if (Number.isInteger(value) && Math.abs(value) < 1e16) {
    const sign = value < 0 || Object.is(value, -0) ? "-" : "";
    return `${sign}${Math.abs(value)}.0`;
  }
  if (Math.abs(value) >= 1e16) {
    return value.toExponential();
  }
  return String(value);
}

function residualLines(entry: TagAggregate): string[] {
  return [`${entry.tag} ${entry.count}`, `${entry.tag} ${formatFloat(entry.sum)}`];
}

export function renderSummary(summary: TimingSummary): string[] {
  const lines: string[] = [];
  for (const entry of summary.write) {
    lines.push(`${entry.tag} ${formatFloat(entry.sum)}`);
  }
  for (const entry of summary.read) {
    lines.push(`${entry.tag} ${formatFloat(entry.sum)}`);
  }
  for (const entry of summary.residual) {
    lines.push(...residualLines(entry));
  }
  if (summary.residualMode === "all") {
    for (const entry of summary.unseededResidual) {
      lines.push(...residualLines(entry));
    }
  }
  return lines;
}

/** JSON cannot carry NaN or the infinities, so those sums are exported as strings. */
export function toExportable(summary: TimingSummary): Record<string, unknown> {
  const toJson = (entries: TagAggregate[]) =>
    entries.map((entry) => ({
      tag: entry.tag,
      count: entry.count,
      sum: Number.isFinite(entry.sum) ? entry.sum : formatFloat(entry.sum)
    }));
  return {
    inputPath: summary.inputPath,
    residualMode: summary.residualMode,
    linesRead: summary.linesRead,
    linesSkipped: summary.linesSkipped,
    write: toJson(summary.write),
    read: toJson(summary.read),
    residual: toJson(summary.residual),
    unseededResidual: toJson(summary.unseededResidual)
  };
}
