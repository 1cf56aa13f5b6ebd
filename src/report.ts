import chalk from "chalk";
import type { CompactionReport, LogOutcome } from "./compact.js";

export function formatOutcome(o: LogOutcome): string {
  switch (o.status) {
    case "compacted":
      return `${o.logId}: compacted (removed ${o.removedCount}, merged ${o.mergedCount})`;
    case "unchanged":
      return `${o.logId}: unchanged`;
    case "failed":
      return `${o.logId}: failed:${o.errorKind} ${o.message}`;
    case "skipped":
      return `${o.logId}: skipped`;
  }
}

export function summarize(report: CompactionReport): string {
  const counts = { compacted: 0, unchanged: 0, failed: 0, skipped: 0 };
  let removed = 0;
  let merged = 0;
  for (const o of report.outcomes) {
    counts[o.status]++;
    if (o.status === "compacted") {
      removed += o.removedCount;
      merged += o.mergedCount;
    }
  }
  return (
    `${report.outcomes.length} logs: ${counts.compacted} compacted, ${counts.unchanged} unchanged, ` +
    `${counts.failed} failed, ${counts.skipped} skipped (removed ${removed}, merged ${merged})`
  );
}

/** Plain report lines, one per log plus a totals line. */
export function formatReport(report: CompactionReport): string[] {
  return [...report.outcomes.map(formatOutcome), summarize(report)];
}

const STATUS_COLOR: Record<LogOutcome["status"], (s: string) => string> = {
  compacted: chalk.green,
  unchanged: chalk.dim,
  failed: chalk.red,
  skipped: chalk.yellow,
};

export function renderReport(report: CompactionReport): string {
  const lines = report.outcomes.map((o) => STATUS_COLOR[o.status](formatOutcome(o)));
  const total = summarize(report);
  lines.push(report.ok ? chalk.cyan(total) : chalk.red(total));
  return lines.join("\n");
}
