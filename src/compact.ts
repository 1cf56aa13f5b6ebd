import { resolveCompactionOptions, type CompactionConfig } from "./config/schema.js";
import { compactMessages, isUnchanged, type CompactionResult } from "./compaction/pipeline.js";
import type { LogStore } from "./store/types.js";
import { describeFailure, errorKind, type ErrorKind } from "./util/errors.js";
import { log } from "./util/logger.js";
import { formatOutcome } from "./report.js";

export type CompactionScope =
  | { kind: "session"; id: string }
  | { kind: "all" };

export interface CompactOptions extends Partial<Omit<CompactionConfig, "backup">> {
  /** Checked between logs; a log already being written always finishes. */
  signal?: AbortSignal;
}

export type LogOutcome =
  | {
      logId: string;
      status: "compacted" | "unchanged";
      removedCount: number;
      mergedCount: number;
      tokensBefore: number;
      tokensAfter: number;
    }
  | { logId: string; status: "failed"; errorKind: ErrorKind; message: string }
  | { logId: string; status: "skipped" };

export interface CompactionReport {
  scope: CompactionScope;
  outcomes: LogOutcome[];
  /** False when any log failed. */
  ok: boolean;
}

/**
 * Read, compact and (when something changed) atomically rewrite one log.
 * Errors propagate; the stored log is only replaced after compaction succeeded.
 */
export async function compactLog(
  store: LogStore,
  logId: string,
  options: Pick<CompactionConfig, "windowSize" | "mergeDelimiter">,
): Promise<CompactionResult> {
  const snapshot = await store.readLog(logId);
  const result = compactMessages(snapshot, options, logId);
  if (!isUnchanged(result)) {
    await store.writeLog(logId, result.messages);
  }
  return result;
}

async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const i = next++;
      results[i] = await worker(items[i]);
    }
  };
  await Promise.all(Array.from({ length: Math.min(limit, items.length) }, () => lane()));
  return results;
}

/**
 * Compacts the current session or every stored log.
 *
 * Options are validated first, so a ConfigurationError is thrown before any
 * log is read. After that, each log's failure is recorded in its outcome and
 * the remaining logs still run. In "all" mode the log list is snapshotted
 * once; logs added while the batch runs are not included.
 */
export async function compact(
  store: LogStore,
  scope: CompactionScope,
  options: CompactOptions = {},
): Promise<CompactionReport> {
  const { signal, ...tunables } = options;
  const config = resolveCompactionOptions(tunables);

  const runOne = async (logId: string): Promise<LogOutcome> => {
    if (signal?.aborted) return { logId, status: "skipped" };
    let result: CompactionResult;
    try {
      result = await compactLog(store, logId, config);
    } catch (err) {
      const outcome: LogOutcome = {
        logId,
        status: "failed",
        errorKind: errorKind(err),
        message: describeFailure(err),
      };
      log.error(formatOutcome(outcome));
      return outcome;
    }
    const outcome: LogOutcome = {
      logId,
      status: isUnchanged(result) ? "unchanged" : "compacted",
      removedCount: result.removedCount,
      mergedCount: result.mergedCount,
      tokensBefore: result.tokensBefore,
      tokensAfter: result.tokensAfter,
    };
    const kept = result.keptByRole;
    log.info(
      `${formatOutcome(outcome)}, tokens ${result.tokensBefore} → ${result.tokensAfter}, ` +
        `kept ${kept.user} user, ${kept.assistant} assistant, ${kept.system} system, ${kept["tool-result"]} tool-result`,
    );
    return outcome;
  };

  let outcomes: LogOutcome[];
  if (scope.kind === "session") {
    outcomes = [await runOne(scope.id)];
  } else {
    const ids = await store.listLogs();
    log.debug(`Compacting ${ids.length} logs (concurrency ${config.concurrency})`);
    outcomes = await runPool(ids, config.concurrency, runOne);
    logTotals(outcomes);
  }

  return { scope, outcomes, ok: outcomes.every((o) => o.status !== "failed") };
}

function logTotals(outcomes: readonly LogOutcome[]): void {
  let before = 0;
  let after = 0;
  for (const o of outcomes) {
    if (o.status === "compacted" || o.status === "unchanged") {
      before += o.tokensBefore;
      after += o.tokensAfter;
    }
  }
  if (before === 0) {
    log.info("No logs found to compact");
    return;
  }
  const saved = before - after;
  log.info(`Compacted all logs. Total tokens saved: ${saved} (${((saved / before) * 100).toFixed(1)}%)`);
}
