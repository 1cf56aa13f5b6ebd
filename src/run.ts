import { loadConfig } from "./config/loader.js";
import { resolveLogsDir } from "./config/paths.js";
import { DEFAULT_COMPACTION } from "./config/schema.js";
import { compact, type CompactionReport, type CompactionScope } from "./compact.js";
import { JsonlLogStore } from "./store/jsonl.js";
import { configureLogger } from "./util/logger.js";

export interface RunCompactionOptions {
  /** Config file override; defaults to config.json5 under the config dir. */
  configPath?: string;
  signal?: AbortSignal;
}

/**
 * Entry point for front ends: loads config, sets up logging and the JSONL
 * store, then compacts the given scope. Callers are expected to have flushed
 * the active session to disk before invoking this.
 */
export async function runCompaction(
  scope: CompactionScope,
  opts: RunCompactionOptions = {},
): Promise<CompactionReport> {
  const config = loadConfig(opts.configPath);
  if (config.logging) configureLogger(config.logging);

  const compaction = config.compaction ?? DEFAULT_COMPACTION;
  const store = new JsonlLogStore({
    dir: resolveLogsDir(config.store?.dir),
    backup: compaction.backup,
  });

  return compact(store, scope, {
    windowSize: compaction.windowSize,
    mergeDelimiter: compaction.mergeDelimiter,
    concurrency: compaction.concurrency,
    signal: opts.signal,
  });
}
