import fs from "node:fs";
import JSON5 from "json5";
import {
  CompactConfigSchema,
  DEFAULT_COMPACTION,
  DEFAULT_CONFIG,
  formatIssues,
  type CompactConfig,
} from "./schema.js";
import { resolveConfigFilePath } from "./paths.js";
import { ConfigurationError, describeError } from "../util/errors.js";
import { log } from "../util/logger.js";

function mergeEnvVars(config: CompactConfig): CompactConfig {
  const envWindow = process.env.TRANSCRIPT_COMPACT_WINDOW?.trim();
  if (envWindow) {
    const windowSize = Number(envWindow);
    if (!Number.isInteger(windowSize) || windowSize < 1) {
      throw new ConfigurationError(
        `TRANSCRIPT_COMPACT_WINDOW must be an integer >= 1, got "${envWindow}"`,
      );
    }
    config.compaction = { ...(config.compaction ?? DEFAULT_COMPACTION), windowSize };
  }
  const envLogsDir = process.env.TRANSCRIPT_COMPACT_LOGS_DIR?.trim();
  if (envLogsDir) config.store = { ...config.store, dir: envLogsDir };
  return config;
}

/**
 * Loads the JSON5 config file. A missing file yields the defaults; a file that
 * fails to parse or validate raises ConfigurationError before any log is read.
 */
export function loadConfig(overridePath?: string): CompactConfig {
  const configPath = overridePath || resolveConfigFilePath();

  let raw: unknown = {};
  if (fs.existsSync(configPath)) {
    try {
      raw = JSON5.parse(fs.readFileSync(configPath, "utf-8"));
    } catch (err) {
      throw new ConfigurationError(`Failed to parse config at ${configPath}: ${describeError(err)}`, {
        cause: err,
      });
    }
  } else {
    log.debug(`No config at ${configPath}, using defaults`);
  }

  const result = CompactConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(`Invalid config at ${configPath}: ${formatIssues(result.error)}`);
  }
  return mergeEnvVars({ ...DEFAULT_CONFIG, ...result.data });
}
