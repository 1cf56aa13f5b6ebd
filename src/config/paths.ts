import path from "node:path";
import os from "node:os";

const CONFIG_DIR_NAME = "transcript-compact";

export const CONVERSATION_FILE = "conversation.jsonl";
export const BACKUP_FILE = "conversation.backup.jsonl";

export function resolveConfigDir(): string {
  const override = process.env.TRANSCRIPT_COMPACT_HOME?.trim();
  if (override) return override;
  const xdgConfig = process.env.XDG_CONFIG_HOME?.trim();
  const base = xdgConfig || path.join(os.homedir(), ".config");
  return path.join(base, CONFIG_DIR_NAME);
}

export function resolveConfigFilePath(): string {
  const override = process.env.TRANSCRIPT_COMPACT_CONFIG?.trim();
  if (override) return override;
  return path.join(resolveConfigDir(), "config.json5");
}

export function resolveLogsDir(configured?: string): string {
  const override = process.env.TRANSCRIPT_COMPACT_LOGS_DIR?.trim();
  if (override) return override;
  if (configured) return configured;
  return path.join(resolveConfigDir(), "logs");
}

export function resolveLogFile(logsDir: string, logId: string): string {
  return path.join(logsDir, logId, CONVERSATION_FILE);
}
