import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { parseMessage, serializeMessage, type Message } from "../compaction/message.js";
import { BACKUP_FILE, CONVERSATION_FILE, resolveLogFile } from "../config/paths.js";
import {
  MalformedLogError,
  StoreReadError,
  StoreWriteError,
  describeError,
  isNotFoundError,
} from "../util/errors.js";
import { log } from "../util/logger.js";
import type { LogStore } from "./types.js";

export interface JsonlLogStoreOptions {
  /** Directory holding one subdirectory per session. */
  dir: string;
  /** Copy the current log to conversation.backup.jsonl before each rewrite. */
  backup?: boolean;
}

const LOG_ID_RE = /^[^/\\]+$/;

function isValidLogId(logId: string): boolean {
  return LOG_ID_RE.test(logId) && logId !== "." && logId !== "..";
}

export function parseJsonl(raw: string, logId: string): Message[] {
  const messages: Message[] = [];
  const lines = raw.split("\n");
  for (let lineNo = 0; lineNo < lines.length; lineNo++) {
    const trimmed = lines[lineNo].trim();
    if (!trimmed) continue;
    let record: unknown;
    try {
      record = JSON.parse(trimmed);
    } catch (err) {
      throw new MalformedLogError(logId, `line ${lineNo + 1}: not valid JSON`, { cause: err });
    }
    messages.push(parseMessage(record, messages.length, logId));
  }
  return messages;
}

export function formatJsonl(messages: readonly Message[]): string {
  return messages.map((m) => JSON.stringify(serializeMessage(m)) + "\n").join("");
}

/**
 * Conversation logs stored as `<dir>/<logId>/conversation.jsonl`, one JSON
 * record per line. Rewrites go through a temp file in the same directory that
 * is renamed over the canonical file, so the log is never truncated in place.
 */
export class JsonlLogStore implements LogStore {
  constructor(private readonly options: JsonlLogStoreOptions) {}

  async listLogs(): Promise<string[]> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(this.options.dir, { withFileTypes: true });
    } catch (err) {
      if (isNotFoundError(err)) return [];
      throw new StoreReadError(this.options.dir, `cannot list logs: ${describeError(err)}`, { cause: err });
    }

    const ids: string[] = [];
    for (const entry of entries) {
      if (!entry.isDirectory()) continue;
      const file = path.join(this.options.dir, entry.name, CONVERSATION_FILE);
      try {
        await fs.access(file);
        ids.push(entry.name);
      } catch (err) {
        if (!isNotFoundError(err)) log.warn(`Skipping ${entry.name}: ${describeError(err)}`);
      }
    }
    // Session directories are date-prefixed; newest first.
    return ids.sort().reverse();
  }

  async readLog(logId: string): Promise<Message[]> {
    if (!isValidLogId(logId)) throw new StoreReadError(logId, "invalid log id");
    const file = resolveLogFile(this.options.dir, logId);

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf-8");
    } catch (err) {
      const reason = isNotFoundError(err) ? "log not found" : describeError(err);
      throw new StoreReadError(logId, reason, { cause: err });
    }
    return parseJsonl(raw, logId);
  }

  async writeLog(logId: string, messages: readonly Message[]): Promise<void> {
    if (!isValidLogId(logId)) throw new StoreWriteError(logId, "invalid log id");
    const file = resolveLogFile(this.options.dir, logId);
    const tmpPath = `${file}.tmp-${process.pid}-${Date.now()}`;

    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(tmpPath, formatJsonl(messages), "utf-8");
      if (this.options.backup) await this.backup(logId, file);
      await fs.rename(tmpPath, file);
    } catch (err) {
      await this.discardTemp(tmpPath);
      throw new StoreWriteError(logId, `write failed: ${describeError(err)}`, { cause: err });
    }
    log.debug(`Wrote ${messages.length} messages to ${file}`);
  }

  private async backup(logId: string, file: string): Promise<void> {
    const backupPath = path.join(path.dirname(file), BACKUP_FILE);
    try {
      await fs.copyFile(file, backupPath);
      log.info(`${logId}: backup at ${backupPath}`);
    } catch (err) {
      // Nothing to back up for a log that is written for the first time.
      if (!isNotFoundError(err)) throw err;
    }
  }

  private async discardTemp(tmpPath: string): Promise<void> {
    try {
      await fs.rm(tmpPath, { force: true });
    } catch (err) {
      log.warn(`Could not remove temp file ${tmpPath}: ${describeError(err)}`);
    }
  }
}
