import type { Message } from "../compaction/message.js";

// =============================================================================
// LOG STORE — the persistence contract the compactor consumes
// =============================================================================

export interface LogStore {
  /** Ids of every stored log, read once per call. */
  listLogs(): Promise<string[]>;

  /** The full ordered message list of one log. */
  readLog(logId: string): Promise<Message[]>;

  /**
   * Replaces a log's messages. Must be all-or-nothing: on failure the
   * previous content stays readable unchanged.
   */
  writeLog(logId: string, messages: readonly Message[]): Promise<void>;
}
