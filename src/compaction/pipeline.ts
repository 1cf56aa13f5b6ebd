import { resolveCompactionOptions, type CompactionConfig } from "../config/schema.js";
import { detectDuplicates } from "./dedup.js";
import { mergeSystemRuns } from "./merge.js";
import { estimateTokens, validateLog, type Message, type Role } from "./message.js";

export type PipelineOptions = Partial<Pick<CompactionConfig, "windowSize" | "mergeDelimiter">>;

export type CompactionResult = {
  /** Surviving messages in original relative order, re-indexed 0..n-1. */
  messages: Message[];
  removedCount: number;
  mergedCount: number;
  /**
   * Metadata keys carried by the result. Every value under these keys is the
   * verbatim value of some input message (the earliest one, for merged runs).
   */
  preservedMetadataKeys: ReadonlySet<string>;
  /** Surviving messages per role. */
  keptByRole: Record<Role, number>;
  tokensBefore: number;
  tokensAfter: number;
  /** Dedup/merge passes run until nothing changed. */
  passes: number;
};

export function isUnchanged(result: CompactionResult): boolean {
  return result.removedCount === 0 && result.mergedCount === 0;
}

/**
 * Compacts one log snapshot: drop duplicates, then merge adjacent system
 * messages, then re-stamp sequence indices.
 *
 * Dropping a message can make two system messages adjacent, and merging a run
 * shrinks the dedup window's reach, so the two steps repeat until a pass
 * changes nothing. The result is a fixed point: compacting it again is a no-op.
 *
 * Pure: the input array and its messages are never mutated.
 */
export function compactMessages(
  input: readonly Message[],
  options: PipelineOptions = {},
  logId?: string,
): CompactionResult {
  const { windowSize, mergeDelimiter } = resolveCompactionOptions(options);
  validateLog(input, logId);

  let current: readonly Message[] = input;
  let removedCount = 0;
  let mergedCount = 0;
  let passes = 0;

  for (;;) {
    passes++;
    const drop = detectDuplicates(current, { windowSize });
    const kept = current.filter((_, i) => !drop[i]);
    const dropped = current.length - kept.length;

    const merged = mergeSystemRuns(kept, { delimiter: mergeDelimiter });

    removedCount += dropped;
    mergedCount += merged.mergedCount;
    current = merged.messages;

    if (dropped === 0 && merged.mergedCount === 0) break;
  }

  const messages = current.map((m, i) => (m.sequenceIndex === i ? m : { ...m, sequenceIndex: i }));

  const preservedMetadataKeys = new Set<string>();
  const keptByRole: Record<Role, number> = { user: 0, assistant: 0, system: 0, "tool-result": 0 };
  for (const m of messages) {
    keptByRole[m.role]++;
    for (const key of Object.keys(m.metadata)) preservedMetadataKeys.add(key);
  }

  return {
    messages,
    removedCount,
    mergedCount,
    preservedMetadataKeys,
    keptByRole,
    tokensBefore: estimateTokens(input),
    tokensAfter: estimateTokens(messages),
    passes,
  };
}
