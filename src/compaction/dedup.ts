import { ConfigurationError } from "../util/errors.js";
import { dedupKey, isPinned, type Message } from "./message.js";

export type DedupOptions = {
  /** How many of the most recently retained messages a candidate is checked against. */
  windowSize: number;
};

export function assertWindowSize(windowSize: number): void {
  if (!Number.isInteger(windowSize) || windowSize < 1) {
    throw new ConfigurationError(`windowSize must be an integer >= 1, got ${windowSize}`);
  }
}

/**
 * Marks messages that repeat one of the last `windowSize` retained messages.
 * Returns one drop flag per input message; the first occurrence of a repeated
 * message is always kept.
 *
 * User turns are never dropped: a literal re-ask is part of the conversation.
 * Pinned messages are never dropped either. Both still occupy window slots.
 */
export function detectDuplicates(messages: readonly Message[], options: DedupOptions): boolean[] {
  assertWindowSize(options.windowSize);

  const drop = new Array<boolean>(messages.length).fill(false);
  // Keys of the most recently retained messages, oldest first.
  const window: string[] = [];

  for (let i = 0; i < messages.length; i++) {
    const msg = messages[i];
    const key = dedupKey(msg);

    if (msg.role !== "user" && !isPinned(msg) && window.includes(key)) {
      drop[i] = true;
      continue;
    }

    window.push(key);
    if (window.length > options.windowSize) window.shift();
  }

  return drop;
}
