import { isSystem, type Message, type Metadata } from "./message.js";

export type MergeOptions = {
  delimiter: string;
};

export type MergeResult = {
  messages: Message[];
  /** Number of runs collapsed into a single message. */
  mergedCount: number;
};

type SystemText = Message & { readonly content: string };

// Structured payloads cannot be concatenated losslessly, so they end a run.
function isMergeable(m: Message): m is SystemText {
  return isSystem(m) && typeof m.content === "string";
}

/** Union of metadata maps. On key conflicts the earliest map's value wins. */
export function mergeMetadata(maps: readonly Readonly<Metadata>[]): Metadata {
  const merged: Metadata = {};
  for (const map of maps) {
    for (const [key, value] of Object.entries(map)) {
      if (!Object.hasOwn(merged, key)) merged[key] = value;
    }
  }
  return merged;
}

function mergeRun(run: readonly SystemText[], delimiter: string): Message {
  return {
    role: "system",
    content: run.map((m) => m.content).join(delimiter),
    metadata: mergeMetadata(run.map((m) => m.metadata)),
    sequenceIndex: run[0].sequenceIndex,
  };
}

/**
 * Collapses every maximal run of two or more consecutive system messages into
 * one message. Content is joined with `delimiter`, never deduplicated, so the
 * merged text splits back into exactly the original contents.
 */
export function mergeSystemRuns(messages: readonly Message[], options: MergeOptions): MergeResult {
  const out: Message[] = [];
  let run: SystemText[] = [];
  let mergedCount = 0;

  const flush = (): void => {
    if (run.length === 1) {
      out.push(run[0]);
    } else if (run.length > 1) {
      out.push(mergeRun(run, options.delimiter));
      mergedCount++;
    }
    run = [];
  };

  for (const msg of messages) {
    if (isMergeable(msg)) {
      run.push(msg);
    } else {
      flush();
      out.push(msg);
    }
  }
  flush();

  return { messages: out, mergedCount };
}
