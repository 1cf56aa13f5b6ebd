import { z } from "zod";
import { MalformedLogError } from "../util/errors.js";

export const ROLES = ["user", "assistant", "system", "tool-result"] as const;
export type Role = (typeof ROLES)[number];

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type Metadata = Record<string, JsonValue>;

/**
 * One entry of a transcript. `content` is opaque to the compactor: it is only
 * compared for equality or concatenated, never inspected.
 */
export interface Message {
  readonly role: Role;
  readonly content: JsonValue;
  readonly metadata: Readonly<Metadata>;
  /** Position in the source log. Orders messages, carries no meaning. */
  readonly sequenceIndex: number;
}

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema),
  ]),
);

// Stored form: role and content, every other key is metadata.
const StoredMessageSchema = z
  .object({
    role: z.enum(ROLES),
    content: JsonValueSchema,
  })
  .catchall(JsonValueSchema);

export function isRole(value: unknown): value is Role {
  return ROLES.some((role) => role === value);
}

export function isSystem(m: Message): boolean {
  return m.role === "system";
}

/** Pinned messages are never dropped as duplicates. */
export function isPinned(m: Message): boolean {
  return m.metadata.pinned === true;
}

// Key-order independent serialization so structured content compares by value.
function canonicalJson(value: JsonValue): string {
  if (Array.isArray(value)) return `[${value.map(canonicalJson).join(",")}]`;
  if (value !== null && typeof value === "object") {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalJson(value[k])}`).join(",")}}`;
  }
  return JSON.stringify(value);
}

/** Identity of a message for duplicate detection: role plus exact content. */
export function dedupKey(m: Message): string {
  const content = typeof m.content === "string" ? `s:${m.content}` : `j:${canonicalJson(m.content)}`;
  return `${m.role}\u0000${content}`;
}

/**
 * Structural equality over role and content. Metadata is excluded: two turns
 * that differ only by timestamp are still duplicates.
 */
export function equalsForDedup(a: Message, b: Message): boolean {
  return dedupKey(a) === dedupKey(b);
}

/**
 * Builds a Message from one stored record. The record's `role` and `content`
 * become fields, all remaining keys become metadata verbatim.
 */
export function parseMessage(raw: unknown, sequenceIndex: number, logId?: string): Message {
  const result = StoredMessageSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "record";
    throw new MalformedLogError(
      logId,
      `message ${sequenceIndex}: invalid ${where}${issue ? ` (${issue.message})` : ""}`,
    );
  }
  const { role, content, ...metadata } = result.data;
  return { role, content, metadata, sequenceIndex };
}

// Metadata keys that would shadow a message field when stored.
const RESERVED_KEYS = ["role", "content"];

/** Stored form of a message: role and content first, then metadata keys. */
export function serializeMessage(m: Message): Metadata {
  const record: Metadata = { role: m.role, content: m.content, ...m.metadata };
  // Fields take precedence over same-named metadata keys.
  record.role = m.role;
  record.content = m.content;
  return record;
}

/**
 * Checks that every message carries a known role, that no metadata key shadows
 * `role` or `content`, and that sequence indices are integers in strictly
 * increasing order.
 */
export function validateLog(messages: readonly Message[], logId?: string): void {
  let previous = -1;
  for (let i = 0; i < messages.length; i++) {
    const m = messages[i];
    if (!isRole(m.role)) {
      throw new MalformedLogError(logId, `message ${i}: missing or unknown role`);
    }
    const reserved = RESERVED_KEYS.find((key) => Object.hasOwn(m.metadata, key));
    if (reserved) {
      throw new MalformedLogError(logId, `message ${i}: metadata key "${reserved}" is reserved`);
    }
    if (!Number.isInteger(m.sequenceIndex) || m.sequenceIndex <= previous) {
      throw new MalformedLogError(
        logId,
        `message ${i}: sequence index ${m.sequenceIndex} breaks ordering after ${previous}`,
      );
    }
    previous = m.sequenceIndex;
  }
}

function contentLength(m: Message): number {
  return typeof m.content === "string" ? m.content.length : JSON.stringify(m.content).length;
}

/** Rough token count (~3.5 chars/token), used only for reporting. */
export function estimateTokens(messages: readonly Message[]): number {
  return messages.reduce((sum, m) => sum + Math.ceil(contentLength(m) / 3.5), 0);
}
