import { describe, it, expect } from "vitest";
import {
  equalsForDedup,
  estimateTokens,
  isPinned,
  isSystem,
  parseMessage,
  serializeMessage,
  validateLog,
  type Message,
} from "./message.js";
import { MalformedLogError } from "../util/errors.js";

function msg(overrides: Partial<Message> & Pick<Message, "role" | "content">): Message {
  return { metadata: {}, sequenceIndex: 0, ...overrides };
}

describe("equalsForDedup", () => {
  it("ignores metadata", () => {
    const a = msg({ role: "assistant", content: "ok", metadata: { timestamp: "2024-03-01T10:00:00Z" } });
    const b = msg({ role: "assistant", content: "ok", metadata: { timestamp: "2024-03-01T10:05:00Z" }, sequenceIndex: 1 });
    expect(equalsForDedup(a, b)).toBe(true);
  });

  it("requires the same role", () => {
    expect(equalsForDedup(msg({ role: "assistant", content: "ok" }), msg({ role: "system", content: "ok" }))).toBe(false);
  });

  it("is exact, not fuzzy", () => {
    expect(equalsForDedup(msg({ role: "assistant", content: "ok" }), msg({ role: "assistant", content: "ok " }))).toBe(false);
  });

  it("compares structured content independent of key order", () => {
    const a = msg({ role: "tool-result", content: { exit: 0, lines: ["a", "b"] } });
    const b = msg({ role: "tool-result", content: { lines: ["a", "b"], exit: 0 } });
    expect(equalsForDedup(a, b)).toBe(true);
  });

  it("does not equate a string with the number it spells", () => {
    expect(equalsForDedup(msg({ role: "assistant", content: "1" }), msg({ role: "assistant", content: 1 }))).toBe(false);
  });
});

describe("isSystem / isPinned", () => {
  it("detects system role", () => {
    expect(isSystem(msg({ role: "system", content: "x" }))).toBe(true);
    expect(isSystem(msg({ role: "user", content: "x" }))).toBe(false);
  });

  it("treats only pinned: true as pinned", () => {
    expect(isPinned(msg({ role: "assistant", content: "x", metadata: { pinned: true } }))).toBe(true);
    expect(isPinned(msg({ role: "assistant", content: "x", metadata: { pinned: "yes" } }))).toBe(false);
    expect(isPinned(msg({ role: "assistant", content: "x" }))).toBe(false);
  });
});

describe("parseMessage", () => {
  it("splits role and content from metadata", () => {
    const m = parseMessage(
      { role: "tool-result", content: "exit 0", timestamp: "2024-03-01T10:00:00Z", tool_call_id: "call_1" },
      4,
    );
    expect(m).toEqual({
      role: "tool-result",
      content: "exit 0",
      metadata: { timestamp: "2024-03-01T10:00:00Z", tool_call_id: "call_1" },
      sequenceIndex: 4,
    });
  });

  it("rejects a record without role", () => {
    expect(() => parseMessage({ content: "hi" }, 0, "s1")).toThrow(MalformedLogError);
    expect(() => parseMessage({ content: "hi" }, 0, "s1")).toThrow(/^s1: message 0: invalid role/);
  });

  it("rejects an unknown role", () => {
    expect(() => parseMessage({ role: "robot", content: "hi" }, 2)).toThrow(MalformedLogError);
  });

  it("rejects a record without content", () => {
    expect(() => parseMessage({ role: "user" }, 0)).toThrow(/invalid content/);
  });

  it("rejects a non-object record", () => {
    expect(() => parseMessage("hello", 0)).toThrow(/message 0: invalid record/);
  });

  it("serializes back to the stored record", () => {
    const record = { role: "assistant", content: "done", timestamp: "t1", files: ["a.ts"] };
    expect(serializeMessage(parseMessage(record, 0))).toEqual(record);
  });

  it("never lets metadata overwrite role or content", () => {
    const m = msg({ role: "assistant", content: "real", metadata: { content: "shadow", role: "user", model: "m1" } });
    expect(JSON.stringify(serializeMessage(m))).toBe('{"role":"assistant","content":"real","model":"m1"}');
  });
});

describe("validateLog", () => {
  it("accepts strictly increasing indices with gaps", () => {
    expect(() =>
      validateLog([msg({ role: "user", content: "a", sequenceIndex: 0 }), msg({ role: "user", content: "b", sequenceIndex: 5 })]),
    ).not.toThrow();
  });

  it("rejects a shared index", () => {
    const messages = [msg({ role: "user", content: "a", sequenceIndex: 1 }), msg({ role: "user", content: "b", sequenceIndex: 1 })];
    expect(() => validateLog(messages, "s2")).toThrow("s2: message 1: sequence index 1 breaks ordering after 1");
  });

  it("rejects a message without role", () => {
    const messages: Message[] = JSON.parse('[{"content":"x","metadata":{},"sequenceIndex":0}]');
    expect(() => validateLog(messages)).toThrow("message 0: missing or unknown role");
  });
});

describe("validateLog reserved keys", () => {
  it("rejects metadata that shadows a message field", () => {
    const messages = [msg({ role: "user", content: "a", metadata: { role: "system" } })];
    expect(() => validateLog(messages, "s3")).toThrow(MalformedLogError);
    expect(() => validateLog(messages, "s3")).toThrow('s3: message 0: metadata key "role" is reserved');
  });
});

describe("estimateTokens", () => {
  it("counts ~3.5 chars per token, rounding up per message", () => {
    expect(estimateTokens([msg({ role: "user", content: "abcdefg" }), msg({ role: "tool-result", content: {} })])).toBe(3);
  });

  it("is zero for an empty log", () => {
    expect(estimateTokens([])).toBe(0);
  });
});
