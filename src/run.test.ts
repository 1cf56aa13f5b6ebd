import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("./util/logger.js", () => ({
  log: { info: vi.fn(), warn: vi.fn(), debug: vi.fn(), error: vi.fn(), trace: vi.fn() },
  configureLogger: vi.fn(),
}));

import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { runCompaction } from "./run.js";
import { configureLogger } from "./util/logger.js";
import { ConfigurationError } from "./util/errors.js";

const SESSION = [
  '{"role":"system","content":"You are a helpful assistant."}',
  '{"role":"system","content":"Tools: shell"}',
  '{"role":"user","content":"list files"}',
  '{"role":"tool-result","content":"a.ts","tool_call_id":"call_1"}',
  '{"role":"tool-result","content":"a.ts","tool_call_id":"call_1"}',
].join("\n");

describe("runCompaction", () => {
  let root: string;
  let configPath: string;

  beforeEach(async () => {
    vi.stubEnv("TRANSCRIPT_COMPACT_WINDOW", "");
    vi.stubEnv("TRANSCRIPT_COMPACT_LOGS_DIR", "");
    root = await fs.mkdtemp(path.join(os.tmpdir(), "transcript-compact-run-"));
    configPath = path.join(root, "config.json5");
    await fs.mkdir(path.join(root, "logs", "2024-05-01-demo"), { recursive: true });
    await fs.writeFile(path.join(root, "logs", "2024-05-01-demo", "conversation.jsonl"), SESSION + "\n");
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(root, { recursive: true, force: true });
  });

  it("compacts the configured store", async () => {
    await fs.writeFile(
      configPath,
      `{ store: { dir: ${JSON.stringify(path.join(root, "logs"))} }, compaction: { backup: true }, logging: { verbose: true } }`,
    );

    const report = await runCompaction({ kind: "all" }, { configPath });

    expect(configureLogger).toHaveBeenCalledWith({ verbose: true, json: false });
    expect(report.ok).toBe(true);
    expect(report.outcomes).toEqual([
      { logId: "2024-05-01-demo", status: "compacted", removedCount: 1, mergedCount: 1, tokensBefore: 19, tokensAfter: 17 },
    ]);
    const dir = path.join(root, "logs", "2024-05-01-demo");
    expect(await fs.readFile(path.join(dir, "conversation.jsonl"), "utf-8")).toBe(
      [
        '{"role":"system","content":"You are a helpful assistant.\\nTools: shell"}',
        '{"role":"user","content":"list files"}',
        '{"role":"tool-result","content":"a.ts","tool_call_id":"call_1"}',
      ].join("\n") + "\n",
    );
    expect(await fs.readFile(path.join(dir, "conversation.backup.jsonl"), "utf-8")).toBe(SESSION + "\n");
  });

  it("compacts a single session with a custom delimiter", async () => {
    await fs.writeFile(
      configPath,
      `{ store: { dir: ${JSON.stringify(path.join(root, "logs"))} }, compaction: { mergeDelimiter: "\\n\\n" } }`,
    );

    const report = await runCompaction({ kind: "session", id: "2024-05-01-demo" }, { configPath });

    expect(report.outcomes[0]).toMatchObject({ status: "compacted", mergedCount: 1 });
    const first = (await fs.readFile(path.join(root, "logs", "2024-05-01-demo", "conversation.jsonl"), "utf-8")).split("\n")[0];
    expect(JSON.parse(first)).toEqual({ role: "system", content: "You are a helpful assistant.\n\nTools: shell" });
  });

  it("fails fast on an invalid config", async () => {
    await fs.writeFile(configPath, "{ compaction: { windowSize: 0 } }");
    await expect(runCompaction({ kind: "all" }, { configPath })).rejects.toThrow(ConfigurationError);
  });
});
