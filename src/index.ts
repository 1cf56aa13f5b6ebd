// transcript-compact: deterministic compaction for conversation transcripts
// Public API exports

// Config
export { type CompactConfig, type CompactionConfig, CompactConfigSchema, DEFAULT_CONFIG, DEFAULT_COMPACTION, resolveCompactionOptions } from "./config/schema.js";
export { loadConfig } from "./config/loader.js";
export { resolveConfigDir, resolveConfigFilePath, resolveLogsDir, resolveLogFile } from "./config/paths.js";

// Message model
export { ROLES, type Role, type JsonValue, type Metadata, type Message, equalsForDedup, dedupKey, isSystem, isPinned, isRole, parseMessage, serializeMessage, validateLog, estimateTokens } from "./compaction/message.js";

// Compaction
export { detectDuplicates, assertWindowSize, type DedupOptions } from "./compaction/dedup.js";
export { mergeSystemRuns, mergeMetadata, type MergeOptions, type MergeResult } from "./compaction/merge.js";
export { compactMessages, isUnchanged, type CompactionResult, type PipelineOptions } from "./compaction/pipeline.js";
export { runCompaction, type RunCompactionOptions } from "./run.js";
export { compact, compactLog, type CompactionScope, type CompactOptions, type CompactionReport, type LogOutcome } from "./compact.js";

// Store
export { type LogStore } from "./store/types.js";
export { JsonlLogStore, parseJsonl, formatJsonl, type JsonlLogStoreOptions } from "./store/jsonl.js";

// Report
export { formatReport, formatOutcome, renderReport, summarize } from "./report.js";

// Errors & logging
export { CompactionError, ConfigurationError, MalformedLogError, StoreReadError, StoreWriteError, errorKind, describeError, describeFailure, type ErrorKind, type CompactionErrorKind } from "./util/errors.js";
export { log, setVerbose, setJsonMode, setLogFile, configureLogger } from "./util/logger.js";
