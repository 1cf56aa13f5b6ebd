import { z } from "zod";
import { ConfigurationError } from "../util/errors.js";

// ── Compaction ──
export const CompactionSchema = z.object({
  windowSize: z.number().int().min(1).default(3),
  mergeDelimiter: z.string().default("\n"),
  concurrency: z.number().int().min(1).default(4),
  backup: z.boolean().default(false),
});

// ── Store ──
const StoreSchema = z.object({
  dir: z.string().optional(),
});

// ── Logging ──
const LoggingSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
  file: z.string().optional(),
});

export const CompactConfigSchema = z.object({
  compaction: CompactionSchema.optional(),
  store: StoreSchema.optional(),
  logging: LoggingSchema.optional(),
});

export type CompactConfig = z.infer<typeof CompactConfigSchema>;
export type CompactionConfig = z.infer<typeof CompactionSchema>;

export const DEFAULT_COMPACTION: CompactionConfig = {
  windowSize: 3,
  mergeDelimiter: "\n",
  concurrency: 4,
  backup: false,
};

export const DEFAULT_CONFIG: CompactConfig = {
  compaction: DEFAULT_COMPACTION,
  logging: { verbose: false, json: false },
};

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validates caller-supplied compaction tunables and fills in defaults.
 * A window size below 1 (or any other invalid value) raises ConfigurationError.
 */
export function resolveCompactionOptions(input: Partial<CompactionConfig> = {}): CompactionConfig {
  const result = CompactionSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid compaction options: ${formatIssues(result.error)}`);
  }
  return result.data;
}
