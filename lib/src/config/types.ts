/**
 * Pipeline Configuration
 *
 * Immutable configuration values passed explicitly through chunking and
 * search. Every tuned heuristic lives here as a default, never as a
 * hard-coded constant at the call site.
 */

import { z } from 'zod';

// =============================================================================
// Errors
// =============================================================================

export const ConfigErrorCode = {
  INVALID_VALUE: 'INVALID_VALUE',
  MISSING_VALUE: 'MISSING_VALUE',
} as const;

export type ConfigErrorCode = (typeof ConfigErrorCode)[keyof typeof ConfigErrorCode];

export class ConfigError extends Error {
  readonly code: ConfigErrorCode;
  /** Offending variable or field names */
  readonly fields: string[];

  constructor(message: string, code: ConfigErrorCode, fields: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.fields = fields;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

// =============================================================================
// Chunking
// =============================================================================

/**
 * Header/footer line patterns for reference-manual page furniture such as
 * `12/709 RM0008 Rev 21` or `RM0008 Rev 21 12/709`.
 */
export const DEFAULT_HEADER_PATTERNS: readonly string[] = [
  '^\\d+/\\d+\\s+[A-Z]{2}\\d+\\s+Rev\\s+\\d+\\s*$',
  '^[A-Z]{2}\\d+\\s+Rev\\s+\\d+\\s+\\d+/\\d+\\s*$',
  '^RM\\d+\\s+[A-Za-z].*$',
];

export const ChunkingConfigSchema = z
  .object({
    /** Unit budget per chunk, annotation included, overlap excluded */
    chunkSize: z.number().int().positive().default(500),
    /** Total overlap budget; each neighbour contributes half */
    chunkOverlap: z.number().int().nonnegative().default(50),
    /** Sections whose stripped content is shorter than this are treated as TOC noise */
    tocMinChars: z.number().int().nonnegative().default(50),
    /** Distinct register identifiers that make a chunk an overview */
    overviewMinIdentifiers: z.number().int().positive().default(4),
    /** Identifiers listed in a regular chunk's key terms */
    maxKeyIdentifiers: z.number().int().positive().default(5),
    /** Bit-field names listed in a register definition's key terms */
    maxFieldTerms: z.number().int().positive().default(8),
    /** Regular expression sources matched against each line (multiline) */
    headerPatterns: z.array(z.string()).default([...DEFAULT_HEADER_PATTERNS]),
    /** Longest line considered a running header/footer candidate */
    headerMaxLength: z.number().int().positive().default(80),
    /** Occurrences of the same digit-masked line that mark it as page furniture */
    headerMinRepeats: z.number().int().min(2).default(3),
  })
  .refine((c) => c.chunkOverlap < c.chunkSize, {
    message: 'chunkOverlap must be smaller than chunkSize',
    path: ['chunkOverlap'],
  });

export type ChunkingConfig = z.infer<typeof ChunkingConfigSchema>;

// =============================================================================
// Search
// =============================================================================

export const BoostTiersSchema = z.object({
  title: z.number().nonnegative().default(0.2),
  keyTerms: z.number().nonnegative().default(0.1),
  body: z.number().nonnegative().default(0.05),
});

export type BoostTiers = z.infer<typeof BoostTiersSchema>;

export const SearchConfigSchema = z.object({
  topK: z.number().int().positive().default(5),
  /** Multiplier applied to topK when rerank or keyword boost is requested */
  candidateExpansionFactor: z.number().int().positive().default(5),
  boosts: BoostTiersSchema.default({}),
  /** Characters in the result snippet */
  snippetLength: z.number().int().positive().default(200),
});

export type SearchConfig = z.infer<typeof SearchConfigSchema>;

// =============================================================================
// Pipeline
// =============================================================================

export const PipelineConfigSchema = z.object({
  chunking: ChunkingConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  /** Texts per embedding request */
  embeddingBatchSize: z.number().int().positive().default(100),
  /** Points per store write */
  upsertBatchSize: z.number().int().positive().default(64),
});

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (child !== null && typeof child === 'object' && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

export function createDefaultChunkingConfig(
  overrides?: z.input<typeof ChunkingConfigSchema>
): Readonly<ChunkingConfig> {
  return deepFreeze(ChunkingConfigSchema.parse(overrides ?? {}));
}

export function createDefaultSearchConfig(
  overrides?: z.input<typeof SearchConfigSchema>
): Readonly<SearchConfig> {
  return deepFreeze(SearchConfigSchema.parse(overrides ?? {}));
}

/**
 * Parse and freeze a pipeline configuration
 */
export function createDefaultPipelineConfig(
  overrides?: PipelineConfigInput
): Readonly<PipelineConfig> {
  return deepFreeze(PipelineConfigSchema.parse(overrides ?? {}));
}
