/**
 * Progress Reporting Types
 *
 * Progress entries and formatting helpers for long-running batch work such
 * as ingesting a directory of manuals.
 */

import { z } from 'zod';

// =============================================================================
// Progress State
// =============================================================================

export const ProgressState = {
  /** Not yet started */
  PENDING: 'pending',
  RUNNING: 'running',
  COMPLETED: 'completed',
  /** Stopped early by an error */
  FAILED: 'failed',
} as const;

export type ProgressState = (typeof ProgressState)[keyof typeof ProgressState];

export const ProgressStateSchema = z.enum(['pending', 'running', 'completed', 'failed']);

// =============================================================================
// Progress Entry
// =============================================================================

export const ProgressEntrySchema = z.object({
  /** Items processed so far, successful or not */
  current: z.number().int().nonnegative(),
  total: z.number().int().nonnegative(),
  /** 0-100 */
  percentage: z.number().min(0).max(100),
  state: ProgressStateSchema,
  elapsedMs: z.number().nonnegative(),
  estimatedRemainingMs: z.number().nonnegative().optional(),
  successCount: z.number().int().nonnegative(),
  failedCount: z.number().int().nonnegative(),
  /** Item the last update was about */
  currentItem: z.string().optional(),
});

export type ProgressEntry = z.infer<typeof ProgressEntrySchema>;

// =============================================================================
// Reporter Configuration
// =============================================================================

export const ProgressReporterConfigSchema = z.object({
  total: z.number().int().nonnegative(),
  /**
   * Minimum interval between callbacks while running; start and terminal
   * states are always delivered
   * @default 0
   */
  throttleMs: z.number().int().nonnegative().default(0),
  /** Name used in log lines */
  operationName: z.string().default('Processing'),
});

export type ProgressReporterConfig = z.infer<typeof ProgressReporterConfigSchema>;

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Percentage clamped to 0-100; an empty job is complete
 */
export function calculatePercentage(current: number, total: number): number {
  if (total === 0) return 100;
  return Math.min(100, Math.max(0, (current / total) * 100));
}

export function estimateRemainingTime(
  elapsedMs: number,
  current: number,
  total: number
): number | undefined {
  if (current === 0 || current >= total) return undefined;
  return (elapsedMs / current) * (total - current);
}

/**
 * @example
 * ```typescript
 * formatDuration(450);     // '450ms'
 * formatDuration(12_300);  // '12.3s'
 * formatDuration(125_000); // '2m 5s'
 * ```
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;

  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  if (ms < 3600000) return `${minutes}m ${seconds}s`;

  const hours = Math.floor(ms / 3600000);
  const remainingMinutes = Math.floor((ms % 3600000) / 60000);
  return `${hours}h ${remainingMinutes}m`;
}

/**
 * One-line summary: `2/5 (40.0%) - ETA: 3.0s - Elapsed: 2.0s`
 */
export function formatProgress(entry: ProgressEntry): string {
  let status = `${entry.current}/${entry.total} (${entry.percentage.toFixed(1)}%)`;
  if (entry.estimatedRemainingMs !== undefined) {
    status += ` - ETA: ${formatDuration(entry.estimatedRemainingMs)}`;
  }
  status += ` - Elapsed: ${formatDuration(entry.elapsedMs)}`;
  if (entry.failedCount > 0) {
    status += ` - ${entry.failedCount} failed`;
  }
  return status;
}
