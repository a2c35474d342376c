/**
 * Progress Module
 */

export {
  ProgressState,
  ProgressStateSchema,
  ProgressEntrySchema,
  ProgressReporterConfigSchema,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  formatProgress,
  type ProgressEntry,
  type ProgressReporterConfig,
} from './types.js';

export {
  ProgressReporter,
  createProgressReporter,
  type ProgressReporterOptions,
} from './reporter.js';
