/**
 * Progress Reporter
 *
 * Counts successes and failures across a batch, estimates the time left and
 * hands each change to a callback.
 */

import { type Logger, resolveLogger } from '../logging/logger.js';
import {
  ProgressReporterConfigSchema,
  ProgressState,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  type ProgressEntry,
  type ProgressReporterConfig,
} from './types.js';

export interface ProgressReporterOptions {
  onProgress?: (entry: ProgressEntry) => void;
  throttleMs?: number;
  operationName?: string;
  logger?: Logger;
  /** Clock in milliseconds; defaults to Date.now */
  now?: () => number;
}

// =============================================================================
// Progress Reporter
// =============================================================================

/**
 * @example
 * ```typescript
 * const reporter = new ProgressReporter(paths.length, {
 *   operationName: 'Ingest',
 *   onProgress: (entry) => console.log(formatProgress(entry)),
 * });
 * reporter.start();
 * for (const path of paths) {
 *   await ingest(path).then(() => reporter.success(path), (e) => reporter.fail(path, e.message));
 * }
 * reporter.complete();
 * ```
 */
export class ProgressReporter {
  private readonly config: ProgressReporterConfig;
  private readonly onProgress: ((entry: ProgressEntry) => void) | undefined;
  private readonly logger: Logger;
  private readonly now: () => number;
  private successCount = 0;
  private failedCount = 0;
  private state: ProgressState = ProgressState.PENDING;
  private startTime: number | null = null;
  private endTime: number | null = null;
  private lastCallbackTime = 0;
  private currentItem: string | undefined;
  private readonly errors: string[] = [];

  constructor(total: number, options: ProgressReporterOptions = {}) {
    this.config = ProgressReporterConfigSchema.parse({
      total,
      ...(options.throttleMs !== undefined ? { throttleMs: options.throttleMs } : {}),
      ...(options.operationName !== undefined ? { operationName: options.operationName } : {}),
    });
    this.onProgress = options.onProgress;
    this.logger = resolveLogger('progress', options.logger);
    this.now = options.now ?? Date.now;
  }

  start(): void {
    this.startTime = this.now();
    this.state = ProgressState.RUNNING;
    this.logger.debug(`${this.config.operationName}: starting`, { total: this.config.total });
    this.emit(true);
  }

  success(item?: string): void {
    this.record(item, true);
  }

  fail(item: string, error: string): void {
    this.errors.push(`${item}: ${error}`);
    this.record(item, false);
  }

  complete(): void {
    this.finish(ProgressState.COMPLETED);
    this.logger.info(`${this.config.operationName}: completed`, {
      succeeded: this.successCount,
      failed: this.failedCount,
      duration: formatDuration(this.getElapsedMs()),
    });
  }

  abort(error: string): void {
    this.errors.push(error);
    this.finish(ProgressState.FAILED);
    this.logger.error(`${this.config.operationName}: aborted`, { error });
  }

  getState(): ProgressState {
    return this.state;
  }

  getErrors(): readonly string[] {
    return this.errors;
  }

  getElapsedMs(): number {
    if (this.startTime === null) return 0;
    return (this.endTime ?? this.now()) - this.startTime;
  }

  getProgress(): ProgressEntry {
    const current = this.successCount + this.failedCount;
    const elapsedMs = this.getElapsedMs();
    const remaining =
      this.state === ProgressState.RUNNING
        ? estimateRemainingTime(elapsedMs, current, this.config.total)
        : undefined;

    return {
      current,
      total: this.config.total,
      percentage: calculatePercentage(current, this.config.total),
      state: this.state,
      elapsedMs,
      ...(remaining !== undefined ? { estimatedRemainingMs: remaining } : {}),
      successCount: this.successCount,
      failedCount: this.failedCount,
      ...(this.currentItem !== undefined ? { currentItem: this.currentItem } : {}),
    };
  }

  private record(item: string | undefined, succeeded: boolean): void {
    if (this.state !== ProgressState.RUNNING) {
      return;
    }
    if (succeeded) {
      this.successCount++;
    } else {
      this.failedCount++;
    }
    this.currentItem = item;
    // The last item is always reported
    this.emit(this.successCount + this.failedCount >= this.config.total);
  }

  private finish(state: ProgressState): void {
    if (this.state !== ProgressState.RUNNING) {
      return;
    }
    this.endTime = this.now();
    this.state = state;
    this.emit(true);
  }

  private emit(force: boolean): void {
    const now = this.now();
    if (!force && this.config.throttleMs > 0 && now - this.lastCallbackTime < this.config.throttleMs) {
      return;
    }
    this.lastCallbackTime = now;
    this.onProgress?.(this.getProgress());
  }
}

export function createProgressReporter(total: number, options?: ProgressReporterOptions): ProgressReporter {
  return new ProgressReporter(total, options);
}
