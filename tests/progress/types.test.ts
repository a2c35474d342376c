/**
 * Tests for progress helpers
 */

import { describe, it, expect } from 'vitest';
import {
  ProgressEntrySchema,
  ProgressReporterConfigSchema,
  calculatePercentage,
  estimateRemainingTime,
  formatDuration,
  formatProgress,
} from '../../lib/src/progress/types.js';

describe('ProgressReporterConfigSchema', () => {
  it('should apply defaults', () => {
    expect(ProgressReporterConfigSchema.parse({ total: 5 })).toEqual({
      total: 5,
      throttleMs: 0,
      operationName: 'Processing',
    });
  });

  it('should reject a negative total', () => {
    expect(ProgressReporterConfigSchema.safeParse({ total: -1 }).success).toBe(false);
  });
});

describe('ProgressEntrySchema', () => {
  it('should enforce percentage bounds', () => {
    const entry = {
      current: 1,
      total: 2,
      percentage: 150,
      state: 'running',
      elapsedMs: 10,
      successCount: 1,
      failedCount: 0,
    };

    expect(ProgressEntrySchema.safeParse(entry).success).toBe(false);
    expect(ProgressEntrySchema.safeParse({ ...entry, percentage: 50 }).success).toBe(true);
  });
});

describe('calculatePercentage', () => {
  it('should calculate and clamp', () => {
    expect(calculatePercentage(1, 4)).toBe(25);
    expect(calculatePercentage(5, 4)).toBe(100);
  });

  it('should treat an empty job as complete', () => {
    expect(calculatePercentage(0, 0)).toBe(100);
  });
});

describe('estimateRemainingTime', () => {
  it('should extrapolate from the average so far', () => {
    expect(estimateRemainingTime(3000, 3, 10)).toBe(7000);
  });

  it('should return undefined before the first item and after the last', () => {
    expect(estimateRemainingTime(500, 0, 10)).toBeUndefined();
    expect(estimateRemainingTime(500, 10, 10)).toBeUndefined();
  });
});

describe('formatDuration', () => {
  it('should pick a unit by magnitude', () => {
    expect(formatDuration(450)).toBe('450ms');
    expect(formatDuration(12300)).toBe('12.3s');
    expect(formatDuration(125000)).toBe('2m 5s');
    expect(formatDuration(3900000)).toBe('1h 5m');
  });
});

describe('formatProgress', () => {
  it('should leave out the ETA and failures when there are none', () => {
    expect(
      formatProgress({
        current: 3,
        total: 3,
        percentage: 100,
        state: 'completed',
        elapsedMs: 900,
        successCount: 3,
        failedCount: 0,
      })
    ).toBe('3/3 (100.0%) - Elapsed: 900ms');
  });
});
