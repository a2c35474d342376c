/**
 * Tests for ProgressReporter
 */

import { describe, it, expect } from 'vitest';
import { ProgressReporter, createProgressReporter } from '../../lib/src/progress/reporter.js';
import { ProgressState, type ProgressEntry } from '../../lib/src/progress/types.js';
import { captureLogger } from '../helpers/index.js';

function manualClock(start = 1000) {
  let time = start;
  return {
    now: () => time,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe('ProgressReporter', () => {
  it('should start pending with nothing processed', () => {
    const reporter = createProgressReporter(3, { logger: captureLogger().logger });

    expect(reporter.getState()).toBe(ProgressState.PENDING);
    expect(reporter.getProgress()).toEqual({
      current: 0,
      total: 3,
      percentage: 0,
      state: 'pending',
      elapsedMs: 0,
      successCount: 0,
      failedCount: 0,
    });
  });

  it('should count successes and failures and estimate the time left', () => {
    const clock = manualClock();
    const reporter = new ProgressReporter(4, { now: clock.now, logger: captureLogger().logger });

    reporter.start();
    clock.advance(2000);
    reporter.success('a.pdf');
    reporter.fail('b.pdf', 'Not a PDF file');

    expect(reporter.getProgress()).toEqual({
      current: 2,
      total: 4,
      percentage: 50,
      state: 'running',
      elapsedMs: 2000,
      estimatedRemainingMs: 2000,
      successCount: 1,
      failedCount: 1,
      currentItem: 'b.pdf',
    });
    expect(reporter.getErrors()).toEqual(['b.pdf: Not a PDF file']);
  });

  it('should deliver start, every item and completion to the callback', () => {
    const entries: ProgressEntry[] = [];
    const reporter = new ProgressReporter(2, {
      onProgress: (entry) => entries.push(entry),
      logger: captureLogger().logger,
    });

    reporter.start();
    reporter.success('a.md');
    reporter.success('b.md');
    reporter.complete();

    expect(entries.map((e) => [e.state, e.current])).toEqual([
      ['running', 0],
      ['running', 1],
      ['running', 2],
      ['completed', 2],
    ]);
  });

  it('should throttle intermediate updates but never the last item', () => {
    const clock = manualClock();
    const entries: ProgressEntry[] = [];
    const reporter = new ProgressReporter(3, {
      throttleMs: 100,
      now: clock.now,
      onProgress: (entry) => entries.push(entry),
      logger: captureLogger().logger,
    });

    reporter.start();
    clock.advance(10);
    reporter.success('a');
    clock.advance(10);
    reporter.success('b');
    clock.advance(10);
    reporter.success('c');

    expect(entries.map((e) => e.current)).toEqual([0, 3]);
  });

  it('should ignore updates once finished', () => {
    const reporter = new ProgressReporter(2, { logger: captureLogger().logger });

    reporter.start();
    reporter.success('a');
    reporter.abort('Qdrant unreachable');
    reporter.success('b');

    expect(reporter.getState()).toBe(ProgressState.FAILED);
    expect(reporter.getProgress().current).toBe(1);
    expect(reporter.getErrors()).toEqual(['Qdrant unreachable']);
  });

  it('should log the completion summary', () => {
    const clock = manualClock();
    const { logger, lines } = captureLogger();
    const reporter = new ProgressReporter(1, { operationName: 'Ingest', now: clock.now, logger });

    reporter.start();
    reporter.fail('a.pdf', 'boom');
    clock.advance(1500);
    reporter.complete();

    expect(lines.some((line) => line.includes('Ingest: completed') && line.includes('"failed":1'))).toBe(true);
    expect(reporter.getElapsedMs()).toBe(1500);
  });
});
