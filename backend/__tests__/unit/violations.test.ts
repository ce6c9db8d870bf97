/**
 * Unit Tests: Violation Reporting
 */

import { describe, it, expect, vi } from 'vitest';
import type { ViolationEvent } from '@ratewarden/shared';
import { ViolationReporter, createCompositeSink, createLoggingSink } from '../../src/violations';
import { ManualClock } from '../../src/runtime/clock';
import type { Logger } from '../../src/logger';
import { logger } from '../../src/logger';

describe('ViolationReporter', () => {
  const clock = new ManualClock(42_000);

  it('should fill in id, category, severity and timestamp', () => {
    const report = vi.fn();
    const reporter = new ViolationReporter({ report }, clock);

    const event = reporter.emit({ type: 'store_degraded', actorId: null, action: null, score: null, violationCount: null });

    expect(event).toMatchObject({ type: 'store_degraded', category: 'operational', severity: 'warning', timestamp: 42_000 });
    expect(event.id).toHaveLength(21);
    expect(report).toHaveBeenCalledWith(event);
  });

  it('should keep an explicit severity', () => {
    const reporter = new ViolationReporter(null, clock);

    const event = reporter.emit({ type: 'rate_limit_exceeded', severity: 'info', actorId: 'user-1', action: 'payment', score: 10, violationCount: 1 });

    expect(event.severity).toBe('info');
    expect(event.category).toBe('security');
  });

  it('should not let a failing sink stop the others', () => {
    const received: ViolationEvent[] = [];
    const sink = createCompositeSink(
      { report: () => { throw new Error('sink down'); } },
      { report: () => Promise.reject(new Error('sink down')) },
      { report: (event) => { received.push(event); } },
    );
    const reporter = new ViolationReporter(sink, clock);

    expect(() => reporter.emit({ type: 'suspicious_activity', actorId: 'user-1', action: 'payment', score: 110, violationCount: 11 })).not.toThrow();
    expect(received).toHaveLength(1);
  });

  it('should log events at their severity', () => {
    const log: Logger = logger.child({ module: 'test' });
    const error = vi.spyOn(log, 'error');
    const warn = vi.spyOn(log, 'warn');
    const reporter = new ViolationReporter(createLoggingSink(log), clock);

    reporter.emit({ type: 'suspicious_activity', actorId: 'user-1', action: 'payment', score: 110, violationCount: 11 });
    reporter.emit({ type: 'rate_limit_exceeded', actorId: 'user-1', action: 'payment', score: 10, violationCount: 1 });

    expect(error).toHaveBeenCalledTimes(1);
    expect(error.mock.calls[0][1]).toBe('Violation event: suspicious_activity');
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
