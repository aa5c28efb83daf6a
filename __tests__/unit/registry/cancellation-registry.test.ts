import { describe, expect, it } from 'vitest';
import { CancellationRegistry } from '../../../src/registry/cancellation-registry';

const STARTED = new Date('2026-03-01T12:00:00.000Z');

describe('CancellationRegistry', () => {
  it('refuses a second claim on a running job', () => {
    const runs = new CancellationRegistry(() => STARTED);
    expect(runs.register('job-1')).not.toBeNull();
    expect(runs.register('job-1')).toBeNull();
    expect(runs.register('job-2')).not.toBeNull();
    expect(runs.activeJobIds()).toEqual(['job-1', 'job-2']);
  });

  it('reports status for running and idle jobs', () => {
    const runs = new CancellationRegistry(() => STARTED);
    runs.register('job-1');
    expect(runs.status('job-1')).toEqual({
      isRunning: true,
      startedAt: '2026-03-01T12:00:00.000Z',
      cancelRequested: false,
    });
    expect(runs.status('job-9')).toEqual({ isRunning: false, startedAt: null, cancelRequested: false });
  });

  it('raises the flag seen by the lease', () => {
    const runs = new CancellationRegistry();
    const lease = runs.register('job-1');
    expect(lease?.isCancelled()).toBe(false);

    expect(runs.requestCancel('job-1')).toBe(true);
    expect(lease?.isCancelled()).toBe(true);
    expect(runs.isCancelled('job-1')).toBe(true);
    expect(runs.status('job-1').cancelRequested).toBe(true);
  });

  it('does nothing when cancelling a job that is not running', () => {
    const runs = new CancellationRegistry();
    expect(runs.requestCancel('job-1')).toBe(false);
    expect(runs.isCancelled('job-1')).toBe(false);
  });

  it('lets a new run replace a cancelled one without the old lease removing it', () => {
    const runs = new CancellationRegistry();
    const first = runs.register('job-1');
    runs.requestCancel('job-1');

    const second = runs.register('job-1');
    expect(second).not.toBeNull();
    expect(second?.isCancelled()).toBe(false);

    first?.release();
    expect(runs.status('job-1').isRunning).toBe(true);

    second?.release();
    second?.release();
    expect(runs.size).toBe(0);
  });

  it('drops an entry on forced release', () => {
    const runs = new CancellationRegistry();
    runs.register('job-1');
    runs.release('job-1');
    expect(runs.size).toBe(0);
    expect(runs.register('job-1')).not.toBeNull();
  });
});
