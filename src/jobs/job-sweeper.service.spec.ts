import { SchedulerRegistry } from '@nestjs/schedule';
import { JobStoreService } from './job-store.service';
import {
  JOB_SWEEP_INTERVAL_NAME,
  JobSweeperService,
} from './job-sweeper.service';

describe('JobSweeperService', () => {
  let now: number;
  let store: JobStoreService;
  let registry: SchedulerRegistry;
  let sweeper: JobSweeperService;

  beforeEach(() => {
    now = 0;
    store = new JobStoreService({ retentionMs: 1_000, clock: () => now });
    registry = new SchedulerRegistry();
    sweeper = new JobSweeperService(store, registry, { intervalMs: 50 });
  });

  afterEach(() => {
    sweeper.stop();
  });

  it('registers and removes its interval explicitly', () => {
    expect(sweeper.isRunning()).toBe(false);

    sweeper.start();
    sweeper.start();
    expect(registry.getIntervals()).toEqual([JOB_SWEEP_INTERVAL_NAME]);

    sweeper.stop();
    expect(sweeper.isRunning()).toBe(false);
    expect(registry.getIntervals()).toEqual([]);
  });

  it('sweeps on demand without a timer', () => {
    const id = store.create('https://example.com');
    store.update(id, { status: 'running' });
    store.update(id, { status: 'done', chunksIngested: 1, failed: [] });

    expect(sweeper.runSweep(1_000)).toBe(0);
    expect(sweeper.runSweep(1_001)).toBe(1);
    expect(store.size()).toBe(0);
  });

  it('sweeps on each tick once started', () => {
    jest.useFakeTimers();
    try {
      const id = store.create('https://example.com');
      store.update(id, { status: 'running' });
      store.update(id, { status: 'error', error: 'boom' });
      now = 5_000;

      sweeper.start();
      jest.advanceTimersByTime(50);

      expect(store.size()).toBe(0);
    } finally {
      sweeper.stop();
      jest.useRealTimers();
    }
  });
});
