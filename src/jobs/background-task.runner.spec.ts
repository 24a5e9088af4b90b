import { BackgroundTaskRunner } from './background-task.runner';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('BackgroundTaskRunner', () => {
  it('runs submitted tasks and drains them', async () => {
    const runner = new BackgroundTaskRunner({ concurrency: 0 });
    const seen: string[] = [];

    runner.submit('a', async () => {
      seen.push('a');
    });
    runner.submit('b', async () => {
      seen.push('b');
    });
    await runner.drain();

    expect(seen.sort()).toEqual(['a', 'b']);
    expect(runner.pending).toBe(0);
  });

  it('keeps a rejected task inside the runner', async () => {
    const runner = new BackgroundTaskRunner({ concurrency: 0 });

    runner.submit('broken', async () => {
      throw new Error('boom');
    });

    await expect(runner.drain()).resolves.toBeUndefined();
  });

  it('bounds concurrency when configured', async () => {
    const runner = new BackgroundTaskRunner({ concurrency: 1 });
    const gate = deferred();
    let active = 0;
    let peak = 0;

    const task = async (): Promise<void> => {
      active += 1;
      peak = Math.max(peak, active);
      await gate.promise;
      active -= 1;
    };
    runner.submit('first', task);
    runner.submit('second', task);

    await new Promise((resolve) => setImmediate(resolve));
    expect(active).toBe(1);
    expect(runner.pending).toBe(2);

    gate.resolve();
    await runner.drain();
    expect(peak).toBe(1);
  });
});
