import { runBounded } from '../../../src/harness/WorkerPool';
import { CancelledError } from '../../../src/common/errors';
import { delay } from '../../../src/common/utils';

describe('runBounded', () => {
  it('runs every index once', async () => {
    const seen: number[] = [];
    await runBounded(6, async index => {
      seen.push(index);
    }, { concurrency: 3 });

    expect(seen.sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5]);
  });

  it('never exceeds the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await runBounded(12, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(2);
      active--;
    }, { concurrency: 4 });

    expect(peak).toBe(4);
  });

  it('does nothing for a zero count', async () => {
    const task = jest.fn(async () => undefined);
    await runBounded(0, task, { concurrency: 5 });
    expect(task).not.toHaveBeenCalled();
  });

  it('stops starting tasks after the first failure and rethrows it', async () => {
    const started: number[] = [];
    const run = runBounded(10, async index => {
      started.push(index);
      if (index === 1) {
        throw new Error('task 1 failed');
      }
      await delay(5);
    }, { concurrency: 2 });

    await expect(run).rejects.toThrow('task 1 failed');
    expect(started.length).toBeLessThan(10);
  });

  it('rejects with CancelledError once the signal aborts', async () => {
    const controller = new AbortController();
    controller.abort('stop');

    await expect(runBounded(3, async () => undefined, { concurrency: 1, signal: controller.signal, stage: 'read' }))
      .rejects.toBeInstanceOf(CancelledError);
  });
});
