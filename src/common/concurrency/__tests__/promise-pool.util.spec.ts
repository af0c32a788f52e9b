import { ConcurrencyLimiter, runWithConcurrency } from '../promise-pool.util';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('runWithConcurrency', () => {
  it('입력 순서대로 결과를 돌려주고 동시성을 지킨다', async () => {
    let active = 0;
    let peak = 0;
    const results = await runWithConcurrency([30, 10, 20, 5], 2, async (value) => {
      active++;
      peak = Math.max(peak, active);
      await tick();
      active--;
      return value * 2;
    });

    expect(results).toEqual([60, 20, 40, 10]);
    expect(peak).toBe(2);
  });

  it('빈 입력은 즉시 빈 배열', async () => {
    const worker = jest.fn();
    await expect(runWithConcurrency([], 4, worker)).resolves.toEqual([]);
    expect(worker).not.toHaveBeenCalled();
  });
});

describe('ConcurrencyLimiter', () => {
  it('동시에 실행되는 작업 수를 제한한다', async () => {
    const limiter = new ConcurrencyLimiter(2);
    const releases: Array<() => void> = [];
    const started: number[] = [];

    const tasks = [1, 2, 3].map((id) =>
      limiter.run(
        () =>
          new Promise<number>((resolve) => {
            started.push(id);
            releases.push(() => resolve(id));
          }),
      ),
    );
    await tick();

    expect(started).toEqual([1, 2]);
    expect(limiter.running).toBe(2);
    expect(limiter.pending).toBe(1);

    releases[0]();
    await tick();
    expect(started).toEqual([1, 2, 3]);

    releases[1]();
    releases[2]();
    await expect(Promise.all(tasks)).resolves.toEqual([1, 2, 3]);
    expect(limiter.running).toBe(0);
  });

  it('작업이 실패해도 슬롯을 반환한다', async () => {
    const limiter = new ConcurrencyLimiter(1);
    await expect(limiter.run(() => Promise.reject(new Error('boom')))).rejects.toThrow('boom');
    await expect(limiter.run(async () => 'ok')).resolves.toBe('ok');
    expect(limiter.running).toBe(0);
  });
});
