/**
 * 입력 배열을 주어진 동시성으로 처리하고, 결과를 원래 순서로 돌려준다.
 */
export async function runWithConcurrency<TInput, TResult>(
  inputs: readonly TInput[],
  concurrency: number,
  worker: (input: TInput, index: number) => Promise<TResult>,
): Promise<TResult[]> {
  if (inputs.length === 0) return [];
  const effectiveConcurrency = Math.max(1, Math.min(concurrency, inputs.length));
  const results = new Array<TResult>(inputs.length);
  let cursor = 0;

  async function runner(): Promise<void> {
    while (cursor < inputs.length) {
      const index = cursor++;
      results[index] = await worker(inputs[index], index);
    }
  }

  await Promise.all(Array.from({ length: effectiveConcurrency }, runner));
  return results;
}

/**
 * 여러 호출자가 공유하는 세마포어. 동시에 실행되는 작업 수를 maxConcurrent로 제한
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly waiters: Array<() => void> = [];
  private readonly maxConcurrent: number;

  constructor(maxConcurrent: number) {
    this.maxConcurrent = Math.max(1, Math.floor(maxConcurrent));
  }

  get running(): number {
    return this.active;
  }

  get pending(): number {
    return this.waiters.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.active < this.maxConcurrent) {
      this.active++;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.waiters.push(resolve));
  }

  private release(): void {
    const next = this.waiters.shift();
    // 대기자가 있으면 슬롯을 그대로 넘긴다
    if (next) next();
    else this.active--;
  }
}
