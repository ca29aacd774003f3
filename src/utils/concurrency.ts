/**
 * 固定数量的 worker 依次领取任务；单个任务失败只会交给 onError，
 * 不影响其他任务，全部完成后才返回
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T) => Promise<void>,
  onError?: (item: T, error: unknown) => void,
): Promise<void> {
  let nextIndex = 0;
  const workerCount = Math.max(1, Math.min(limit, items.length));

  const workers = Array.from({ length: workerCount }, async () => {
    while (true) {
      const currentIndex = nextIndex++;
      if (currentIndex >= items.length) break;
      const item = items[currentIndex];
      try {
        await fn(item);
      } catch (error) {
        onError?.(item, error);
      }
    }
  });

  await Promise.allSettled(workers);
}
