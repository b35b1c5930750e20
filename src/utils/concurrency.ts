/**
 * 동시성 제한 유틸리티
 *
 * 입력 순서대로 결과를 채우며, 최대 concurrency 개의 작업만 동시에 실행
 * 하나라도 실패하면 반환 Promise 는 그 에러로 reject (나머지 작업은 새로 시작하지 않음)
 */

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const limit = Number.isFinite(concurrency) ? Math.floor(concurrency) : 1;
  const workerCount = Math.max(1, Math.min(limit, items.length));
  let nextIndex = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers = Array.from({ length: workerCount }, () => worker());
  await Promise.all(workers);

  return results;
}
