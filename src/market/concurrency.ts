export type Settled<TIn, TOut> =
  | { item: TIn; status: "fulfilled"; value: TOut }
  | { item: TIn; status: "rejected"; reason: unknown };

/**
* Runs `fn` over `items` with at most `concurrency` calls in flight. A rejection is recorded
* against its item instead of failing the batch; results keep input order, whatever order the
* calls finish in.
*/
export async function settleWithConcurrency<TIn, TOut>(
  items: readonly TIn[],
  concurrency: number,
  fn: (item: TIn, index: number) => Promise<TOut>
): Promise<Array<Settled<TIn, TOut>>> {
  if (!Number.isFinite(concurrency)) {
    throw new Error(`Invalid concurrency: ${concurrency}`);
  }

  const max = Math.max(1, Math.floor(concurrency));
  const results: Array<Settled<TIn, TOut>> = new Array(items.length);
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (nextIndex < items.length) {
      const current = nextIndex;
      nextIndex += 1;

      const item = items[current];
      try {
        results[current] = { item, status: "fulfilled", value: await fn(item, current) };
      } catch (reason) {
        results[current] = { item, status: "rejected", reason };
      }
    }
  }

  await Promise.all(Array.from({ length: Math.min(max, items.length) }, () => worker()));
  return results;
}
