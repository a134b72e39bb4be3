/**
 * Wrap a generator factory so that every `for await` starts a fresh pass.
 * A bare async generator can only be consumed once.
 */
export function restartable<T>(factory: () => AsyncIterator<T>): AsyncIterable<T> {
  return {
    [Symbol.asyncIterator]: factory,
  };
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}
