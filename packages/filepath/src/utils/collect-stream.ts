/**
 * Stream collection utilities
 */

/**
 * Collects all values from an async generator into an array.
 */
export async function collectGenerator<T>(generator: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of generator) {
    results.push(item);
  }
  return results;
}
