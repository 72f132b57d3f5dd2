/**
 * Test utilities for IFileSystem implementations
 */

export async function collectGenerator<T>(gen: AsyncIterable<T>): Promise<T[]> {
  const results: T[] = [];
  for await (const item of gen) {
    results.push(item);
  }
  return results;
}

/**
 * Directory entry names without `.` and `..`, sorted.
 */
export async function collectEntryNames(gen: AsyncIterable<string>): Promise<string[]> {
  const names = await collectGenerator(gen);
  return names.filter((name) => name !== "." && name !== "..").sort();
}
