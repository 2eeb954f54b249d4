/**
 * Object Lister
 */

import type { ContainerHandle } from '../types/index.js';

/**
 * Keys under `prefix`, lazily and in the order the store reports them.
 *
 * A prefix naming a single object yields that key alone; a folder prefix
 * yields every descendant. Nothing is filtered or reordered.
 */
export async function* listObjectKeys(container: ContainerHandle, prefix: string): AsyncGenerator<string> {
  for await (const object of container.list(prefix)) {
    yield object.name;
  }
}

/**
 * Drain an async sequence into an array.
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) {
    items.push(item);
  }
  return items;
}
