/**
 * Path Mapper
 *
 * Turns listed keys into paths relative to the download destination.
 */

import * as path from 'node:path';
import { MalformedUriError } from '../errors/index.js';
import type { MappedObject } from '../types/index.js';

/**
 * Relative destination path of `key` for a request made with `prefix`.
 *
 * The directory part of the key loses its first `prefix.length`
 * characters and one leading `/`; the file name is always kept. Listed
 * keys start with the prefix, so a folder prefix (with or without trailing
 * slash) is stripped entirely and a nested file prefix leaves only the
 * file name. Keys without `/` are returned unchanged.
 */
export function mapObjectPath(prefix: string, key: string): string {
  const slash = key.lastIndexOf('/');
  if (slash === -1) {
    return key;
  }

  const tail = key.slice(slash + 1);
  let head = key.slice(0, slash).slice(prefix.length);
  if (head.startsWith('/')) {
    head = head.slice(1);
  }

  return head ? `${head}/${tail}` : tail;
}

/**
 * Pair every key with its destination under `destRoot`.
 *
 * @throws {MalformedUriError} when a key's `..` segments lead outside `destRoot`
 */
export function mapObjects(prefix: string, keys: readonly string[], destRoot: string): MappedObject[] {
  return keys.map((key) => {
    const relativePath = mapObjectPath(prefix, key);
    const destinationPath = path.join(destRoot, relativePath);
    const fromRoot = path.relative(destRoot, destinationPath);
    if (fromRoot === '..' || fromRoot.startsWith(`..${path.sep}`) || path.isAbsolute(fromRoot)) {
      throw new MalformedUriError({
        message: `Object key '${key}' maps outside the destination '${destRoot}'`,
        key,
      });
    }
    return { key, relativePath, destinationPath };
  });
}
