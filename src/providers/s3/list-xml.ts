/**
 * ListObjectsV2 response parsing.
 */

import { extractBlocks, extractElement } from '../xml.js';

export interface ListObjectsPage {
  keys: string[];
  isTruncated: boolean;
  nextContinuationToken?: string;
}

/** Parse a `ListBucketResult` document */
export function parseListObjectsV2(xml: string): ListObjectsPage {
  const keys: string[] = [];
  for (const contents of extractBlocks(xml, 'Contents')) {
    const key = extractElement(contents, 'Key');
    if (key) {
      keys.push(key);
    }
  }

  return {
    keys,
    isTruncated: extractElement(xml, 'IsTruncated') === 'true',
    nextContinuationToken: extractElement(xml, 'NextContinuationToken') || undefined,
  };
}
