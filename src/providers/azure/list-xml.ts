/**
 * List Blobs response parsing.
 */

import { extractBlocks, extractElement } from '../xml.js';

export interface ListBlobsPage {
  names: string[];
  nextMarker?: string;
}

/** Parse an `EnumerationResults` document */
export function parseListBlobsXml(xml: string): ListBlobsPage {
  const names: string[] = [];
  for (const blobXml of extractBlocks(xml, 'Blob')) {
    const name = extractElement(blobXml, 'Name');
    if (name) {
      names.push(name);
    }
  }

  const nextMarker = extractElement(xml, 'NextMarker') || undefined;
  return { names, nextMarker };
}
