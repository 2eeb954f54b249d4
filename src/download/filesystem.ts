/**
 * Node filesystem sink.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import type { FileSystemSink } from '../types/index.js';

export class NodeFileSystemSink implements FileSystemSink {
  async makeDirs(dirPath: string): Promise<void> {
    await mkdir(dirPath, { recursive: true });
  }

  async writeFile(filePath: string, data: Uint8Array): Promise<void> {
    await writeFile(filePath, data, { flag: 'w' });
  }
}
