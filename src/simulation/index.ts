/**
 * Simulation layer for exercising pipelines without a network or disk.
 */

export { MockStorage, StaticCredentialProvider, MemoryFileSystemSink } from './storage.js';
export type { StorageCall, MockStorageOptions, SinkEvent } from './storage.js';
export { RecordingTransport, httpResponse } from './transport.js';
export type { RequestHandler } from './transport.js';
