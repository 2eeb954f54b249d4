export { Downloader } from './downloader.js';
export type { DownloaderOptions } from './downloader.js';
export { NodeFileSystemSink } from './filesystem.js';
