/**
 * Location and object types shared by every pipeline.
 */

/** URI schemes understood by the parsers */
export type StorageScheme = 'https' | 'http' | 'gs' | 's3' | 'file';

/**
 * Parsed form of a storage URI
 */
export interface Location {
  readonly scheme: StorageScheme;
  /** Base URL the client talks to (account URL, bucket host, file root) */
  readonly endpoint: string;
  /** Storage account, for providers that have one */
  readonly account?: string;
  /** Container or bucket; never empty */
  readonly container: string;
  /** Key prefix beyond the container; empty for the container root */
  readonly prefix: string;
  /** The URI this location was parsed from */
  readonly uri: string;
}

/** Object reported by a container listing */
export interface RemoteObject {
  readonly name: string;
}

/** A listed key paired with where it lands on disk */
export interface MappedObject {
  readonly key: string;
  readonly relativePath: string;
  readonly destinationPath: string;
}

/** Outcome of a completed download */
export interface DownloadResult {
  readonly uri: string;
  readonly destination: string;
  readonly objects: readonly MappedObject[];
}
