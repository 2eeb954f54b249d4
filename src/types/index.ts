export type {
  StorageScheme,
  Location,
  RemoteObject,
  MappedObject,
  DownloadResult,
} from './location.js';

export type {
  ContainerHandle,
  StorageClient,
  ClientFactory,
  CredentialProvider,
  FileSystemSink,
} from './capabilities.js';
