export { LocalClientFactory, LocalDirectoryHandle, NoCredentialProvider } from './client.js';
export type { LocalCredential } from './client.js';
