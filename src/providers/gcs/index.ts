export { GcsClientFactory, GcsClient } from './client.js';
export type { GcsCredential, GcsClientOptions } from './client.js';
export { GcsCredentialProvider } from './token-provider.js';
