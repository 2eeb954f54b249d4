export { HttpClientFactory, HttpBearerCredentialProvider } from './client.js';
export type { HttpCredential, HttpClientOptions } from './client.js';
