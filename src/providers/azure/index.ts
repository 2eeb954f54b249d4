export {
  AzureBlobClientFactory,
  AzureBlobClient,
  AZURE_STORAGE_API_VERSION,
} from './client.js';
export type { AzureCredential, AzureBlobClientOptions } from './client.js';
export { AzureAdCredentialProvider, AZURE_STORAGE_SCOPE } from './token-provider.js';
export { parseListBlobsXml } from './list-xml.js';
export type { ListBlobsPage } from './list-xml.js';
