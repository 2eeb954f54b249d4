export { S3ClientFactory, S3Client, awsEndpoint } from './client.js';
export type { S3ClientOptions } from './client.js';
export { EnvS3CredentialProvider } from './credentials.js';
export type { S3Credential } from './credentials.js';
export { AwsSignerV4, EMPTY_PAYLOAD_HASH } from './signing.js';
export { parseListObjectsV2 } from './list-xml.js';
export type { ListObjectsPage } from './list-xml.js';
