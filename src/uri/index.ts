export {
  BLOB_HOST_SUFFIXES,
  parseContainerUri,
  isBlobUri,
  parseBlobUri,
  parseBucketUri,
  parseHttpUri,
  parseLocalUri,
} from './parser.js';
