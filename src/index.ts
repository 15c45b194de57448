export * from './metadata/index.js';
export {
  MetadataError,
  isMetadataError,
  metadataErrorCodes,
  type MetadataErrorCode,
  type MetadataErrorContext,
  type CodecName
} from './lib/errors.js';
export { createApp } from './api/app.js';
