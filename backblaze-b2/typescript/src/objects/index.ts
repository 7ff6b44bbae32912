export {
  FILE_INFO_HEADER_PREFIX,
  buildMetadataHeaders,
  percentEncode,
  validateMetadata,
} from './metadata.js';

export {
  buildUploadHeaders,
  parseUploadUrl,
  readUploadSource,
  sha1Hex,
} from './upload.js';

export {
  assertChunkSize,
  readInChunks,
  resolveDestination,
  saveToFile,
  type SaveOptions,
} from './download.js';
