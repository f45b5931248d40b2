/**
 * utapi — UploadThing REST API client
 *
 * @example
 * ```ts
 * import { createUtApi, uploadFileToPresignedUrl } from 'utapi';
 *
 * // Reads UPLOADTHING_SECRET from the environment or ./.env
 * const utapi = createUtApi();
 *
 * const { data } = await utapi.getPresignedUploadUrl(
 *   [{ name: 'notes.txt', size: 12, type: 'text/plain' }],
 *   'private',
 * );
 * await uploadFileToPresignedUrl('./notes.txt', data[0]);
 *
 * const url = await utapi.getPresignedUrl(data[0].key, 600);
 * ```
 */

// Client
export { UtApi, createUtApi } from './client.js';
export type { UtApiOptions } from './client.js';

// Upload
export {
  createMultipartForm,
  uploadContentToPresignedUrl,
  uploadFileToPresignedUrl,
} from './upload.js';
export type { UploadContent, PresignedUploadOptions } from './upload.js';

// Config
export {
  getUploadthingConfig,
  loadEnvFile,
  validateEnvironmentVariables,
} from './config.js';
export type { UploadthingConfig, ConfigLoadOptions } from './config.js';

// Errors
export { ConfigError, UploadThingError, PresignedUploadError } from './errors.js';

// Logging
export { createLogger, getDefaultLogger, LOG_LEVEL_ENV, STDERR_FD } from './logger.js';
export type { DestinationStream, Logger } from './logger.js';

// Types
export type {
  Acl,
  ContentDisposition,
  DeleteFilesRequest,
  DeleteFilesResponse,
  ListFilesOptions,
  ListFilesRequest,
  ListFilesFile,
  ListFilesResponse,
  RenameFileUpdate,
  RenameFilesRequest,
  RenameFilesResponse,
  UsageInfoResponse,
  RequestFileAccessRequest,
  RequestFileAccessResponse,
  GetAppInfoResponse,
  UploadFileInfo,
  UploadFilesRequest,
  UploadFilesOptions,
  PresignedPostURLs,
  UploadFilesResponse,
} from './types.js';

// Constants
export {
  ACL_VALUES,
  CONTENT_DISPOSITION_VALUES,
  DEFAULT_HOST,
  DEFAULT_VERSION,
  ENDPOINTS,
  HEADERS,
} from './constants.js';
