/**
 * UploadThing API constants
 *
 * Endpoint paths, header names and defaults shared by the client
 * and the config loader.
 */

/** Production API host */
export const DEFAULT_HOST = 'https://api.uploadthing.com';

/** Value sent in the x-uploadthing-version header */
export const DEFAULT_VERSION = '7.6.0';

/** Value sent in the x-uploadthing-be-adapter header */
export const DEFAULT_BE_ADAPTER = 'utapi';

/** Env var holding the API key */
export const API_KEY_ENV = 'UPLOADTHING_SECRET';

/** Default page size for listFiles */
export const DEFAULT_LIST_LIMIT = 500;

export const ENDPOINTS = {
  deleteFiles: '/v6/deleteFiles',
  listFiles: '/v6/listFiles',
  renameFiles: '/v6/renameFiles',
  getUsageInfo: '/v6/getUsageInfo',
  requestFileAccess: '/v6/requestFileAccess',
  uploadFiles: '/v6/uploadFiles',
  getAppInfo: '/v7/getAppInfo',
} as const;

export type Endpoint = (typeof ENDPOINTS)[keyof typeof ENDPOINTS];

export const HEADERS = {
  apiKey: 'x-uploadthing-api-key',
  version: 'x-uploadthing-version',
  fePackage: 'x-uploadthing-fe-package',
  beAdapter: 'x-uploadthing-be-adapter',
} as const;

/** ACL values accepted by uploadFiles */
export const ACL_VALUES = ['public-read', 'private'] as const;

/** Content-Disposition values accepted by uploadFiles */
export const CONTENT_DISPOSITION_VALUES = ['inline', 'attachment'] as const;
