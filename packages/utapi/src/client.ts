/**
 * UploadThing REST API Client
 *
 * Typed client for the UploadThing server API: deleting, listing and
 * renaming files, usage and app info, file access URLs and presigned
 * upload requests. Every call is a single JSON POST; there is no retry
 * and no caching.
 *
 * Auth: UPLOADTHING_SECRET env var or passed explicitly.
 *
 * @module client
 */

import type { ZodType, ZodTypeDef } from 'zod';
import {
  API_KEY_ENV,
  DEFAULT_BE_ADAPTER,
  DEFAULT_HOST,
  DEFAULT_LIST_LIMIT,
  DEFAULT_VERSION,
  ENDPOINTS,
  HEADERS,
  type Endpoint,
} from './constants.js';
import { getUploadthingConfig, type ConfigLoadOptions } from './config.js';
import { ConfigError, UploadThingError } from './errors.js';
import { getDefaultLogger, type Logger } from './logger.js';
import {
  deleteFilesResponseSchema,
  getAppInfoResponseSchema,
  listFilesResponseSchema,
  renameFilesResponseSchema,
  requestFileAccessResponseSchema,
  uploadFilesResponseSchema,
  usageInfoResponseSchema,
  type Acl,
  type DeleteFilesRequest,
  type DeleteFilesResponse,
  type GetAppInfoResponse,
  type ListFilesOptions,
  type ListFilesRequest,
  type ListFilesResponse,
  type RenameFileUpdate,
  type RenameFilesRequest,
  type RenameFilesResponse,
  type RequestFileAccessRequest,
  type UploadFileInfo,
  type UploadFilesOptions,
  type UploadFilesRequest,
  type UploadFilesResponse,
  type UsageInfoResponse,
} from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Options for constructing a UtApi client */
export interface UtApiOptions {
  /** UploadThing secret key. Falls back to UPLOADTHING_SECRET env var. */
  apiKey?: string;

  /** Override the API host (for testing). Default: https://api.uploadthing.com */
  host?: string;

  /** Value of the x-uploadthing-version header. Default: 7.6.0 */
  version?: string;

  /** x-uploadthing-fe-package header; not sent when empty */
  fePackage?: string;

  /** x-uploadthing-be-adapter header; not sent when empty. Default: utapi */
  beAdapter?: string;

  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;

  logger?: Logger;
}

// ---------------------------------------------------------------------------
// UtApi class
// ---------------------------------------------------------------------------

/**
 * Typed client for the UploadThing REST API.
 *
 * @example
 * ```ts
 * const utapi = new UtApi({ apiKey: process.env.UPLOADTHING_SECRET });
 *
 * const { files, hasMore } = await utapi.listFiles({ limit: 50 });
 * await utapi.renameFiles([{ fileKey: files[0].key, newName: 'report.pdf' }]);
 *
 * const url = await utapi.getPresignedUrl(files[0].key, 3600);
 * ```
 */
export class UtApi {
  private readonly host: string;
  private readonly apiKey: string;
  private readonly version: string;
  private readonly fePackage: string;
  private readonly beAdapter: string;
  private readonly fetchFn: typeof fetch;
  private readonly logger: Logger;

  constructor(options?: UtApiOptions) {
    const key = options?.apiKey ?? process.env[API_KEY_ENV];
    if (!key) {
      throw new ConfigError(`${API_KEY_ENV} is not set`);
    }
    this.apiKey = key;
    this.host = (options?.host ?? DEFAULT_HOST).replace(/\/+$/, '');
    this.version = options?.version ?? DEFAULT_VERSION;
    this.fePackage = options?.fePackage ?? '';
    this.beAdapter = options?.beAdapter ?? DEFAULT_BE_ADAPTER;
    this.fetchFn = options?.fetchFn ?? globalThis.fetch;
    this.logger = (options?.logger ?? getDefaultLogger()).child({ component: 'utapi-client' });
  }

  // -------------------------------------------------------------------------
  // Public API
  // -------------------------------------------------------------------------

  /**
   * Delete files by key.
   */
  async deleteFiles(fileKeys: string[]): Promise<DeleteFilesResponse> {
    const payload: DeleteFilesRequest = { fileKeys };
    return this.post(ENDPOINTS.deleteFiles, payload, deleteFilesResponseSchema);
  }

  /**
   * List one page of the app's files.
   */
  async listFiles(options?: ListFilesOptions): Promise<ListFilesResponse> {
    const payload: ListFilesRequest = {
      limit: options?.limit ?? DEFAULT_LIST_LIMIT,
      offset: options?.offset ?? 0,
    };
    return this.post(ENDPOINTS.listFiles, payload, listFilesResponseSchema);
  }

  /**
   * Rename files. Each update pairs a file key with its new name.
   */
  async renameFiles(updates: RenameFileUpdate[]): Promise<RenameFilesResponse> {
    const payload: RenameFilesRequest = { updates };
    return this.post(ENDPOINTS.renameFiles, payload, renameFilesResponseSchema);
  }

  async getUsageInfo(): Promise<UsageInfoResponse> {
    return this.post(ENDPOINTS.getUsageInfo, {}, usageInfoResponseSchema);
  }

  /**
   * Get a signed URL for a private file.
   *
   * @param expiresIn - Seconds until the URL expires; the server default applies when omitted or 0
   * @returns The ufsUrl from the response
   */
  async getPresignedUrl(fileKey: string, expiresIn?: number): Promise<string> {
    const payload: RequestFileAccessRequest = { fileKey };
    if (expiresIn) {
      payload.expiresIn = expiresIn;
    }
    const result = await this.post(
      ENDPOINTS.requestFileAccess,
      payload,
      requestFileAccessResponseSchema,
    );
    return result.ufsUrl;
  }

  async getAppInfo(): Promise<GetAppInfoResponse> {
    return this.post(ENDPOINTS.getAppInfo, {}, getAppInfoResponseSchema);
  }

  /**
   * Request presigned POST targets for uploading files without a file router.
   * Pass each returned entry to uploadFileToPresignedUrl or
   * uploadContentToPresignedUrl.
   */
  async getPresignedUploadUrl(
    files: UploadFileInfo[],
    acl: Acl,
    options?: UploadFilesOptions,
  ): Promise<UploadFilesResponse> {
    const payload: UploadFilesRequest = { files, acl };
    if (options?.metadata !== undefined) {
      payload.metadata = options.metadata;
    }
    if (options?.contentDisposition) {
      payload.contentDisposition = options.contentDisposition;
    }
    return this.post(ENDPOINTS.uploadFiles, payload, uploadFilesResponseSchema);
  }

  // -------------------------------------------------------------------------
  // Internal
  // -------------------------------------------------------------------------

  private buildHeaders(): Record<string, string> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      [HEADERS.apiKey]: this.apiKey,
      [HEADERS.version]: this.version,
    };
    if (this.fePackage) {
      headers[HEADERS.fePackage] = this.fePackage;
    }
    if (this.beAdapter) {
      headers[HEADERS.beAdapter] = this.beAdapter;
    }
    return headers;
  }

  /**
   * POST a JSON body and parse the response through its schema.
   * Non-2xx responses reject with UploadThingError; transport and
   * decode errors reject unchanged.
   */
  private async post<T>(
    path: Endpoint,
    body: object,
    schema: ZodType<T, ZodTypeDef, unknown>,
  ): Promise<T> {
    const url = `${this.host}${path}`;

    const response = await this.fetchFn(url, {
      method: 'POST',
      headers: this.buildHeaders(),
      body: JSON.stringify(body),
    });

    this.logger.debug({ path, status: response.status }, 'UploadThing API response');

    if (response.status < 200 || response.status >= 300) {
      const text = await response.text();
      this.logger.warn({ path, status: response.status }, 'UploadThing API request failed');
      throw new UploadThingError(response.status, text, path);
    }

    const json: unknown = await response.json();
    return schema.parse(json);
  }
}

/**
 * Build a client from the environment, loading the dotenv file first.
 * Throws ConfigError when UPLOADTHING_SECRET is unset.
 */
export function createUtApi(
  options?: Omit<UtApiOptions, 'apiKey' | 'host' | 'version'> & ConfigLoadOptions,
): UtApi {
  const config = getUploadthingConfig({ envPath: options?.envPath, logger: options?.logger });
  return new UtApi({
    apiKey: config.apiKey,
    host: config.host,
    version: config.version,
    fePackage: options?.fePackage,
    beAdapter: options?.beAdapter,
    fetchFn: options?.fetchFn,
    logger: options?.logger,
  });
}
