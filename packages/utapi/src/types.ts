/**
 * Request and response shapes for the UploadThing REST API.
 *
 * Response types are inferred from zod schemas; the client parses every
 * body through its schema, so a body of the wrong shape rejects.
 */

import { z } from 'zod';
import type { ACL_VALUES, CONTENT_DISPOSITION_VALUES } from './constants.js';

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export type Acl = (typeof ACL_VALUES)[number];

export type ContentDisposition = (typeof CONTENT_DISPOSITION_VALUES)[number];

// ---------------------------------------------------------------------------
// deleteFiles
// ---------------------------------------------------------------------------

export interface DeleteFilesRequest {
  fileKeys: string[];
}

export const deleteFilesResponseSchema = z.object({
  success: z.boolean(),
  deletedCount: z.number().int(),
});

export type DeleteFilesResponse = z.infer<typeof deleteFilesResponseSchema>;

// ---------------------------------------------------------------------------
// listFiles
// ---------------------------------------------------------------------------

export interface ListFilesRequest {
  limit: number;
  offset: number;
}

export interface ListFilesOptions {
  /** Page size (default: 500) */
  limit?: number;
  /** Number of files to skip (default: 0) */
  offset?: number;
}

export const listFilesFileSchema = z.object({
  id: z.string(),
  customId: z.string().nullable(),
  key: z.string(),
  name: z.string(),
  status: z.string(),
  size: z.number(),
  uploadedAt: z.number(),
});

export type ListFilesFile = z.infer<typeof listFilesFileSchema>;

export const listFilesResponseSchema = z.object({
  hasMore: z.boolean(),
  files: z.array(listFilesFileSchema),
});

export type ListFilesResponse = z.infer<typeof listFilesResponseSchema>;

// ---------------------------------------------------------------------------
// renameFiles
// ---------------------------------------------------------------------------

export interface RenameFileUpdate {
  fileKey: string;
  newName: string;
}

export interface RenameFilesRequest {
  updates: RenameFileUpdate[];
}

export const renameFilesResponseSchema = z.object({
  success: z.boolean(),
  renamedCount: z.number().int(),
});

export type RenameFilesResponse = z.infer<typeof renameFilesResponseSchema>;

// ---------------------------------------------------------------------------
// getUsageInfo
// ---------------------------------------------------------------------------

export const usageInfoResponseSchema = z.object({
  totalBytes: z.number(),
  appTotalBytes: z.number(),
  filesUploaded: z.number().int(),
  limitBytes: z.number(),
});

export type UsageInfoResponse = z.infer<typeof usageInfoResponseSchema>;

// ---------------------------------------------------------------------------
// requestFileAccess
// ---------------------------------------------------------------------------

export interface RequestFileAccessRequest {
  fileKey: string;
  /** Seconds until the URL expires; omitted when not set */
  expiresIn?: number;
}

export const requestFileAccessResponseSchema = z.object({
  ufsUrl: z.string(),
  /** @deprecated use ufsUrl */
  url: z.string().optional(),
});

export type RequestFileAccessResponse = z.infer<typeof requestFileAccessResponseSchema>;

// ---------------------------------------------------------------------------
// getAppInfo
// ---------------------------------------------------------------------------

export const getAppInfoResponseSchema = z.object({
  appId: z.string(),
  defaultACL: z.string(),
  allowACLOverride: z.boolean(),
});

export type GetAppInfoResponse = z.infer<typeof getAppInfoResponseSchema>;

// ---------------------------------------------------------------------------
// uploadFiles
// ---------------------------------------------------------------------------

/** A file to request a presigned upload for */
export interface UploadFileInfo {
  name: string;
  size: number;
  /** MIME type */
  type: string;
  customId?: string;
}

export interface UploadFilesRequest {
  files: UploadFileInfo[];
  acl: Acl;
  metadata?: unknown;
  contentDisposition?: ContentDisposition;
}

export interface UploadFilesOptions {
  /** Arbitrary JSON passed through to the upload callback */
  metadata?: unknown;
  contentDisposition?: ContentDisposition;
}

export const presignedPostUrlsSchema = z.object({
  key: z.string(),
  fileName: z.string(),
  fileType: z.string(),
  fileUrl: z.string(),
  contentDisposition: z.string(),
  pollingJwt: z.string(),
  pollingUrl: z.string(),
  customId: z.string().nullable(),
  url: z.string(),
  fields: z.record(z.string()),
});

export type PresignedPostURLs = z.infer<typeof presignedPostUrlsSchema>;

export const uploadFilesResponseSchema = z.object({
  data: z.array(presignedPostUrlsSchema),
});

export type UploadFilesResponse = z.infer<typeof uploadFilesResponseSchema>;
