/**
 * Direct upload to a presigned POST target.
 *
 * The target is S3-compatible: the presigned fields go first as plain
 * form fields, then the file part. The fields carry the authorization,
 * so no API key is sent.
 */

import { open } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import { PresignedUploadError } from './errors.js';
import { getDefaultLogger, type Logger } from './logger.js';
import type { PresignedPostURLs } from './types.js';

/** Upload body: raw bytes, a string (UTF-8) or a readable stream */
export type UploadContent = Uint8Array | string | Readable;

export interface PresignedUploadOptions {
  /** Custom fetch implementation (for testing). Default: global fetch */
  fetchFn?: typeof fetch;
  logger?: Logger;
}

/**
 * Read exactly `size` bytes from the content.
 * Rejects when the content holds fewer bytes.
 */
async function readExactly(content: UploadContent, size: number): Promise<Buffer> {
  if (typeof content === 'string' || content instanceof Uint8Array) {
    const bytes = typeof content === 'string' ? Buffer.from(content, 'utf-8') : Buffer.from(content);
    if (bytes.length < size) {
      throw new Error(`unexpected end of content: wanted ${size} bytes, got ${bytes.length}`);
    }
    return bytes.subarray(0, size);
  }

  const chunks: Buffer[] = [];
  let total = 0;
  for await (const chunk of content) {
    const buf = typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : Buffer.from(chunk);
    chunks.push(buf);
    total += buf.length;
    if (total >= size) break;
  }
  if (total < size) {
    throw new Error(`unexpected end of content: wanted ${size} bytes, got ${total}`);
  }
  return Buffer.concat(chunks).subarray(0, size);
}

/**
 * Build the multipart/form-data body for a presigned POST.
 *
 * With no content or a non-positive size the file part is empty.
 */
export async function createMultipartForm(
  content: UploadContent | null,
  size: number,
  fileName: string,
  fields: Record<string, string>,
): Promise<FormData> {
  const form = new FormData();
  for (const [name, value] of Object.entries(fields)) {
    form.append(name, value);
  }

  const bytes = content !== null && size > 0 ? await readExactly(content, size) : Buffer.alloc(0);
  form.append('file', new Blob([bytes]), fileName);
  return form;
}

async function postForm(
  presigned: PresignedPostURLs,
  form: FormData,
  options?: PresignedUploadOptions,
): Promise<void> {
  const fetchFn = options?.fetchFn ?? globalThis.fetch;
  const logger = (options?.logger ?? getDefaultLogger()).child({ component: 'presigned-upload' });

  // fetch sets the multipart Content-Type with its boundary
  const response = await fetchFn(presigned.url, {
    method: 'POST',
    body: form,
  });

  if (response.status < 200 || response.status >= 300) {
    const text = await response.text();
    logger.warn({ key: presigned.key, status: response.status }, 'Presigned upload failed');
    throw new PresignedUploadError(response.status, text);
  }

  logger.debug({ key: presigned.key, fileName: presigned.fileName }, 'Presigned upload complete');
}

/**
 * Upload in-memory or streamed content to a presigned POST target.
 *
 * @param size - Number of bytes to read from content
 * @param presigned - One entry of UtApi.getPresignedUploadUrl's `data`
 */
export async function uploadContentToPresignedUrl(
  content: UploadContent | null,
  size: number,
  presigned: PresignedPostURLs,
  options?: PresignedUploadOptions,
): Promise<void> {
  const form = await createMultipartForm(content, size, presigned.fileName, presigned.fields);
  await postForm(presigned, form, options);
}

/**
 * Upload a local file to a presigned POST target.
 * The file handle is closed before the request is sent.
 */
export async function uploadFileToPresignedUrl(
  filePath: string,
  presigned: PresignedPostURLs,
  options?: PresignedUploadOptions,
): Promise<void> {
  const handle = await open(filePath, 'r');
  let form: FormData;
  try {
    const { size } = await handle.stat();
    const bytes = await handle.readFile();
    form = await createMultipartForm(bytes, size, presigned.fileName, presigned.fields);
  } finally {
    await handle.close();
  }
  await postForm(presigned, form, options);
}
