/**
 * utapi upload command
 *
 * 1. Stat each local file and detect its MIME type
 * 2. Request presigned POST targets for all files in one call
 * 3. Upload each file to its target, in order
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { Command } from 'commander';
import chalk from 'chalk';
import { lookup } from 'mime-types';
import {
  ACL_VALUES,
  CONTENT_DISPOSITION_VALUES,
  uploadFileToPresignedUrl,
  type Acl,
  type ContentDisposition,
  type PresignedPostURLs,
  type Logger,
  type UploadFileInfo,
  type UtApi,
} from 'utapi';
import { getClient, getLogger, fail } from '../utils/client.js';
import { formatBytes } from '../utils/format.js';
import { oneOf } from '../utils/options.js';

export interface UploadCommandOptions {
  acl: Acl;
  contentDisposition?: ContentDisposition;
  customId?: string;
}

export interface UploadedFile {
  localPath: string;
  key: string;
  fileUrl: string;
}

const FALLBACK_MIME_TYPE = 'application/octet-stream';

/**
 * Describe a local file for the uploadFiles request.
 */
export async function describeFile(localPath: string, customId?: string): Promise<UploadFileInfo> {
  const stats = await fs.stat(localPath);
  if (!stats.isFile()) {
    throw new Error(`Not a file: ${localPath}`);
  }

  const name = path.basename(localPath);
  const info: UploadFileInfo = {
    name,
    size: stats.size,
    type: lookup(name) || FALLBACK_MIME_TYPE,
  };
  if (customId) {
    info.customId = customId;
  }
  return info;
}

export async function runUpload(
  client: UtApi,
  localPaths: string[],
  options: UploadCommandOptions,
  logger: Logger = getLogger(),
): Promise<UploadedFile[]> {
  if (options.customId && localPaths.length > 1) {
    throw new Error('--custom-id can only be used with a single file');
  }

  const files = await Promise.all(localPaths.map((p) => describeFile(p, options.customId)));

  const { data } = await client.getPresignedUploadUrl(files, options.acl, {
    contentDisposition: options.contentDisposition,
  });
  if (data.length !== files.length) {
    throw new Error(`Expected ${files.length} upload targets, got ${data.length}`);
  }

  const uploaded: UploadedFile[] = [];
  for (const [i, localPath] of localPaths.entries()) {
    const presigned: PresignedPostURLs = data[i];
    console.log(chalk.blue(`Uploading ${files[i].name} (${formatBytes(files[i].size)})...`));
    await uploadFileToPresignedUrl(localPath, presigned, { logger });
    console.log(chalk.green(`  ${presigned.key} -> ${presigned.fileUrl}`));
    uploaded.push({ localPath, key: presigned.key, fileUrl: presigned.fileUrl });
  }

  console.log(chalk.green(`Uploaded ${uploaded.length} file${uploaded.length !== 1 ? 's' : ''}.`));
  return uploaded;
}

export function registerUploadCommand(program: Command): void {
  program
    .command('upload')
    .description('Upload local files')
    .argument('<paths...>', 'Files to upload')
    .option('--acl <acl>', `Access control (${ACL_VALUES.join(' | ')})`, oneOf(ACL_VALUES), 'public-read')
    .option(
      '--content-disposition <value>',
      `Content-Disposition (${CONTENT_DISPOSITION_VALUES.join(' | ')})`,
      oneOf(CONTENT_DISPOSITION_VALUES),
    )
    .option('--custom-id <id>', 'Custom ID for a single file')
    .action(async (paths: string[], options: UploadCommandOptions) => {
      try {
        await runUpload(getClient(), paths, options);
      } catch (error) {
        fail(error);
      }
    });
}
