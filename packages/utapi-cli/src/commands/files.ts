/**
 * utapi files commands — list, delete, rename
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { ListFilesResponse, UtApi } from 'utapi';
import { getClient, fail } from '../utils/client.js';
import { formatBytes, formatTimestamp } from '../utils/format.js';
import { parseCount } from '../utils/options.js';

export interface ListCommandOptions {
  limit: number;
  offset: number;
  json?: boolean;
}

/**
 * Fetch one page of files and print it.
 */
export async function runList(client: UtApi, options: ListCommandOptions): Promise<ListFilesResponse> {
  const page = await client.listFiles({ limit: options.limit, offset: options.offset });

  if (options.json) {
    console.log(JSON.stringify(page, null, 2));
    return page;
  }

  if (page.files.length === 0) {
    console.log('No files.');
    return page;
  }

  for (const file of page.files) {
    const custom = file.customId ? chalk.dim(` [${file.customId}]`) : '';
    console.log(`${file.key}  ${file.name}${custom}`);
    console.log(
      chalk.dim(`    ${formatBytes(file.size)}  ${file.status}  ${formatTimestamp(file.uploadedAt)}`),
    );
  }

  if (page.hasMore) {
    console.log(chalk.dim(`More files available (use --offset ${options.offset + page.files.length}).`));
  }
  return page;
}

export async function runDelete(client: UtApi, fileKeys: string[]): Promise<void> {
  const result = await client.deleteFiles(fileKeys);
  if (!result.success) {
    throw new Error('UploadThing reported the delete as unsuccessful');
  }
  console.log(chalk.green(`Deleted ${result.deletedCount} file${result.deletedCount !== 1 ? 's' : ''}.`));
}

export async function runRename(client: UtApi, fileKey: string, newName: string): Promise<void> {
  const result = await client.renameFiles([{ fileKey, newName }]);
  if (!result.success) {
    throw new Error('UploadThing reported the rename as unsuccessful');
  }
  console.log(chalk.green(`Renamed ${fileKey} to ${newName}.`));
}

export function registerFilesCommands(program: Command): void {
  program
    .command('list')
    .alias('ls')
    .description('List uploaded files')
    .option('--limit <n>', 'Page size', parseCount, 500)
    .option('--offset <n>', 'Number of files to skip', parseCount, 0)
    .option('--json', 'Print the raw response')
    .action(async (options: ListCommandOptions) => {
      try {
        await runList(getClient(), options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('delete')
    .alias('rm')
    .description('Delete files by key')
    .argument('<keys...>', 'File keys')
    .action(async (keys: string[]) => {
      try {
        await runDelete(getClient(), keys);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('rename')
    .description('Rename a file')
    .argument('<fileKey>', 'File key')
    .argument('<newName>', 'New file name')
    .action(async (fileKey: string, newName: string) => {
      try {
        await runRename(getClient(), fileKey, newName);
      } catch (error) {
        fail(error);
      }
    });
}
