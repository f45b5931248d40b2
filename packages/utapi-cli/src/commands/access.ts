/**
 * utapi access command — signed URL for a private file
 */

import { Command } from 'commander';
import type { UtApi } from 'utapi';
import { getClient, fail } from '../utils/client.js';
import { parseCount } from '../utils/options.js';

export async function runAccess(
  client: UtApi,
  fileKey: string,
  options: { expiresIn?: number },
): Promise<string> {
  const url = await client.getPresignedUrl(fileKey, options.expiresIn);
  console.log(url);
  return url;
}

export function registerAccessCommand(program: Command): void {
  program
    .command('access')
    .description('Print a signed URL for a private file')
    .argument('<fileKey>', 'File key')
    .option('--expires-in <seconds>', 'URL lifetime in seconds', parseCount)
    .action(async (fileKey: string, options: { expiresIn?: number }) => {
      try {
        await runAccess(getClient(), fileKey, options);
      } catch (error) {
        fail(error);
      }
    });
}
