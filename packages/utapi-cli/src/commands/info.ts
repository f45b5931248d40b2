/**
 * utapi usage / app-info commands
 */

import { Command } from 'commander';
import chalk from 'chalk';
import type { GetAppInfoResponse, UsageInfoResponse, UtApi } from 'utapi';
import { getClient, fail } from '../utils/client.js';
import { formatBytes } from '../utils/format.js';

export async function runUsage(client: UtApi, options: { json?: boolean }): Promise<UsageInfoResponse> {
  const usage = await client.getUsageInfo();

  if (options.json) {
    console.log(JSON.stringify(usage, null, 2));
    return usage;
  }

  const percent = usage.limitBytes > 0 ? (usage.totalBytes / usage.limitBytes) * 100 : 0;
  console.log(`Files uploaded: ${usage.filesUploaded}`);
  console.log(`App storage:    ${formatBytes(usage.appTotalBytes)}`);
  console.log(`Total storage:  ${formatBytes(usage.totalBytes)} of ${formatBytes(usage.limitBytes)} (${percent.toFixed(1)}%)`);
  if (percent >= 90) {
    console.log(chalk.yellow('Warning: storage is above 90% of the plan limit.'));
  }
  return usage;
}

export async function runAppInfo(client: UtApi, options: { json?: boolean }): Promise<GetAppInfoResponse> {
  const info = await client.getAppInfo();

  if (options.json) {
    console.log(JSON.stringify(info, null, 2));
    return info;
  }

  console.log(`App ID:             ${info.appId}`);
  console.log(`Default ACL:        ${info.defaultACL}`);
  console.log(`ACL override:       ${info.allowACLOverride ? 'allowed' : 'not allowed'}`);
  return info;
}

export function registerInfoCommands(program: Command): void {
  program
    .command('usage')
    .description('Show storage usage')
    .option('--json', 'Print the raw response')
    .action(async (options: { json?: boolean }) => {
      try {
        await runUsage(getClient(), options);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('app-info')
    .description('Show app settings')
    .option('--json', 'Print the raw response')
    .action(async (options: { json?: boolean }) => {
      try {
        await runAppInfo(getClient(), options);
      } catch (error) {
        fail(error);
      }
    });
}
