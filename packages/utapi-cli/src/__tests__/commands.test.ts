/**
 * Tests for files, usage, app-info and access commands
 *
 * Covers:
 * - runList output, pagination hint, --json
 * - runDelete / runRename success and unsuccessful responses
 * - runUsage / runAppInfo formatting
 * - runAccess expiresIn passthrough
 * - Option parsers and command registration
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Command, InvalidArgumentError } from 'commander';
import { UploadThingError } from 'utapi';
import { runList, runDelete, runRename, registerFilesCommands } from '../commands/files.js';
import { runUsage, runAppInfo, registerInfoCommands } from '../commands/info.js';
import { runAccess, registerAccessCommand } from '../commands/access.js';
import { parseCount, oneOf } from '../utils/options.js';
import { formatBytes, formatTimestamp } from '../utils/format.js';
import { captureConsole, makeClient, mockFetchByPath } from './helpers.js';

let output: { lines: string[]; restore: () => void };

beforeEach(() => {
  output = captureConsole();
});

afterEach(() => {
  output.restore();
});

// ── Fixtures ─────────────────────────────────────────────────────────────────

const page = {
  hasMore: true,
  files: [
    {
      id: 'id-1',
      customId: null,
      key: 'key-1',
      name: 'a.png',
      status: 'Uploaded',
      size: 1024,
      uploadedAt: 1767225600000,
    },
    {
      id: 'id-2',
      customId: 'invoice-7',
      key: 'key-2',
      name: 'b.pdf',
      status: 'Uploaded',
      size: 2048,
      uploadedAt: 1767225660000,
    },
  ],
};

// ── files ────────────────────────────────────────────────────────────────────

describe('runList', () => {
  it('prints each file with size, status and upload time', async () => {
    const fetch = mockFetchByPath({ '/v6/listFiles': page });
    await runList(makeClient(fetch), { limit: 500, offset: 0 });

    expect(output.lines).toEqual([
      'key-1  a.png',
      '    1 KB  Uploaded  2026-01-01T00:00:00Z',
      'key-2  b.pdf [invoice-7]',
      '    2 KB  Uploaded  2026-01-01T00:01:00Z',
      'More files available (use --offset 2).',
    ]);
  });

  it('sends limit and offset', async () => {
    const fetch = mockFetchByPath({ '/v6/listFiles': { hasMore: false, files: [] } });
    await runList(makeClient(fetch), { limit: 20, offset: 40 });

    expect(JSON.parse(String(fetch.mock.calls[0][1].body))).toEqual({ limit: 20, offset: 40 });
    expect(output.lines).toEqual(['No files.']);
  });

  it('prints raw JSON with --json', async () => {
    const fetch = mockFetchByPath({ '/v6/listFiles': page });
    await runList(makeClient(fetch), { limit: 500, offset: 0, json: true });

    expect(output.lines).toHaveLength(1);
    expect(JSON.parse(output.lines[0])).toEqual(page);
  });

  it('propagates API errors', async () => {
    const fetch = mockFetchByPath({});
    await expect(runList(makeClient(fetch), { limit: 500, offset: 0 })).rejects.toBeInstanceOf(
      UploadThingError,
    );
  });
});

describe('runDelete', () => {
  it('reports the deleted count', async () => {
    const fetch = mockFetchByPath({ '/v6/deleteFiles': { success: true, deletedCount: 2 } });
    await runDelete(makeClient(fetch), ['key-1', 'key-2']);

    expect(output.lines).toEqual(['Deleted 2 files.']);
  });

  it('uses the singular for one file', async () => {
    const fetch = mockFetchByPath({ '/v6/deleteFiles': { success: true, deletedCount: 1 } });
    await runDelete(makeClient(fetch), ['key-1']);

    expect(output.lines).toEqual(['Deleted 1 file.']);
  });

  it('throws when the API reports failure', async () => {
    const fetch = mockFetchByPath({ '/v6/deleteFiles': { success: false, deletedCount: 0 } });
    await expect(runDelete(makeClient(fetch), ['key-1'])).rejects.toThrow(
      'UploadThing reported the delete as unsuccessful',
    );
  });
});

describe('runRename', () => {
  it('sends one update and reports it', async () => {
    const fetch = mockFetchByPath({ '/v6/renameFiles': { success: true, renamedCount: 1 } });
    await runRename(makeClient(fetch), 'key-1', 'cover.png');

    expect(JSON.parse(String(fetch.mock.calls[0][1].body))).toEqual({
      updates: [{ fileKey: 'key-1', newName: 'cover.png' }],
    });
    expect(output.lines).toEqual(['Renamed key-1 to cover.png.']);
  });
});

// ── usage / app-info ─────────────────────────────────────────────────────────

describe('runUsage', () => {
  it('prints usage against the plan limit', async () => {
    const fetch = mockFetchByPath({
      '/v6/getUsageInfo': {
        totalBytes: 5_000_000,
        appTotalBytes: 4_000_000,
        filesUploaded: 12,
        limitBytes: 2_147_483_648,
      },
    });
    await runUsage(makeClient(fetch), {});

    expect(output.lines).toEqual([
      'Files uploaded: 12',
      'App storage:    3.81 MB',
      'Total storage:  4.77 MB of 2 GB (0.2%)',
    ]);
  });

  it('warns above 90% of the limit', async () => {
    const fetch = mockFetchByPath({
      '/v6/getUsageInfo': {
        totalBytes: 1_900,
        appTotalBytes: 1_900,
        filesUploaded: 3,
        limitBytes: 2_048,
      },
    });
    await runUsage(makeClient(fetch), {});

    expect(output.lines[2]).toBe('Total storage:  1.86 KB of 2 KB (92.8%)');
    expect(output.lines[3]).toBe('Warning: storage is above 90% of the plan limit.');
  });
});

describe('runAppInfo', () => {
  it('prints app settings', async () => {
    const fetch = mockFetchByPath({
      '/v7/getAppInfo': { appId: 'app-1', defaultACL: 'private', allowACLOverride: false },
    });
    const info = await runAppInfo(makeClient(fetch), {});

    expect(info.appId).toBe('app-1');
    expect(output.lines).toEqual([
      'App ID:             app-1',
      'Default ACL:        private',
      'ACL override:       not allowed',
    ]);
  });
});

// ── access ───────────────────────────────────────────────────────────────────

describe('runAccess', () => {
  it('prints the signed URL', async () => {
    const fetch = mockFetchByPath({
      '/v6/requestFileAccess': { ufsUrl: 'https://app.ufs.example.test/f/key-1?sig=1' },
    });
    const url = await runAccess(makeClient(fetch), 'key-1', { expiresIn: 600 });

    expect(url).toBe('https://app.ufs.example.test/f/key-1?sig=1');
    expect(output.lines).toEqual(['https://app.ufs.example.test/f/key-1?sig=1']);
    expect(fetch.mock.calls[0][1].body).toBe('{"fileKey":"key-1","expiresIn":600}');
  });
});

// ── utils ────────────────────────────────────────────────────────────────────

describe('option parsers', () => {
  it('parseCount accepts non-negative integers', () => {
    expect(parseCount('0')).toBe(0);
    expect(parseCount('250')).toBe(250);
  });

  it('parseCount rejects anything else', () => {
    expect(() => parseCount('-1')).toThrow(InvalidArgumentError);
    expect(() => parseCount('1.5')).toThrow(InvalidArgumentError);
    expect(() => parseCount('ten')).toThrow(InvalidArgumentError);
  });

  it('oneOf accepts listed values only', () => {
    const parse = oneOf(['public-read', 'private'] as const);
    expect(parse('private')).toBe('private');
    expect(() => parse('public')).toThrow('Expected one of: public-read, private.');
  });
});

describe('format', () => {
  it('formatBytes', () => {
    expect(formatBytes(0)).toBe('0 B');
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
  });

  it('formatTimestamp drops milliseconds', () => {
    expect(formatTimestamp(1767225600123)).toBe('2026-01-01T00:00:00Z');
  });
});

// ── registration ─────────────────────────────────────────────────────────────

describe('command registration', () => {
  it('registers files subcommands', () => {
    const program = new Command();
    registerFilesCommands(program);
    expect(program.commands.map((c) => c.name())).toEqual(['list', 'delete', 'rename']);
  });

  it('registers usage, app-info and access', () => {
    const program = new Command();
    registerInfoCommands(program);
    registerAccessCommand(program);
    expect(program.commands.map((c) => c.name())).toEqual(['usage', 'app-info', 'access']);
  });
});
