/**
 * Shared helpers for CLI command tests.
 */

import { vi } from 'vitest';
import { UtApi, createLogger } from 'utapi';

/** Build a mock fetch that answers each endpoint path with its JSON body */
export function mockFetchByPath(responses: Record<string, unknown>) {
  return vi.fn().mockImplementation((url: string) => {
    const pathname = new URL(url).pathname;
    if (!(pathname in responses)) {
      return Promise.resolve({
        ok: false,
        status: 404,
        text: () => Promise.resolve(`no mock for ${pathname}`),
        json: () => Promise.resolve({}),
      });
    }
    const body = responses[pathname];
    return Promise.resolve({
      ok: true,
      status: 200,
      text: () => Promise.resolve(JSON.stringify(body)),
      json: () => Promise.resolve(body),
    });
  });
}

export function makeClient(fetchFn: typeof fetch): UtApi {
  return new UtApi({ apiKey: 'test-secret', fetchFn, logger: createLogger('silent') });
}

/**
 * Capture console.log output with ANSI codes stripped.
 * Returns the captured lines and a restore function.
 */
export function captureConsole(): { lines: string[]; restore: () => void } {
  const lines: string[] = [];
  const originalLog = console.log;
  console.log = (...args: unknown[]) => {
    const text = args
      .map((a) => String(a))
      .join(' ')
      .replace(/\x1b\[[0-9;]*m/g, '');
    lines.push(text);
  };
  return {
    lines,
    restore: () => {
      console.log = originalLog;
    },
  };
}
