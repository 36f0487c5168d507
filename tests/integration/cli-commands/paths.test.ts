/**
 * efb-paths CLI Integration Test
 *
 * Runs the commander program in process against an isolated
 * EFB_DATA_PATH / EFB_CACHE_PATH and checks the printed paths.
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { existsSync, writeFileSync } from 'node:fs';
import { join, sep } from 'node:path';
import { createPathsProgram } from '../../../src/cli/commands/paths.js';
import { getOsUserName } from '../../../src/config/path-config.js';
import { setupTestIsolation } from '../../helpers/test-isolation.js';

describe('efb-paths', () => {
  const isolation = setupTestIsolation();

  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  async function run(...args: string[]): Promise<void> {
    await createPathsProgram().parseAsync(args, { from: 'user' });
  }

  function base(): string {
    return join(isolation.dataRoot, getOsUserName());
  }

  it('should print the base path', async () => {
    await run('base');

    expect(logSpy).toHaveBeenCalledWith(base() + sep);
  });

  it('should print and create a channel data path', async () => {
    await run('data', 'irc');

    const expected = join(base(), 'default', 'irc') + sep;
    expect(logSpy).toHaveBeenCalledWith(expected);
    expect(existsSync(expected)).toBe(true);
  });

  it('should honour --profile and --data-root', async () => {
    const dataRoot = join(isolation.root, 'custom');

    await run('--profile', 'work', '--data-root', dataRoot, 'data', 'irc');

    expect(logSpy).toHaveBeenCalledWith(join(dataRoot, getOsUserName(), 'work', 'irc') + sep);
  });

  it('should print config paths', async () => {
    await run('config');
    await run('config', 'irc', '--ext', 'json');

    expect(logSpy).toHaveBeenNthCalledWith(1, join(base(), 'default', 'config.yaml'));
    expect(logSpy).toHaveBeenNthCalledWith(2, join(base(), 'default', 'irc', 'config.json'));
  });

  it('should print cache paths', async () => {
    await run('cache', 'irc');
    await run('--cache-root', join(isolation.root, 'other-cache'), 'cache', 'irc');

    expect(logSpy).toHaveBeenNthCalledWith(1, join(isolation.cacheRoot, getOsUserName(), 'default', 'irc') + sep);
    expect(logSpy).toHaveBeenNthCalledWith(
      2,
      join(isolation.root, 'other-cache', getOsUserName(), 'default', 'irc') + sep
    );
  });

  it('should print the plugins path', async () => {
    await run('plugins');

    expect(logSpy).toHaveBeenCalledWith(join(base(), 'plugins') + sep);
  });

  it('should report invalid options', async () => {
    await run('--data-root', '', 'base');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(
      expect.stringContaining('[efb.cli] Failed to resolve base path: Invalid path configuration: dataRoot:')
    );
    expect(process.exitCode).toBe(1);
  });

  it('should report filesystem errors', async () => {
    const blocker = join(isolation.root, 'blocker');
    writeFileSync(blocker, '');

    await run('--data-root', blocker, 'plugins');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith(expect.stringContaining('[efb.cli] Failed to resolve plugins path: '));
    expect(process.exitCode).toBe(1);
  });
});
