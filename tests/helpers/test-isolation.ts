/**
 * Test isolation helpers
 *
 * Points EFB_DATA_PATH and EFB_CACHE_PATH at a fresh temporary directory for
 * the duration of a suite, so nothing is written under the real home
 * directory (log files included).
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, beforeAll } from 'vitest';
import { CACHE_PATH_ENV, DATA_PATH_ENV } from '../../src/config/path-config.js';
import { resetLogging } from '../../src/utils/logger.js';

export interface TestIsolation {
  /** Temporary directory holding the data and cache roots */
  readonly root: string;
  readonly dataRoot: string;
  readonly cacheRoot: string;
}

export function setupTestIsolation(): TestIsolation {
  const saved: Record<string, string | undefined> = {};
  const isolation = { root: '', dataRoot: '', cacheRoot: '' };

  beforeAll(() => {
    isolation.root = mkdtempSync(join(tmpdir(), 'efb-test-'));
    isolation.dataRoot = join(isolation.root, 'data');
    isolation.cacheRoot = join(isolation.root, 'cache');

    for (const name of [DATA_PATH_ENV, CACHE_PATH_ENV]) {
      saved[name] = process.env[name];
    }
    process.env[DATA_PATH_ENV] = isolation.dataRoot;
    process.env[CACHE_PATH_ENV] = isolation.cacheRoot;
    resetLogging();
  });

  afterAll(() => {
    for (const [name, value] of Object.entries(saved)) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    resetLogging();
    rmSync(isolation.root, { recursive: true, force: true });
  });

  return isolation;
}
