#!/usr/bin/env node

import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { getErrorMessage } from '../utils/errors.js';
import { Logging } from '../utils/logger.js';
import { createPathsProgram } from './commands/paths.js';

const program = createPathsProgram();

// Read version from package.json
let version = '0.0.0';
try {
  const packageJsonPath = join(dirname(fileURLToPath(import.meta.url)), '../../package.json');
  const packageJson = JSON.parse(readFileSync(packageJsonPath, 'utf-8')) as { version: string };
  version = packageJson.version;
} catch (error) {
  Logging.debug('efb.cli', 'Unable to read package version: %s', getErrorMessage(error));
}

program.version(version);

program.parseAsync(process.argv).catch((error: unknown) => {
  Logging.critical('efb.cli', getErrorMessage(error));
  process.exitCode = 1;
});
