#!/usr/bin/env node
/**
 * Deployment Annotator CLI
 * Creates a Deployment, merges annotations into it and reports the outcome
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { argv, env } from 'node:process';
import { z } from 'zod';
import { EXIT_FAILED, runCli } from '../src/cli/run';
import { isApplicationError } from '../src/errors';

// Handle both development (apps/) and production (dist/apps/) paths
const packageJsonPath = __dirname.includes('dist')
  ? join(__dirname, '../../package.json') // dist/apps/ -> root
  : join(__dirname, '../package.json'); // apps/ -> root
const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));

runCli(argv.slice(2), { version: packageJson.version, env })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(isApplicationError(error) ? error.toJSON() : error);
    process.exitCode = EXIT_FAILED;
  });
