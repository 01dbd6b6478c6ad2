#!/usr/bin/env node

import { createRequire } from 'module';
import chalk from 'chalk';
import { z } from 'zod';
import { buildProgram } from './cli/program.js';
import { loadEnvFile } from './config/options.js';
import { describeError } from './errors.js';

// Get version from package.json
const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require('../package.json'));

loadEnvFile();

buildProgram(pkg.version)
  .parseAsync()
  .catch((error: unknown) => {
    console.error(chalk.red(`  ${describeError(error)}`));
    process.exitCode = 1;
  });
