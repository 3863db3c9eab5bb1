#!/usr/bin/env node
/**
 * devstate CLI entry point
 * @module @devstate/cli
 */

import { createProgram } from './program';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  });
