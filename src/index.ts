#!/usr/bin/env node
import { cli } from './cli.js';

cli.parseAsync(process.argv).catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
