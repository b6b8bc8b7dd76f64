#!/usr/bin/env node
/**
 * cli.ts — Process entry point.  Install as Munin plugin symlinks
 * (`freebox_status`, `freebox_snr`, …) or call `freebox-munin <metric> [config]`.
 */

import { runCli } from './freeboxPlugin';

runCli(process.argv[1] ?? 'freebox-munin', process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err);
    process.exitCode = 1;
  },
);
