#!/usr/bin/env node
import { CliExitError, parseArgs } from './cli.js';
import { formatUnknownErrorMessage } from './lib/errors.js';
import { printHeads } from './lib/file-operations/print-heads.js';
import { pkgInfo } from './pkg-info.js';

async function main(): Promise<number> {
  const config = parseArgs(process.argv);
  // Per-source failures are already reported on stderr; they do not change
  // the exit status.
  await printHeads(config);
  return 0;
}

function reportFatal(error: unknown): number {
  if (error instanceof CliExitError) {
    if (error.exitCode === 0) {
      console.log(error.message);
    } else {
      console.error(error.message);
    }
    return error.exitCode;
  }

  console.error(`${pkgInfo.name}: ${formatUnknownErrorMessage(error)}`);
  return 1;
}

main().then(
  (exitCode) => process.exit(exitCode),
  (error: unknown) => process.exit(reportFatal(error))
);
