import { Command, CommanderError } from 'commander';

import { buildConfig } from './config/build-config.js';
import type { HeadConfig, HeaderPolicy } from './config/types.js';
import { isHeadError } from './lib/errors.js';
import { pkgInfo } from './pkg-info.js';

const { name: CLI_NAME, version: CLI_VERSION } = pkgInfo;

export class CliExitError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super(message);
    this.name = 'CliExitError';
    this.exitCode = exitCode;
  }
}

type CliOptions = {
  lines?: string;
  bytes?: string;
  quiet?: boolean;
  verbose?: boolean;
};

function collectStringValues(values: readonly unknown[]): string[] {
  const result: string[] = [];
  for (const value of values) {
    if (typeof value === 'string') {
      result.push(value);
    }
  }
  return result;
}

function getParsedFiles(cli: Command): string[] {
  const [files]: unknown[] = cli.processedArgs;
  if (!Array.isArray(files)) return [];
  return collectStringValues(files);
}

function createCliProgram(output: string[]): Command {
  const cli = new Command();
  cli
    .name(CLI_NAME)
    .usage('[options] [files...]')
    .description(
      'Print the first 10 lines of each file to standard output. With more than one file, precede each with a header giving the file name.'
    )
    .argument('[files...]', 'Files to read; "-" or no files reads standard input')
    .option('-n, --lines <count>', 'Print the first <count> lines (default 10)')
    .option('-c, --bytes <count>', 'Print the first <count> bytes')
    .option('-q, --quiet', 'Never print headers giving file names')
    .option('-v, --verbose', 'Always print headers giving file names')
    .helpOption('-h, --help', 'Display command help')
    .version(CLI_VERSION, '-V, --version', 'Display version')
    .addHelpText(
      'after',
      `
Examples:
  $ ${CLI_NAME} notes.txt
  $ ${CLI_NAME} -n 3 a.log b.log
  $ ${CLI_NAME} -c 512 image.bin
  $ cat notes.txt | ${CLI_NAME} -n 1 -
`
    );

  cli.allowUnknownOption(false);
  cli.showHelpAfterError('(run with --help for usage)');
  cli.showSuggestionAfterError(true);
  cli.exitOverride();
  cli.configureOutput({
    writeOut(text: string): void {
      output.push(text);
    },
    writeErr(text: string): void {
      output.push(text);
    },
    outputError(text: string, write: (str: string) => void): void {
      write(text);
    },
  });

  return cli;
}

function formatCliOutput(output: readonly string[], fallback: string): string {
  const joined = output.join('').trimEnd();
  if (joined.length > 0) return joined;
  return fallback.trimEnd();
}

function resolveHeaderPolicy(options: CliOptions): HeaderPolicy {
  if (options.quiet === true && options.verbose === true) {
    throw new CliExitError(
      "option '-q, --quiet' cannot be used with option '-v, --verbose'",
      1
    );
  }
  if (options.quiet === true) return 'never';
  if (options.verbose === true) return 'always';
  return 'auto';
}

/**
 * Parses `argv` (node-style, program path first) into a validated
 * configuration. Help, version and every usage or validation error surface as
 * a `CliExitError`; nothing here touches a source.
 */
export function parseArgs(argv: readonly string[] = process.argv): HeadConfig {
  const output: string[] = [];
  const cli = createCliProgram(output);
  try {
    cli.parse([...argv], { from: 'node' });
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      throw new CliExitError(
        formatCliOutput(output, error.message),
        error.exitCode
      );
    }
    throw error;
  }

  const options = cli.opts<CliOptions>();
  try {
    return buildConfig({
      files: getParsedFiles(cli),
      lines: options.lines,
      bytes: options.bytes,
      headers: resolveHeaderPolicy(options),
    });
  } catch (error: unknown) {
    if (isHeadError(error)) {
      throw new CliExitError(error.message, 1);
    }
    throw error;
  }
}
