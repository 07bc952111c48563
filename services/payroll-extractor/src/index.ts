#!/usr/bin/env node
/**
 * Payroll Extractor CLI
 *
 * Usage: payroll-extract <file.pdf> [--template <name>] [--document-id <id>] [--metrics]
 *        payroll-extract --list-templates
 *
 * Prints the job info and the mapped rows as JSON on stdout. Log lines go to
 * stderr. Errors end with an error envelope on stderr and exit code 1; usage
 * mistakes print the usage text and exit 2.
 */

import { createLogger } from '@payroll-extract/shared';
import { runCli } from './lib/cli';

const writeStderr = (text: string) => {
  process.stderr.write(text);
};

runCli(process.argv.slice(2), {
  logger: createLogger((line) => writeStderr(`${line}\n`)),
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: writeStderr,
})
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    writeStderr(`${error instanceof Error ? error.stack ?? error.message : String(error)}\n`);
    process.exitCode = 1;
  });
