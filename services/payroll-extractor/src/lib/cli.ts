/**
 * Payroll Extractor Command Line
 *
 * Argument handling and output for the `payroll-extract` command. Returns the
 * exit code instead of setting it so the whole run can be driven in process.
 */

import { parseArgs } from 'node:util';
import { ulid } from 'ulid';
import {
  config,
  enableDefaultMetrics,
  getMetrics,
  toErrorEnvelope,
  MappingStore,
  UsageError,
  type Logger,
} from '@payroll-extract/shared';
import { processPayrollDocument } from './pipeline';
import type { TextExtractor } from './pdf';

export const USAGE = [
  'Usage: payroll-extract <file.pdf> [--template <name>] [--document-id <id>] [--metrics]',
  '       payroll-extract --list-templates',
].join('\n');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliDependencies {
  logger: Logger;
  /** Receives the result JSON */
  stdout: (text: string) => void;
  /** Receives usage text, error envelopes and metrics */
  stderr: (text: string) => void;
  store?: MappingStore;
  extractText?: TextExtractor;
}

function parseCommandLine(args: string[]) {
  try {
    return parseArgs({
      args,
      allowPositionals: true,
      options: {
        template: { type: 'string', short: 't', default: config.defaultTemplate },
        'document-id': { type: 'string' },
        metrics: { type: 'boolean', default: config.metricsEnabled },
        'list-templates': { type: 'boolean', default: false },
      },
    });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

async function execute(args: string[], deps: CliDependencies, correlationId: string): Promise<void> {
  const { values, positionals } = parseCommandLine(args);

  const store = deps.store ?? new MappingStore({ logger: deps.logger });
  store.ensureDefaults();

  if (values['list-templates']) {
    const templates = store.listTemplates().map((name) => ({
      name,
      fields: store.describeTemplate(name),
    }));
    deps.stdout(`${JSON.stringify({ templates }, null, 2)}\n`);
    return;
  }

  const [filePath] = positionals;
  if (!filePath) {
    throw new UsageError('Missing <file.pdf> argument');
  }

  if (values.metrics) {
    enableDefaultMetrics();
  }

  const output = await processPayrollDocument(
    {
      filePath,
      templateName: values.template ?? config.defaultTemplate,
      documentId: values['document-id'],
      correlationId,
    },
    { logger: deps.logger, store, extractText: deps.extractText }
  );

  deps.stdout(`${JSON.stringify(output, null, 2)}\n`);

  if (values.metrics) {
    deps.stderr(await getMetrics());
  }
}

/**
 * Run one command line. Usage mistakes print the usage text and exit 2; any
 * other failure prints an error envelope and exits 1.
 */
export async function runCli(args: string[], deps: CliDependencies): Promise<number> {
  const correlationId = ulid();

  try {
    await execute(args, deps, correlationId);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      deps.stderr(`${error.message}\n${USAGE}\n`);
      return EXIT_USAGE;
    }

    deps.logger.error('Payroll extraction failed', error, { correlation_id: correlationId });
    deps.stderr(`${JSON.stringify(toErrorEnvelope(error, correlationId))}\n`);
    return EXIT_FAILURE;
  }
}
