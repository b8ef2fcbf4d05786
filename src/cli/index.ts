#!/usr/bin/env node
// =============================================================================
// opendata-tap CLI: main entry point
// =============================================================================

import { parseArgs } from 'node:util';
import { OpenDataTap } from '../OpenDataTap.js';
import { loadTapConfig } from '../config/TapConfig.js';
import { JsonLinesWriter } from '../infrastructure/output/JsonLinesWriter.js';
import { createChildLogger } from '../infrastructure/logging/logger.js';

const VERSION = '0.1.0';

const HELP = `
opendata-tap: stream Czech open-data catalog datasets as Singer messages

Usage:
  opendata-tap --config <file>              Sync every configured dataset to stdout
  opendata-tap --config <file> --discover   Print the catalog of configured streams

Options:
  -c, --config    JSON config file: { "identifiers": ["<dataset IRI>", ...] }
  -d, --discover  Run discovery instead of sync
  -h, --help      Show this help
  -v, --version   Show version

Environment Variables:
  LOG_LEVEL       fatal, error, warn, info (default), debug, trace or silent. Logs go to stderr.
`;

const logger = createChildLogger({ component: 'cli' });

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      config: { type: 'string', short: 'c' },
      discover: { type: 'boolean', short: 'd' },
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
    },
  });

  if (values.help) {
    process.stdout.write(HELP);
    return;
  }
  if (values.version) {
    process.stdout.write(`${VERSION}\n`);
    return;
  }
  if (!values.config) {
    process.stderr.write('Missing required option --config\n' + HELP);
    process.exitCode = 2;
    return;
  }

  const config = await loadTapConfig(values.config);
  const tap = new OpenDataTap({ ...config, logger });

  if (values.discover) {
    const catalog = await tap.discover();
    process.stdout.write(`${JSON.stringify(catalog, null, 2)}\n`);
    return;
  }

  const summary = await tap.sync(new JsonLinesWriter(process.stdout));
  logger.info({ streams: summary.streams, elapsedMs: summary.elapsedMs }, 'Sync finished');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, error instanceof Error ? error.message : String(error));
  process.exitCode = 1;
});
