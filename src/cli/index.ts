#!/usr/bin/env node
import { orchestrateScan } from '../core/index.js';
import { handleError, InvalidInputError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { createProgram, toScanOptions, USAGE_HINT } from './program.js';
import type { CliOptions } from './types.js';

async function scan(options: CliOptions): Promise<void> {
  const logger = getLogger({ verbose: options.verbose ?? false });
  const scanOptions = toScanOptions(options);

  if (logger.isVerbose()) {
    logger.debug('Parsed CLI arguments:');
    logger.debug(`  URL: ${scanOptions.url}`);
    logger.debug(`  Depth: ${scanOptions.depth}`);
    logger.debug(`  Output: ${scanOptions.output}`);
    logger.debug(`  Screenshots: ${scanOptions.screenshots}`);
    logger.debug(`  Browser: ${scanOptions.useFirefox ? 'firefox' : 'chromium'}`);
    logger.debug(`  Timeout: ${scanOptions.timeoutMs}ms`);
    logger.debug(`  Max links per page: ${scanOptions.maxLinksPerPage}`);
  }

  const summary = await orchestrateScan(scanOptions);
  logger.info(`Report written to ${summary.reportPath}`);
}

async function run(): Promise<void> {
  const program = createProgram(scan);

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    if (err instanceof InvalidInputError) {
      USAGE_HINT.forEach((line) => console.error(line));
    }
    handleError(err);
  }
  process.exit(0);
}

run().catch(handleError);
