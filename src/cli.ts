#!/usr/bin/env node
// =============================================================================
// Formula Engine CLI — Entry Point
// =============================================================================

import { runCli } from './cli/run';
import { logger } from './utils/logger';

async function main() {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((err: Error) => {
  logger.error(`Fatal error: ${err.message}`, { stack: err.stack });
  process.exit(1);
});
