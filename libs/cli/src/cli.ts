#!/usr/bin/env node
/**
 * Portcullis CLI
 *
 * @example
 * ```bash
 * # Run the proxy on port 3128 with traffic logging
 * portcullis start 3128 --log
 *
 * # Analytics and CSV export from the traffic database
 * portcullis report
 * portcullis export --out traffic.csv
 * ```
 */

import { createProgram } from './program.js';

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    console.error('Error:', err instanceof Error ? err.message : String(err));
    process.exit(1);
  }
}

main().catch((err: unknown) => {
  console.error('Fatal error:', err);
  process.exit(1);
});
