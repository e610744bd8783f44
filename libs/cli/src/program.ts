import { Command } from 'commander';
import { createExportCommand, createReportCommand, createStartCommand } from './commands/index.js';

export const VERSION = '0.1.0';

/**
 * Create and configure the main CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('portcullis')
    .description('Forward HTTP/HTTPS proxy with domain blocking and per-client rate limiting')
    .version(VERSION, '-V, --version', 'Output the version number')
    .addHelpText(
      'after',
      `
Examples:
  $ portcullis start                     Listen on 0.0.0.0:8080
  $ portcullis start 3128 --log --db     Log traffic to Logs/ and the SQLite database
  $ portcullis start --blocklist blocked.txt --rate-limit 50
  $ portcullis report                    Print database analytics
  $ portcullis report -d example.com     List stored requests to one host
  $ portcullis export -o traffic.csv     Export stored requests as CSV
`
    );

  // Register commands
  program.addCommand(createStartCommand());
  program.addCommand(createReportCommand());
  program.addCommand(createExportCommand());

  return program;
}
