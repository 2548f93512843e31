import { Command } from 'commander';
import { infoCommand } from './commands/info.js';
import type { InfoCommandOptions } from './commands/info.js';
import { logger } from './utils/logger.js';
import { getErrorMessage } from '../utils/error-utils.js';

export const VERSION = '0.1.0';

export const HELP_BANNER = `
Draws a resolved pipeline step as a box of its input and output ports, with
connector lines naming the steps each port is fed by and feeds into, then
lists its parameters, flags and source directory.

  producers        ->   | inputs  |
                        |  step   |
                        | outputs |   ->   consumers

Consumers of one output are listed in ascending build order (the numeric
prefix of the step name, as in "5-synthesis").
`;

/**
 * Build the CLI program. Usage errors and failures exit with status 1.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('stepview')
    .description('Render a pipeline step as an ASCII port diagram with its parameter listing')
    .version(VERSION, '-V, --version', 'Output the current version')
    .requiredOption('-y, --yaml <path>', 'Resolved step configuration (YAML or JSON)')
    .option('-s, --simple', 'Draw generic port arrows instead of labelled connectors', false)
    .option('-v, --verbose', 'Print debug diagnostics to stderr', false)
    .helpOption('-h, --help', 'Show this help')
    .addHelpText('before', HELP_BANNER)
    .showHelpAfterError('(run with --help for usage)');

  program.configureOutput({
    writeErr: (str) => {
      const trimmed = str.replace(/^error:\s*/i, '').trimEnd();
      if (trimmed) {
        logger.error(trimmed);
      }
    },
    writeOut: (str) => process.stdout.write(str),
  });

  program.action((options: InfoCommandOptions) => {
    try {
      infoCommand(options);
    } catch (error) {
      logger.error(`Command failed: ${getErrorMessage(error)}`);
      process.exit(1);
    }
  });

  return program;
}
