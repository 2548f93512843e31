/**
 * Info command - prints a step's port diagram and its parameter listing.
 */

import { loadStepConfig } from '../../config/loader.js';
import { renderStepInfo } from '../../diagram/index.js';
import { logger } from '../utils/logger.js';

export interface InfoCommandOptions {
  /** Path of the resolved step configuration */
  yaml: string;
  simple?: boolean;
  verbose?: boolean;
}

export function infoCommand(options: InfoCommandOptions): void {
  logger.setVerbose(options.verbose ?? false);

  const step = loadStepConfig(options.yaml);
  logger.debug(
    `Loaded step "${step.name}": ${step.inputs.length} input(s), ${step.outputs.length} output(s)`
  );

  const text = renderStepInfo(step, { simple: options.simple ?? false });
  process.stdout.write(`${text}\n`);
}
