/**
 * Step configuration loader
 *
 * Reads a resolved step configuration (YAML, or JSON as a YAML subset),
 * validates it and fills in the defaults for every optional key.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as YAML from 'js-yaml';
import type { ZodError } from 'zod';
import type { TStepRecord } from '../step/types.js';
import { ConfigParseError, MissingFieldError } from '../errors.js';
import { getErrorMessage } from '../utils/error-utils.js';
import { isMapping, stepConfigSchema } from './schema.js';
import { readVerbatimParameters } from './verbatim.js';

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate an already-loaded document and map it onto a step record.
 *
 * Absent `inputs`/`outputs`/`edges_i`/`edges_o` become empty; absent (or null)
 * `parameters` and `sandbox` stay off the record so their listing sections
 * are skipped. A missing `source` is fatal. Parameters keep object order
 * and loaded scalar types here; `parseStepConfig` replaces them with the
 * source text in document order.
 */
export function toStepRecord(document: unknown, filePath?: string): TStepRecord {
  if (!isMapping(document)) {
    throw new ConfigParseError('Expected a mapping at the top level', filePath);
  }
  if (document.source === undefined || document.source === null) {
    throw new MissingFieldError('source', filePath);
  }

  const result = stepConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigParseError(formatIssues(result.error), filePath);
  }

  const config = result.data;
  const record: TStepRecord = {
    name: config.name,
    inputs: config.inputs ?? [],
    outputs: config.outputs ?? [],
    edgesIn: config.edges_i ?? {},
    edgesOut: config.edges_o ?? {},
    source: config.source,
  };
  if (config.parameters) record.parameters = new Map(Object.entries(config.parameters));
  if (typeof config.sandbox === 'boolean') record.sandbox = config.sandbox;

  return record;
}

/**
 * Parse configuration text into a step record.
 *
 * Parameter values are kept as written (`1.0`, `True`) and in the order the
 * text lists them.
 */
export function parseStepConfig(content: string, filePath?: string): TStepRecord {
  let document: unknown;
  try {
    document = YAML.load(content, { filename: filePath });
  } catch (error) {
    throw new ConfigParseError(`Invalid YAML: ${getErrorMessage(error)}`, filePath, { cause: error });
  }

  const record = toStepRecord(document, filePath);
  if (record.parameters) {
    try {
      record.parameters = readVerbatimParameters(content, filePath) ?? record.parameters;
    } catch (error) {
      throw new ConfigParseError(`Cannot read parameters: ${getErrorMessage(error)}`, filePath, {
        cause: error,
      });
    }
  }
  return record;
}

/**
 * Read and parse a step configuration file.
 */
export function loadStepConfig(filePath: string): TStepRecord {
  const absolutePath = path.resolve(filePath);

  if (!fs.existsSync(absolutePath)) {
    throw new ConfigParseError('File not found', absolutePath);
  }

  let content: string;
  try {
    content = fs.readFileSync(absolutePath, 'utf8');
  } catch (error) {
    throw new ConfigParseError(`Cannot read file: ${getErrorMessage(error)}`, absolutePath, {
      cause: error,
    });
  }

  return parseStepConfig(content, absolutePath);
}
