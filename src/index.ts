/**
 * stepview - render a resolved pipeline step as an ASCII port diagram
 * followed by its parameter, flag and source listing.
 */

export * from './step/index.js';
export * from './diagram/index.js';
export { loadStepConfig, parseStepConfig, toStepRecord, stepConfigSchema } from './config/index.js';
export type { StepConfigDocument } from './config/index.js';
export { StepViewError, MissingFieldError, ConfigParseError } from './errors.js';
export type { StepViewErrorCode } from './errors.js';
export { DIAGRAM_CHARS, RECOGNIZED_FLAGS } from './constants.js';
export type { RecognizedFlag } from './constants.js';
export { getErrorMessage } from './utils/error-utils.js';
