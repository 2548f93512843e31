export { loadStepConfig, parseStepConfig, toStepRecord } from './loader.js';
export { stepConfigSchema } from './schema.js';
export type { StepConfigDocument } from './schema.js';
