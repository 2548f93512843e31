export type {
  TStepRecord,
  TEdgeRef,
  TEdgeMap,
  TParameterScalar,
  TParameterValue,
} from './types.js';
export { parseStepId, compareStepIds, sortByStepOrder } from './step-id.js';
export type { StepId } from './step-id.js';
