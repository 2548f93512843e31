/**
 * Resolved step record - the single input the renderer consumes.
 *
 * A step is one node of the pipeline graph. Its ports are declared in a fixed
 * order, and the edges linking those ports to neighbouring steps have already
 * been computed by the graph builder:
 *
 * ```
 *   producer step ──(f)──►  [ inputs ]
 *                           [  name  ]
 *                           [ outputs ] ──(f)──► consumer step
 * ```
 *
 * @example
 * ```typescript
 * const step: TStepRecord = {
 *   name: '4-synthesis',
 *   inputs: ['adk', 'design.v'],
 *   outputs: ['design.v'],
 *   edgesIn: { adk: [{ step: '1-freepdk-45nm', f: 'adk' }] },
 *   edgesOut: { 'design.v': [{ step: '6-place', f: 'design.v' }] },
 *   source: 'steps/synthesis',
 * };
 * ```
 */
export type TStepRecord = {
  /** Step identifier, usually prefixed with its build order (`"4-synthesis"`) */
  name: string;
  /** Input port names in declared order */
  inputs: readonly string[];
  /** Output port names in declared order */
  outputs: readonly string[];
  /** Producers feeding each input port */
  edgesIn: TEdgeMap;
  /** Consumers of each output port */
  edgesOut: TEdgeMap;
  /** Path of the step's configuration directory */
  source: string;
  /** Parameter values in document order; absent when the record carries no `parameters` key */
  parameters?: ReadonlyMap<string, TParameterValue>;
  /** Absent when the record carries no `sandbox` key */
  sandbox?: boolean;
};

/**
 * Reference to a port on a neighbouring step.
 */
export type TEdgeRef = {
  /** Remote step identifier */
  step: string;
  /** Remote port name */
  f: string;
};

/**
 * Port name → ordered edge references. A port missing from the map has no edges.
 */
export type TEdgeMap = Readonly<Record<string, readonly TEdgeRef[]>>;

export type TParameterScalar = string | number | boolean | null;

export type TParameterValue = TParameterScalar | readonly TParameterScalar[];
