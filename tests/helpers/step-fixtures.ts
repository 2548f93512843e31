import * as path from 'path';
import { fileURLToPath } from 'url';
import type { TParameterValue, TStepRecord } from '../../src/step/types.js';

export const STEP_FIXTURES_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '../fixtures/steps'
);

export function fixturePath(name: string): string {
  return path.join(STEP_FIXTURES_DIR, name);
}

/**
 * Step record matching tests/fixtures/steps/synthesis.yml
 */
export function createSynthesisStep(): TStepRecord {
  return {
    name: '4-synthesis',
    source: 'steps/synthesis',
    inputs: ['adk', 'design.v', 'constraints.tcl'],
    outputs: ['design.v', 'design.sdc'],
    edgesIn: {
      adk: [{ step: '1-freepdk-45nm', f: 'adk' }],
      'constraints.tcl': [{ step: '2-constraints', f: 'constraints.tcl' }],
    },
    edgesOut: {
      'design.v': [
        { step: '12-signoff', f: 'design.v' },
        { step: '6-place', f: 'design.v' },
      ],
      'design.sdc': [{ step: '6-place', f: 'design.sdc' }],
    },
    parameters: new Map<string, TParameterValue>([
      ['design_name', 'GcdUnit'],
      ['clock_period', '1.0'],
      ['gate_clock', 'True'],
      ['order', ['setup-session.tcl', 'compile.tcl']],
    ]),
    sandbox: false,
  };
}

export function createBareStep(overrides: Partial<TStepRecord> = {}): TStepRecord {
  return {
    name: '3-lonely',
    source: 'steps/lonely',
    inputs: ['a'],
    outputs: ['b'],
    edgesIn: {},
    edgesOut: {},
    ...overrides,
  };
}

export const SYNTHESIS_DIAGRAM = [
  '   +                                 1-freepdk-45nm',
  '   +                                 adk',
  '   |',
  '   |                      +          2-constraints',
  '   |                      +          constraints.tcl',
  '   |                      |',
  '   V                      V',
  '------------------------------------',
  '| adk | design.v | constraints.tcl |',
  '------------------------------------',
  '|                                  |',
  '|           4-synthesis            |',
  '|                                  |',
  '------------------------------------',
  '|   design.v   |   design.sdc      |',
  '------------------------------------',
  '       V                 |',
  '       +                 |           6-place',
  '       +                 |           design.v',
  '       +                 |',
  '       +                 |           12-signoff',
  '       +                 |           design.v',
  '                         V',
  '                         +           6-place',
  '                         +           design.sdc',
].join('\n');

export const SYNTHESIS_LISTING = [
  'Parameters',
  '',
  '-  design_name : GcdUnit',
  '- clock_period : 1.0',
  '-   gate_clock : True',
  '-        order :',
  '    - setup-session.tcl',
  '    - compile.tcl',
  '',
  'Flags',
  '',
  '- sandbox : false',
  '',
  'Source: steps/synthesis',
].join('\n');
