import { parseStepConfig } from '../../../src/config/loader.js';
import { renderListing } from '../../../src/diagram/listing.js';
import type { TParameterValue } from '../../../src/step/types.js';
import { createBareStep, createSynthesisStep, SYNTHESIS_LISTING } from '../../helpers/step-fixtures.js';

describe('renderListing', () => {
  it('prints parameters, flags and source', () => {
    expect(renderListing(createSynthesisStep())).toBe(SYNTHESIS_LISTING);
  });

  it('prints only the source line when parameters and flags are absent', () => {
    expect(renderListing(createBareStep())).toBe('Source: steps/lonely');
  });

  it('prints a parameters title with no entries for an empty map', () => {
    expect(renderListing(createBareStep({ parameters: new Map() }))).toBe(
      ['Parameters', '', '', 'Source: steps/lonely'].join('\n')
    );
  });

  it('prints a list header alone for an empty list', () => {
    const listing = renderListing(
      createBareStep({
        parameters: new Map<string, TParameterValue>([
          ['order', []],
          ['n', 1],
        ]),
      })
    );
    expect(listing.split('\n').slice(0, 4)).toEqual(['Parameters', '', '- order :', '-     n : 1']);
  });

  it('prints null and numeric scalars as text', () => {
    const listing = renderListing(
      createBareStep({
        parameters: new Map<string, TParameterValue>([
          ['a', null],
          ['bb', 0],
        ]),
      })
    );
    expect(listing.split('\n').slice(2, 4)).toEqual(['-  a : null', '- bb : 0']);
  });

  it('prints a true sandbox flag without parameters', () => {
    expect(renderListing(createBareStep({ sandbox: true }))).toBe(
      ['Flags', '', '- sandbox : true', '', 'Source: steps/lonely'].join('\n')
    );
  });

  it('prints loaded parameter values as the configuration wrote them', () => {
    const step = parseStepConfig(
      [
        'name: 4-synthesis',
        'source: steps/synthesis',
        'parameters:',
        '  clock_period: 1.0',
        '  gate_clock: True',
        '  seed: 12345678901234567890',
        '  mask: 0x1F',
        '  unset: ~',
        '  corners: [1.10, FALSE]',
      ].join('\n')
    );

    expect(renderListing(step).split('\n').slice(2, 10)).toEqual([
      '- clock_period : 1.0',
      '-   gate_clock : True',
      '-         seed : 12345678901234567890',
      '-         mask : 0x1F',
      '-        unset : null',
      '-      corners :',
      '    - 1.10',
      '    - FALSE',
    ]);
  });

  it('prints loaded parameters in the order the configuration lists them', () => {
    const step = parseStepConfig(
      ['name: a', 'source: s', 'parameters:', '  zeta: 1', '  10: 2', '  alpha: 3'].join('\n')
    );

    expect(renderListing(step).split('\n').slice(2, 5)).toEqual(['-  zeta : 1', '-    10 : 2', '- alpha : 3']);
  });
});
