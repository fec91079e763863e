import { describe, it } from 'node:test';
import * as assert from 'node:assert/strict';
import { validateProtocol, formatValidation } from '../validation.js';
import type { ValidationCheck } from '../validation.js';

function stroop(): Record<string, unknown> {
  return {
    experiment: 'stroop',
    settings: { stimulus_ms: 500 },
    settingsToLog: ['colour'],
    customHeaders: ['response', 'response_time'],
    blocks: [
      { trials: 2, settings: { colour: 'red' }, trialSettings: [{ word: 'RED' }, { word: 'BLUE' }] },
    ],
  };
}

function find(checks: ValidationCheck[], label: string): ValidationCheck | undefined {
  return checks.find(c => c.label === label);
}

describe('validateProtocol', () => {
  it('accepts a complete protocol', () => {
    const { checks, protocol } = validateProtocol(stroop());
    assert.equal(checks.every(c => c.status === 'pass'), true);
    assert.deepEqual(protocol, {
      experiment: 'stroop',
      settings: { stimulus_ms: 500 },
      settingsToLog: ['colour'],
      customHeaders: ['response', 'response_time'],
      blocks: [
        { trials: 2, settings: { colour: 'red' }, trialSettings: [{ word: 'RED' }, { word: 'BLUE' }] },
      ],
    });
  });

  it('fills optional fields with empty defaults', () => {
    const { protocol } = validateProtocol({ experiment: 'min', blocks: [{ trials: 1 }] });
    assert.deepEqual(protocol, {
      experiment: 'min',
      settings: {},
      settingsToLog: [],
      customHeaders: [],
      blocks: [{ trials: 1, settings: {}, trialSettings: [] }],
    });
  });

  it('rejects anything that is not an object', () => {
    const { checks, protocol } = validateProtocol([1, 2]);
    assert.equal(protocol, null);
    assert.deepEqual(checks, [{ label: 'Protocol', status: 'fail', detail: 'Must be a JSON object' }]);
  });

  it('fails without an experiment name', () => {
    const value = stroop();
    delete value.experiment;
    const { checks, protocol } = validateProtocol(value);
    assert.equal(protocol, null);
    assert.equal(find(checks, 'Experiment')?.status, 'fail');
  });

  it('fails when the experiment name holds a path separator', () => {
    const { checks } = validateProtocol({ ...stroop(), experiment: 'a/b' });
    assert.equal(find(checks, 'Experiment')?.detail, '"a/b" contains a path separator');
  });

  it('fails on a block with a bad trial count', () => {
    const { checks, protocol } = validateProtocol({ ...stroop(), blocks: [{ trials: 0 }] });
    assert.equal(protocol, null);
    assert.deepEqual(find(checks, 'Block 1'), {
      label: 'Block 1',
      status: 'fail',
      detail: '"trials" must be a positive integer',
    });
  });

  it('fails when a block has more trialSettings than trials', () => {
    const { checks } = validateProtocol({
      ...stroop(),
      blocks: [{ trials: 1, trialSettings: [{}, {}] }],
    });
    assert.equal(find(checks, 'Block 1')?.detail, '2 trialSettings entries for 1 trial(s)');
  });

  it('warns when a logged setting is not defined for every trial', () => {
    const { checks, protocol } = validateProtocol({
      ...stroop(),
      settingsToLog: ['word'],
      blocks: [{ trials: 2, trialSettings: [{ word: 'RED' }] }],
    });
    assert.notEqual(protocol, null);
    assert.deepEqual(find(checks, 'Settings to log'), {
      label: 'Settings to log',
      status: 'warn',
      detail: 'Not defined for every trial: word. Set them at runtime or those trials will fail to end',
    });
  });

  it('accepts a logged setting given to every trial', () => {
    const { checks } = validateProtocol({
      ...stroop(),
      settingsToLog: ['word'],
      blocks: [{ trials: 2, trialSettings: [{ word: 'RED' }, { word: 'BLUE' }] }],
    });
    assert.equal(find(checks, 'Settings to log')?.status, 'pass');
  });

  it('warns on an empty block list and no custom headers', () => {
    const { checks, protocol } = validateProtocol({ experiment: 'empty', blocks: [] });
    assert.notEqual(protocol, null);
    assert.equal(find(checks, 'Blocks')?.status, 'warn');
    assert.equal(find(checks, 'Custom headers')?.status, 'warn');
  });

  it('rejects header lists that are not strings', () => {
    const { checks, protocol } = validateProtocol({ ...stroop(), customHeaders: ['ok', 3] });
    assert.equal(protocol, null);
    assert.equal(find(checks, 'Custom headers')?.status, 'fail');
  });
});

describe('formatValidation', () => {
  it('prints one indented line per check', () => {
    const text = formatValidation([
      { label: 'Experiment', status: 'pass', detail: 'stroop' },
      { label: 'Blocks', status: 'warn', detail: 'No blocks' },
      { label: 'Block 1', status: 'fail', detail: 'bad' },
    ]);
    const plain = text.replace(/\x1b\[[0-9;]*m/g, '');
    assert.deepEqual(plain.split('\n'), [
      '  ✓ Experiment: stroop',
      '  ⚠ Blocks: No blocks',
      '  ✗ Block 1: bad',
    ]);
  });
});
