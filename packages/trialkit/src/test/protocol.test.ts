import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { parseProtocol, loadProtocol, applyProtocol, protocolSettings } from '../protocol.js';
import { Session } from '../session/session.js';
import { MemoryHandler } from '../handlers/memory.js';
import { ProtocolError } from '../errors.js';

const STROOP = JSON.stringify({
  experiment: 'stroop',
  settings: { stimulus_ms: 500 },
  settingsToLog: ['colour', 'word'],
  customHeaders: ['response'],
  blocks: [
    { trials: 2, settings: { colour: 'red' }, trialSettings: [{ word: 'RED' }, { word: 'BLUE' }] },
    { trials: 1, settings: { colour: 'blue', word: 'GREEN' } },
  ],
});

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialkit-protocol-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('parseProtocol', () => {
  it('returns the protocol without warnings when every check passes', () => {
    const { protocol, warnings } = parseProtocol(STROOP);
    assert.equal(protocol.experiment, 'stroop');
    assert.equal(protocol.blocks.length, 2);
    assert.deepEqual(warnings, []);
  });

  it('throws ProtocolError on invalid JSON', () => {
    assert.throws(() => parseProtocol('{', 'broken.json'), (err: unknown) => {
      assert.ok(err instanceof ProtocolError);
      assert.ok(err.message.startsWith('broken.json is not valid JSON: '));
      return true;
    });
  });

  it('throws with every failed check in the message', () => {
    assert.throws(
      () => parseProtocol(JSON.stringify({ blocks: [{ trials: -1 }] }), 'p.json'),
      /p\.json is invalid: Experiment: Missing "experiment" name; Block 1: "trials" must be a positive integer/,
    );
  });

  it('passes warnings back', () => {
    const { warnings } = parseProtocol(JSON.stringify({ experiment: 'x', customHeaders: ['a'], blocks: [] }));
    assert.deepEqual(warnings, ['Blocks: No blocks. The session will have no trials']);
  });
});

describe('loadProtocol', () => {
  it('reads a protocol file', () => {
    const file = path.join(tmpDir, 'stroop.json');
    fs.writeFileSync(file, STROOP);
    assert.equal(loadProtocol(file).protocol.experiment, 'stroop');
  });

  it('throws ProtocolError for a missing file', () => {
    assert.throws(() => loadProtocol(path.join(tmpDir, 'nope.json')), ProtocolError);
  });
});

describe('applyProtocol', () => {
  it('builds the blocks and resolves settings through the chain', async () => {
    const memory = new MemoryHandler();
    const session = new Session({ dataHandlers: [memory], customHeaders: ['response'] });
    const { protocol } = parseProtocol(STROOP);

    const blocks = applyProtocol(session, protocol);
    assert.equal(blocks.length, 2);
    assert.deepEqual(session.customHeaders, ['response']);
    assert.deepEqual(session.settingsToLog, ['colour', 'word']);

    session.begin(protocol.experiment, 'P01', tmpDir, 1, {}, protocolSettings(protocol));
    const trials = session.trials;
    assert.deepEqual(trials.map(t => t.settings.getValue('word')), ['RED', 'BLUE', 'GREEN']);
    assert.deepEqual(trials.map(t => t.settings.getValue('colour')), ['red', 'red', 'blue']);
    assert.equal(trials[2].settings.getValue('stimulus_ms'), 500);

    let trial = session.beginNextTrialSafe();
    while (trial) {
      trial.result?.set('response', `r${trial.number}`);
      trial.end();
      trial = session.beginNextTrialSafe();
    }
    await session.end();

    const stored = memory.find('trial_results');
    if (!stored || stored.payload.kind !== 'table') throw new Error('no results table');
    const lines = stored.payload.lines;
    assert.equal(lines.length, 4);
    assert.ok(lines[0].endsWith(',colour,word,response'));
    assert.ok(lines[1].endsWith(',red,RED,r1'));
    assert.ok(lines[3].endsWith(',blue,GREEN,r3'));
  });
});
