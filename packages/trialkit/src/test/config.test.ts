import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import {
  loadConfig,
  resetConfigCache,
  sessionOptionsFromConfig,
  getFlagValue,
  getIntFlag,
  positionalArgs,
} from '../config.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialkit-config-test-'));
  resetConfigCache();
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
  resetConfigCache();
});

function writeConfig(value: unknown): void {
  fs.mkdirSync(path.join(tmpDir, '.trialkit'), { recursive: true });
  fs.writeFileSync(path.join(tmpDir, '.trialkit', 'config.json'), JSON.stringify(value));
}

describe('loadConfig', () => {
  it('returns defaults when config file is missing', () => {
    const config = loadConfig(tmpDir);
    assert.equal(config.session.ad_hoc_header_add, false);
    assert.equal(config.session.end_after_last_trial, false);
    assert.equal(config.session.copy_session_settings, true);
    assert.equal(config.output.base_path, 'data');
    assert.equal(config.tracking.sample_interval_ms, 20);
    assert.deepEqual(config.tracking.trackers, []);
  });

  it('loads and merges with defaults', () => {
    writeConfig({
      session: { ad_hoc_header_add: true },
      tracking: { trackers: ['process'] },
    });
    const config = loadConfig(tmpDir);
    assert.equal(config.session.ad_hoc_header_add, true); // overridden
    assert.equal(config.session.copy_participant_details, true); // default preserved
    assert.deepEqual(config.tracking.trackers, ['process']);
    assert.equal(config.tracking.sample_interval_ms, 20);
  });

  it('ignores sections that are not objects', () => {
    writeConfig({ output: 'somewhere' });
    assert.equal(loadConfig(tmpDir).output.base_path, 'data');
  });

  it('caches per project root', () => {
    writeConfig({ output: { base_path: 'v1' } });
    const config1 = loadConfig(tmpDir);
    assert.equal(config1.output.base_path, 'v1');

    writeConfig({ output: { base_path: 'v2' } });
    assert.equal(loadConfig(tmpDir).output.base_path, 'v1'); // cached

    resetConfigCache();
    assert.equal(loadConfig(tmpDir).output.base_path, 'v2');
  });

  it('defaults are not shared between loads', () => {
    const first = loadConfig(tmpDir);
    first.tracking.trackers.push('process');
    resetConfigCache();
    assert.deepEqual(loadConfig(tmpDir).tracking.trackers, []);
  });
});

describe('sessionOptionsFromConfig', () => {
  it('maps the session section onto session options', () => {
    writeConfig({ session: { end_after_last_trial: true, copy_session_settings: false } });
    assert.deepEqual(sessionOptionsFromConfig(loadConfig(tmpDir)), {
      adHocHeaderAdd: false,
      endAfterLastTrial: true,
      copySessionSettings: false,
      copyParticipantDetails: true,
    });
  });
});

describe('getFlagValue', () => {
  it('returns value after flag', () => {
    assert.equal(getFlagValue(['--ppid', 'P01', '--json'], '--ppid'), 'P01');
  });

  it('returns undefined when flag is missing', () => {
    assert.equal(getFlagValue(['--json'], '--ppid'), undefined);
  });

  it('returns undefined when flag is last arg (no value)', () => {
    assert.equal(getFlagValue(['--json', '--ppid'], '--ppid'), undefined);
  });
});

describe('getIntFlag', () => {
  it('parses positive integers and falls back when absent', () => {
    assert.equal(getIntFlag(['--session', '3'], '--session', 1), 3);
    assert.equal(getIntFlag([], '--session', 1), 1);
  });

  it('rejects anything else', () => {
    assert.throws(() => getIntFlag(['--session', '0'], '--session', 1), /--session must be a positive integer, got "0"/);
    assert.throws(() => getIntFlag(['--session', 'two'], '--session', 1), Error);
  });
});

describe('positionalArgs', () => {
  it('skips flags and their values', () => {
    assert.deepEqual(
      positionalArgs(['proto.json', '--ppid', 'P01', '--force', 'extra'], ['--ppid']),
      ['proto.json', 'extra'],
    );
  });
});
