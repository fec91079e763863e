import { describe, it, beforeEach, afterEach } from 'node:test';
import * as assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { Session } from '../session/session.js';
import { FileSaver } from '../handlers/file-saver.js';
import { PersistenceWorker } from '../persistence/worker.js';
import { DataTable } from '../table.js';
import { FunctionTracker } from '../trackers/process.js';
import { Settings } from '../settings.js';
import { UninitializedUseError } from '../errors.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'trialkit-files-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function read(...parts: string[]): string {
  return fs.readFileSync(path.join(tmpDir, ...parts), 'utf-8');
}

describe('FileSaver', () => {
  it('refuses to write before it is set up', () => {
    const saver = new FileSaver();
    assert.throws(
      () => saver.handleText('x', 'exp', 'P01', 1, 'notes', 'other'),
      UninitializedUseError,
    );
  });

  it('places each data type in its folder and returns relative paths', async () => {
    const worker = new PersistenceWorker();
    worker.begin();
    const saver = new FileSaver();
    saver.setUpForSession({ experiment: 'exp', ppid: 'P01', sessionNumber: 1, basePath: tmpDir, worker });

    const table = new DataTable(['a', 'b']);
    table.addValues([1, 'x,y']);

    assert.equal(saver.handleDataTable(table, 'exp', 'P01', 1, 'trial_results', 'trial_results'), 'trial_results.csv');
    assert.equal(
      saver.handleDataTable(table, 'exp', 'P01', 1, 'cursor_T001', 'trackers'),
      path.join('trackers', 'cursor_T001.csv'),
    );
    assert.equal(saver.handleJson({ k: [1] }, 'exp', 'P01', 1, 'settings', 'session_info'), 'settings.json');
    assert.equal(saver.handleText('hi', 'exp', 'P01', 1, 'notes_T001', 'other'), path.join('other', 'notes_T001.txt'));
    assert.equal(
      saver.handleBytes(new Uint8Array([1, 2, 3]), 'exp', 'P01', 1, 'raw', 'other'),
      path.join('other', 'raw.bin'),
    );

    await worker.drain();

    assert.equal(read('exp', 'P01', 'S001', 'trial_results.csv'), 'a,b\n1,x_y\n');
    assert.equal(read('exp', 'P01', 'S001', 'trackers', 'cursor_T001.csv'), 'a,b\n1,x_y\n');
    assert.equal(read('exp', 'P01', 'S001', 'settings.json'), '{\n  "k": [\n    1\n  ]\n}');
    assert.equal(read('exp', 'P01', 'S001', 'other', 'notes_T001.txt'), 'hi');
    assert.deepEqual(
      [...fs.readFileSync(path.join(tmpDir, 'exp', 'P01', 'S001', 'other', 'raw.bin'))],
      [1, 2, 3],
    );
  });

  it('returns absolute paths when asked to', () => {
    const worker = new PersistenceWorker();
    worker.begin();
    const saver = new FileSaver({ storeAbsolutePaths: true });
    saver.setUpForSession({ experiment: 'exp', ppid: 'P01', sessionNumber: 3, basePath: tmpDir, worker });
    assert.equal(
      saver.handleText('hi', 'exp', 'P01', 3, 'notes', 'other'),
      path.join(tmpDir, 'exp', 'P01', 'S003', 'other', 'notes.txt'),
    );
    return worker.drain();
  });

  it('writes under storagePath instead of the session base path', async () => {
    const worker = new PersistenceWorker();
    worker.begin();
    const elsewhere = path.join(tmpDir, 'elsewhere');
    const saver = new FileSaver({ storagePath: elsewhere });
    saver.setUpForSession({ experiment: 'exp', ppid: 'P01', sessionNumber: 1, basePath: tmpDir, worker });
    saver.handleText('hi', 'exp', 'P01', 1, 'notes', 'session_info');
    await worker.drain();
    assert.equal(read('elsewhere', 'exp', 'P01', 'S001', 'notes.txt'), 'hi');
  });
});

describe('FileSaver in a session', () => {
  it('writes the full session layout by the time end() resolves', async () => {
    let now = 0;
    let x = 0;
    const cursor = new FunctionTracker('Cursor', 'position', ['x'], () => [x]);
    const session = new Session({
      clock: () => now,
      customHeaders: ['response'],
      trackedObjects: [cursor],
      dataHandlers: [new FileSaver()],
    });
    session.createBlock(1);
    session.begin('exp', 'P01', tmpDir, 1, { age: 30 }, new Settings({ word: 'cat' }));

    now = 1;
    const trial = session.beginNextTrial();
    x = 4;
    cursor.recordRow(1.5);
    trial.result?.set('response', 'yes');
    now = 2;
    trial.end();
    await session.end();

    assert.equal(read('exp', 'P01', 'S001', 'settings.json'), '{\n  "word": "cat"\n}');
    assert.equal(read('exp', 'P01', 'S001', 'participant_details.csv'), 'age\n30\n');
    assert.equal(read('exp', 'P01', 'S001', 'trackers', 'cursor_position_T001.csv'), 'time,x\n1.5,4\n');
    assert.equal(
      read('exp', 'P01', 'S001', 'trial_results.csv'),
      'directory,experiment,ppid,session_num,trial_num,block_num,trial_num_in_block,start_time,end_time,response,cursor_position_location_0\n'
      + 'exp/P01/S001,exp,P01,1,1,1,1,1,2,yes,trackers/cursor_position_T001.csv\n',
    );
  });

  it('warns but continues when the session folder already exists', async () => {
    fs.mkdirSync(path.join(tmpDir, 'exp', 'P01', 'S001'), { recursive: true });
    const session = new Session({ dataHandlers: [new FileSaver()] });
    session.begin('exp', 'P01', tmpDir);
    assert.equal(session.hasInitialised, true);
    await session.end();
    assert.equal(fs.existsSync(path.join(tmpDir, 'exp', 'P01', 'S001', 'trial_results.csv')), true);
  });
});
