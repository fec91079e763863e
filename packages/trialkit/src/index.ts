export { Session, BASE_HEADERS } from './session/session.js';
export type { SessionOptions } from './session/session.js';
export { Block } from './session/block.js';
export { Trial } from './session/trial.js';
export { sessionNumToName, sessionPaths, sessionExists } from './session/paths.js';
export type { SessionPaths } from './session/paths.js';

export { Settings, isSettingsDict, isSettingValue, parseSettingsJson } from './settings.js';
export type { SettingsParent } from './settings.js';
export { ResultsDictionary, buildResultsTable } from './results.js';
export type { HasResult } from './results.js';
export { DataTable, formatValue, csvField } from './table.js';
export type { DataRow } from './table.js';

export { Tracker } from './trackers/tracker.js';
export { ProcessTracker, FunctionTracker } from './trackers/process.js';

export { PersistenceWorker } from './persistence/worker.js';
export type { WriteJob } from './persistence/worker.js';
export { FileSaver } from './handlers/file-saver.js';
export type { FileSaverOptions } from './handlers/file-saver.js';
export { MemoryHandler } from './handlers/memory.js';
export type { StoredItem, StoredPayload } from './handlers/memory.js';
export type { DataHandler, HandlerContext } from './handlers/types.js';

export { EventList } from './events.js';
export type { Listener } from './events.js';
export { TrialStatus, SessionPhase, TRIAL_TRANSITIONS, SESSION_TRANSITIONS } from './state/types.js';
export { transition, validNext, isTerminal, sessionTransition } from './state/machine.js';

export {
  TrialkitError,
  InvalidTransitionError,
  NoSuchTrialError,
  NoSuchBlockError,
  SchemaViolationError,
  PathNotFoundError,
  UninitializedUseError,
  KeyNotFoundError,
  SettingTypeError,
  PersistenceError,
  ProtocolError,
} from './errors.js';
export type { ErrorCode } from './errors.js';

export { DATA_TYPES } from './types.js';
export type {
  SettingValue,
  SettingsDict,
  JsonSerializable,
  ResultValue,
  DataType,
  TrialkitConfig,
  SessionRecord,
} from './types.js';

export { loadConfig, resetConfigCache, sessionOptionsFromConfig } from './config.js';
export { parseProtocol, loadProtocol, protocolSettings, applyProtocol } from './protocol.js';
export { attachLedger } from './ledger.js';
export { openDbAt, openTestDb, findProjectRoot } from './db/connection.js';
