export type SettingValue =
  | string
  | number
  | boolean
  | null
  | SettingValue[]
  | { [key: string]: SettingValue };

export type SettingsDict = Record<string, SettingValue>;

/** Payload accepted by the JSON save path. */
export type JsonSerializable = SettingsDict | SettingValue[];

/** Anything a result column may hold. `undefined` serializes as an empty field. */
export type ResultValue = SettingValue | undefined;

/** Where a payload belongs; handlers use it to pick a folder or table. */
export type DataType = 'trial_results' | 'trackers' | 'session_info' | 'other';

export const DATA_TYPES: readonly DataType[] = ['trial_results', 'trackers', 'session_info', 'other'];

export type { TrialkitConfig } from '@trialkit/shared';

export interface SessionRecord {
  id: number;
  experiment: string;
  ppid: string;
  session_num: number;
  directory: string;
  trials_completed: number;
  started_at: string;
  ended_at: string | null;
}
