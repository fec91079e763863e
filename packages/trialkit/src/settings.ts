import type { SettingValue, SettingsDict } from './types.js';
import { KeyNotFoundError, SettingTypeError } from './errors.js';

/**
 * Anything that owns a settings node (session, block, trial). The chain is
 * followed through this handle on every lookup, so replacing the owner's
 * settings (a new session begin) is seen by its children straight away.
 */
export interface SettingsParent {
  readonly settings: Settings;
}

/**
 * Key/value configuration with a single-parent override chain.
 * Trial settings shadow block settings shadow session settings.
 */
export class Settings {
  readonly baseDict: SettingsDict;
  private readonly parent: SettingsParent | null;

  constructor(baseDict: SettingsDict = {}, parent: SettingsParent | null = null) {
    this.baseDict = { ...baseDict };
    this.parent = parent;
  }

  static empty(parent: SettingsParent | null = null): Settings {
    return new Settings({}, parent);
  }

  /** Parse a JSON object into a parentless node. */
  static fromJson(text: string): Settings {
    return new Settings(parseSettingsJson(text));
  }

  get keys(): string[] {
    return Object.keys(this.baseDict);
  }

  /**
   * Resolve a key through this node and then its ancestors. Never cached.
   */
  getValue(key: string): SettingValue {
    if (Object.hasOwn(this.baseDict, key)) return this.baseDict[key];
    if (this.parent) return this.parent.settings.getValue(key);
    throw new KeyNotFoundError(key);
  }

  /** Like getValue, but returns the fallback instead of throwing. */
  getValueOr(key: string, fallback: SettingValue): SettingValue {
    return this.has(key) ? this.getValue(key) : fallback;
  }

  has(key: string): boolean {
    if (Object.hasOwn(this.baseDict, key)) return true;
    return this.parent ? this.parent.settings.has(key) : false;
  }

  /** Writes to this node only; ancestors are never touched. */
  setValue(key: string, value: SettingValue): void {
    this.baseDict[key] = value;
  }

  /** Apply every key of `dict` to this node. */
  update(dict: SettingsDict): void {
    for (const [key, value] of Object.entries(dict)) {
      this.setValue(key, value);
    }
  }

  getNumber(key: string): number {
    const value = this.getValue(key);
    if (typeof value !== 'number') throw new SettingTypeError(key, 'a number', value);
    return value;
  }

  getInt(key: string): number {
    const value = this.getValue(key);
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new SettingTypeError(key, 'an integer', value);
    }
    return value;
  }

  getString(key: string): string {
    const value = this.getValue(key);
    if (typeof value !== 'string') throw new SettingTypeError(key, 'a string', value);
    return value;
  }

  getBoolean(key: string): boolean {
    const value = this.getValue(key);
    if (typeof value !== 'boolean') throw new SettingTypeError(key, 'a boolean', value);
    return value;
  }

  getList(key: string): SettingValue[] {
    const value = this.getValue(key);
    if (!Array.isArray(value)) throw new SettingTypeError(key, 'an array', value);
    return value;
  }

  getDict(key: string): SettingsDict {
    const value = this.getValue(key);
    if (!isSettingsDict(value)) throw new SettingTypeError(key, 'an object', value);
    return value;
  }
}

export function isSettingsDict(value: unknown): value is SettingsDict {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isSettingValue(value: unknown): value is SettingValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isSettingValue);
      return Object.values(value).every(isSettingValue);
    default:
      return false;
  }
}

/** Parse JSON text that must hold a string-keyed object of setting values. */
export function parseSettingsJson(text: string): SettingsDict {
  const parsed: unknown = JSON.parse(text);
  if (!isSettingsDict(parsed) || !isSettingValue(parsed)) {
    throw new TypeError('Settings JSON must be an object of plain values');
  }
  return parsed;
}
