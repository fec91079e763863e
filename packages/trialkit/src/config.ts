import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_CONFIG } from '@trialkit/shared';
import type { TrialkitConfig } from './types.js';
import type { SessionOptions } from './session/session.js';
import { PROJECT_DIR } from './db/connection.js';

const DEFAULTS: TrialkitConfig = DEFAULT_CONFIG;

let _cachedConfig: TrialkitConfig | null = null;
let _cachedRoot: string | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section<T extends object>(defaults: T, loaded: unknown): T {
  return structuredClone(isRecord(loaded) ? { ...defaults, ...loaded } : defaults);
}

/**
 * Load .trialkit/config.json with full defaults. Cached per project root.
 */
export function loadConfig(projectRoot: string): TrialkitConfig {
  if (_cachedConfig && _cachedRoot === projectRoot) return _cachedConfig;
  const configPath = path.join(projectRoot, PROJECT_DIR, 'config.json');
  if (!fs.existsSync(configPath)) {
    _cachedConfig = structuredClone(DEFAULTS);
    _cachedRoot = projectRoot;
    return _cachedConfig;
  }
  const loaded: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  const raw: Record<string, unknown> = isRecord(loaded) ? loaded : {};
  _cachedConfig = {
    session: section(DEFAULTS.session, raw.session),
    output: section(DEFAULTS.output, raw.output),
    tracking: section(DEFAULTS.tracking, raw.tracking),
  };
  _cachedRoot = projectRoot;
  return _cachedConfig;
}

/** Clear cached config (for testing). */
export function resetConfigCache(): void {
  _cachedConfig = null;
  _cachedRoot = null;
}

/** Session flags from config. Headers, trackers and handlers come from the caller. */
export function sessionOptionsFromConfig(config: TrialkitConfig): SessionOptions {
  return {
    adHocHeaderAdd: config.session.ad_hoc_header_add,
    endAfterLastTrial: config.session.end_after_last_trial,
    copySessionSettings: config.session.copy_session_settings,
    copyParticipantDetails: config.session.copy_participant_details,
  };
}

/** Extract a flag's value from args array with bounds checking. */
export function getFlagValue(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx < 0 || idx + 1 >= args.length) return undefined;
  return args[idx + 1];
}

/** Positional args, skipping flags and the values that follow them. */
export function positionalArgs(args: string[], flagsWithValues: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (flagsWithValues.includes(args[i])) {
      i++;
      continue;
    }
    if (args[i].startsWith('--')) continue;
    out.push(args[i]);
  }
  return out;
}

/** Parse an integer flag, falling back when absent. */
export function getIntFlag(args: string[], flag: string, fallback: number): number {
  const raw = getFlagValue(args, flag);
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new Error(`${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}
