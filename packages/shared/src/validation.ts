/**
 * Protocol file validation. Runs every check and reports what passed, what
 * looks suspicious and what cannot run. Only `fail` checks withhold the
 * parsed protocol.
 */

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

export interface ProtocolBlock {
  trials: number;
  settings: JsonObject;
  /** Per-trial settings, by position in the block. May be shorter than `trials`. */
  trialSettings: JsonObject[];
}

export interface Protocol {
  experiment: string;
  settings: JsonObject;
  settingsToLog: string[];
  customHeaders: string[];
  blocks: ProtocolBlock[];
}

export interface ValidationCheck {
  label: string;
  status: 'pass' | 'warn' | 'fail';
  detail: string;
}

export interface ProtocolValidation {
  checks: ValidationCheck[];
  /** Null when any check failed. */
  protocol: Protocol | null;
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      return Array.isArray(value)
        ? value.every(isJsonValue)
        : Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && isJsonValue(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(v => typeof v === 'string');
}

/**
 * Validate a parsed protocol document.
 */
export function validateProtocol(value: unknown): ProtocolValidation {
  const checks: ValidationCheck[] = [];

  if (!isJsonObject(value)) {
    checks.push({ label: 'Protocol', status: 'fail', detail: 'Must be a JSON object' });
    return { checks, protocol: null };
  }

  // Experiment name becomes a folder name
  const experiment = value.experiment;
  if (typeof experiment !== 'string' || experiment.trim() === '') {
    checks.push({ label: 'Experiment', status: 'fail', detail: 'Missing "experiment" name' });
  } else if (/[\\/]/.test(experiment)) {
    checks.push({ label: 'Experiment', status: 'fail', detail: `"${experiment}" contains a path separator` });
  } else {
    checks.push({ label: 'Experiment', status: 'pass', detail: experiment });
  }

  // Session settings
  const settings = value.settings ?? {};
  if (!isJsonObject(settings)) {
    checks.push({ label: 'Settings', status: 'fail', detail: '"settings" must be an object' });
  } else {
    checks.push({ label: 'Settings', status: 'pass', detail: `${Object.keys(settings).length} session setting(s)` });
  }

  // Header lists
  const settingsToLog = value.settingsToLog ?? [];
  const customHeaders = value.customHeaders ?? [];
  if (!isStringArray(settingsToLog)) {
    checks.push({ label: 'Settings to log', status: 'fail', detail: '"settingsToLog" must be an array of strings' });
  }
  if (!isStringArray(customHeaders)) {
    checks.push({ label: 'Custom headers', status: 'fail', detail: '"customHeaders" must be an array of strings' });
  } else if (customHeaders.length === 0) {
    checks.push({ label: 'Custom headers', status: 'warn', detail: 'None declared. Results can only be added with ad-hoc headers enabled' });
  } else {
    checks.push({ label: 'Custom headers', status: 'pass', detail: customHeaders.join(', ') });
  }

  // Blocks
  const blocks: ProtocolBlock[] = [];
  const rawBlocks = value.blocks;
  if (!Array.isArray(rawBlocks)) {
    checks.push({ label: 'Blocks', status: 'fail', detail: '"blocks" must be an array' });
  } else if (rawBlocks.length === 0) {
    checks.push({ label: 'Blocks', status: 'warn', detail: 'No blocks. The session will have no trials' });
  } else {
    rawBlocks.forEach((raw, i) => {
      const label = `Block ${i + 1}`;
      if (!isJsonObject(raw)) {
        checks.push({ label, status: 'fail', detail: 'Must be an object' });
        return;
      }
      const trials = raw.trials;
      if (typeof trials !== 'number' || !Number.isInteger(trials) || trials < 1) {
        checks.push({ label, status: 'fail', detail: '"trials" must be a positive integer' });
        return;
      }
      const blockSettings = raw.settings ?? {};
      if (!isJsonObject(blockSettings)) {
        checks.push({ label, status: 'fail', detail: '"settings" must be an object' });
        return;
      }
      const trialSettings = raw.trialSettings ?? [];
      if (!Array.isArray(trialSettings) || !trialSettings.every(isJsonObject)) {
        checks.push({ label, status: 'fail', detail: '"trialSettings" must be an array of objects' });
        return;
      }
      if (trialSettings.length > trials) {
        checks.push({ label, status: 'fail', detail: `${trialSettings.length} trialSettings entries for ${trials} trial(s)` });
        return;
      }
      blocks.push({ trials, settings: blockSettings, trialSettings });
      checks.push({ label, status: 'pass', detail: `${trials} trial(s)` });
    });
  }

  // Logged settings that no level defines will fail at trial end
  if (isStringArray(settingsToLog) && isJsonObject(settings)) {
    const missing = settingsToLog.filter(key =>
      !(key in settings) && !blocks.every(b =>
        key in b.settings || (b.trialSettings.length === b.trials && b.trialSettings.every(t => key in t))
      )
    );
    if (missing.length > 0) {
      checks.push({
        label: 'Settings to log',
        status: 'warn',
        detail: `Not defined for every trial: ${missing.join(', ')}. Set them at runtime or those trials will fail to end`,
      });
    } else if (settingsToLog.length > 0) {
      checks.push({ label: 'Settings to log', status: 'pass', detail: settingsToLog.join(', ') });
    }
  }

  const failed = checks.some(c => c.status === 'fail');
  if (
    failed
    || typeof experiment !== 'string'
    || !isJsonObject(settings)
    || !isStringArray(settingsToLog)
    || !isStringArray(customHeaders)
  ) {
    return { checks, protocol: null };
  }

  return {
    checks,
    protocol: { experiment, settings, settingsToLog, customHeaders, blocks },
  };
}

// Local NO_COLOR gate: shared does not import from trialkit.
const _useColor = !process.env.NO_COLOR && (process.stderr?.isTTY !== false);

/**
 * Format validation results for terminal output.
 */
export function formatValidation(checks: ValidationCheck[]): string {
  const lines: string[] = [];
  for (const c of checks) {
    const icon = c.status === 'pass' ? (_useColor ? '\x1b[32m✓\x1b[0m' : '✓')
               : c.status === 'warn' ? (_useColor ? '\x1b[33m⚠\x1b[0m' : '⚠')
               : (_useColor ? '\x1b[31m✗\x1b[0m' : '✗');
    lines.push(`  ${icon} ${c.label}: ${c.detail}`);
  }
  return lines.join('\n');
}
