import * as fs from 'node:fs';
import { validateProtocol } from '@trialkit/shared';
import type { Protocol } from '@trialkit/shared';
import type { Session } from './session/session.js';
import type { Block } from './session/block.js';
import { Settings } from './settings.js';
import { ProtocolError } from './errors.js';

/**
 * Parse and validate a protocol document. Warnings are returned alongside;
 * any failed check throws.
 */
export function parseProtocol(text: string, source = 'protocol'): { protocol: Protocol; warnings: string[] } {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new ProtocolError(`${source} is not valid JSON: ${msg}`);
  }

  const { checks, protocol } = validateProtocol(raw);
  const failures = checks.filter(c => c.status === 'fail');
  if (!protocol || failures.length > 0) {
    const detail = failures.map(c => `${c.label}: ${c.detail}`).join('; ');
    throw new ProtocolError(`${source} is invalid: ${detail}`);
  }
  const warnings = checks
    .filter(c => c.status === 'warn')
    .map(c => `${c.label}: ${c.detail}`);
  return { protocol, warnings };
}

export function loadProtocol(filePath: string): { protocol: Protocol; warnings: string[] } {
  if (!fs.existsSync(filePath)) {
    throw new ProtocolError(`Protocol file not found: ${filePath}`);
  }
  return parseProtocol(fs.readFileSync(filePath, 'utf-8'), filePath);
}

/** Session-level settings node for a protocol, passed to session.begin(). */
export function protocolSettings(protocol: Protocol): Settings {
  return new Settings(protocol.settings);
}

/**
 * Declare the protocol's headers on the session and build its blocks,
 * applying block and per-trial settings. Returns the created blocks.
 */
export function applyProtocol(session: Session, protocol: Protocol): Block[] {
  for (const key of protocol.settingsToLog) {
    if (!session.settingsToLog.includes(key)) session.settingsToLog.push(key);
  }
  for (const key of protocol.customHeaders) {
    if (!session.customHeaders.includes(key)) session.customHeaders.push(key);
  }

  return protocol.blocks.map(entry => {
    const block = session.createBlock(entry.trials);
    block.settings.update(entry.settings);
    entry.trialSettings.forEach((dict, i) => {
      block.trials[i].settings.update(dict);
    });
    return block;
  });
}
