import * as fs from 'node:fs';
import * as path from 'node:path';
import { configTemplate, mkdirSafe } from '@trialkit/shared';
import { PROJECT_DIR, openDbAt } from '../db/connection.js';
import { getFlagValue, getIntFlag, resetConfigCache } from '../config.js';
import * as fmt from '../output/format.js';

/**
 * Create `.trialkit/` in the working directory: config, ledger database and
 * the data folder sessions are written under.
 */
export async function init(args: string[], cwd: string = process.cwd()): Promise<void> {
  const configDir = path.join(cwd, PROJECT_DIR);
  const configPath = path.join(configDir, 'config.json');

  if (fs.existsSync(configPath) && !args.includes('--force')) {
    fmt.warn(`${configPath} already exists. Use --force to overwrite.`);
    return;
  }

  const basePath = getFlagValue(args, '--base') ?? 'data';
  const trackers = args.includes('--track-process') ? ['process'] : [];

  mkdirSafe(configDir);
  fs.writeFileSync(configPath, configTemplate({
    basePath,
    adHocHeaderAdd: args.includes('--ad-hoc'),
    endAfterLastTrial: args.includes('--end-after-last-trial'),
    sampleIntervalMs: getIntFlag(args, '--interval', 20),
    trackers,
  }) + '\n');
  resetConfigCache();

  const db = openDbAt(cwd);
  db.close();

  mkdirSafe(path.resolve(cwd, basePath));

  fmt.success(`Initialised in ${configDir}`);
  console.log(`  Data folder: ${path.resolve(cwd, basePath)}`);
  console.log(`  Next: trialkit run <protocol.json> --ppid <participant>`);
}
