#!/usr/bin/env node

import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import * as fmt from './output/format.js';

const VERSION: string = JSON.parse(
  fs.readFileSync(fileURLToPath(new URL('../package.json', import.meta.url)), 'utf-8'),
).version;

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(VERSION);
    return;
  }

  if (args.includes('--help') || args.includes('-h') || args.length === 0) {
    printHelp();
    return;
  }

  const isJson = args.includes('--json');
  const command = args[0];
  const rest = args.slice(1).filter(a => a !== '--json');

  try {
    switch (command) {
      case 'init': {
        const { init } = await import('./commands/init.js');
        await init(rest);
        break;
      }
      case 'run': {
        const { run } = await import('./commands/run.js');
        await run(rest);
        break;
      }
      case 'check': {
        const { check } = await import('./commands/check.js');
        await check(rest, isJson);
        break;
      }
      case 'sessions': {
        const { sessions } = await import('./commands/sessions.js');
        await sessions(rest, isJson);
        break;
      }
      default:
        console.error(`Unknown command: ${command}`);
        printHelp();
        process.exit(1);
    }
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    fmt.error(`Error: ${msg}`);
    process.exit(1);
  }
}

function printHelp(): void {
  console.log(`
trialkit v${VERSION}: run session/block/trial experiments and save their data

Usage: trialkit <command> [options]

Setup:
  init                         Create .trialkit/ and the data folder
    --base DIR                 Data folder (default: data)
    --ad-hoc                   Accept undeclared result columns
    --end-after-last-trial     End sessions automatically
    --track-process            Sample process memory during trials
    --interval MS              Tracker sample interval (default: 20)
    --force                    Overwrite an existing config

Sessions:
  run <protocol.json>          Run a protocol interactively
    --ppid ID                  Participant ID (required)
    --session N                Session number (default: 1)
    --base DIR                 Override the data folder (must exist)
    --detail key=value         Participant detail, repeatable
  check <experiment> <ppid>    Does a session folder exist? Next free number
    --session N
    --base DIR
  sessions [--open]            List sessions from the ledger
    --experiment NAME

Flags:
  --json                       Output as JSON
  --version, -v                Print version
  --help, -h                   Print this help
`);
}

main().catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  fmt.error(`Error: ${msg}`);
  process.exit(1);
});
