#!/usr/bin/env npx tsx
/**
 * ppf-reader CLI — headless tool for inspecting .ppf dump files
 *
 * Usage:
 *   npx tsx scripts/cli.ts <command> [args...] [--strict] [--config <file.json>]
 *
 * Commands:
 *   info <file.ppf>                  Run summary and load report
 *   validate <file.ppf>              Region id diagnostics
 *   times <file.ppf>                 Index, time and cycle of every dump
 *   arrays <file.ppf>                Declared arrays with their lengths
 *   collect <file.ppf> <NAME> [n]    One array at dump n (default: last)
 *   materials <file.ppf>             Per-region element composition
 */

import { resolve, basename } from 'path';
import { DumpCollection } from '../src/core/dump-collection';
import type { LoadOptions } from '../src/core/dump-collection';
import { applyConfig, loadConfigFile, parseConfig } from '../src/core/config';
import { closeLogger } from '../src/core/logger';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function die(msg: string): never {
  console.error(`Error: ${msg}`);
  process.exit(1);
}

function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

function fmt(v: number | null): string {
  return v === null ? '-' : v.toExponential(4);
}

interface Flags {
  strict: boolean;
  config: string | null;
  positional: string[];
}

function parseFlags(argv: string[]): Flags {
  const flags: Flags = { strict: false, config: null, positional: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--strict') flags.strict = true;
    else if (arg === '--config') {
      const next = argv[++i];
      if (!next) die('--config needs a file path');
      flags.config = next;
    } else flags.positional.push(arg);
  }
  return flags;
}

function loadOptions(flags: Flags): LoadOptions {
  const config = flags.config ? loadConfigFile(resolve(flags.config)) : parseConfig({ logLevel: 'warn' });
  const options = applyConfig(config);
  return flags.strict ? { ...options, strict: true } : options;
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

function cmdInfo(dumps: DumpCollection, filepath: string): void {
  console.log(`\n=== PPF Info: ${basename(filepath)} ===\n`);

  const s = dumps.summary();
  console.log(`  Dumps:        ${s.dumpCount}`);
  console.log(`  Zones:        ${s.zoneCount ?? '-'}`);
  console.log(`  Regions:      ${s.regionCount ?? '-'}`);
  console.log(`  Groups:       ${s.groupCount ?? '-'}`);
  console.log(`  Arrays:       ${s.arrayNames.join(' ') || '-'}`);
  console.log(`  Time:         ${fmt(s.firstTime)} .. ${fmt(s.lastTime)}`);
  console.log(`  Cycles:       ${s.firstCycle ?? '-'} .. ${s.lastCycle ?? '-'}`);

  const r = dumps.report;
  console.log(`\nLoad:`);
  console.log(`  Consumed:     ${formatSize(r.bytesConsumed)} of ${formatSize(r.totalBytes)}`);
  console.log(`  Complete:     ${r.complete ? 'yes' : 'no'}`);
  if (r.failure) console.log(`  Stopped:      ${r.failure.message}`);

  if (s.dumpCount > 0) {
    const h = dumps.dump(0).header;
    console.log(`\nHeader (dump 0):`);
    console.log(`  Name:         ${h.name}`);
    console.log(`  Written:      ${h.dateBuffer} ${h.timeBuffer}`);
    console.log(`  Version:      ${h.version1} ${h.version2}`);
    console.log(`  Machine:      ${h.machine}`);
  }
}

function cmdValidate(dumps: DumpCollection): void {
  const problems = dumps.validate();
  if (problems.length === 0) {
    console.log('No problems found.');
    return;
  }
  for (const p of problems) console.log(p);
}

function cmdTimes(dumps: DumpCollection): void {
  console.log(`  ${'#'.padStart(5)}  ${'time'.padStart(12)}  cycle`);
  let i = 0;
  for (const dump of dumps) {
    console.log(`  ${String(i++).padStart(5)}  ${fmt(dump.header.time).padStart(12)}  ${dump.header.cycle}`);
  }
}

function cmdArrays(dumps: DumpCollection): void {
  if (dumps.count === 0) die('no dumps decoded');
  const first = dumps.dump(0);
  for (const name of first.header.arrayNames) {
    const values = first.arrays.get(name);
    console.log(`  ${name.padEnd(8)} ${values ? `${values.length} values` : 'skipped (no size formula)'}`);
  }
}

function cmdCollect(dumps: DumpCollection, name: string, index?: number): void {
  if (dumps.count === 0) die('no dumps decoded');
  const grid = dumps.collect(name);
  const col = index ?? dumps.count - 1;
  if (!Number.isInteger(col) || col < 0 || col >= dumps.count) die(`dump index ${col} out of range`);
  console.log(`${name} at dump ${col} (t = ${fmt(dumps.times()[col])}):`);
  grid.forEach((row, z) => console.log(`  ${String(z).padStart(5)}  ${fmt(row[col])}`));
}

function cmdMaterials(dumps: DumpCollection): void {
  for (const [region, elements] of dumps.materialTable()) {
    console.log(`Region ${region}:`);
    for (const el of elements) {
      console.log(`  Z=${el.atomicNumber}  A=${el.atomicWeight}  fraction=${el.atomicFraction}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

const USAGE = `
ppf-reader CLI — inspect .ppf dump files

Usage: npx tsx scripts/cli.ts <command> [args...] [--strict] [--config <file.json>]

Commands:
  info <file.ppf>                 Run summary and load report
  validate <file.ppf>             Region id diagnostics
  times <file.ppf>                Index, time and cycle of every dump
  arrays <file.ppf>               Declared arrays with their lengths
  collect <file.ppf> <NAME> [n]   One array at dump n (default: last)
  materials <file.ppf>            Per-region element composition
`;

type Command = (dumps: DumpCollection, filepath: string, args: string[]) => void;

const COMMANDS: Record<string, Command> = {
  info: cmdInfo,
  validate: cmdValidate,
  times: cmdTimes,
  arrays: cmdArrays,
  collect: (dumps, _filepath, args) => {
    if (!args[0]) die('Usage: collect <file.ppf> <NAME> [dump-index]');
    cmdCollect(dumps, args[0], args[1] !== undefined ? parseInt(args[1], 10) : undefined);
  },
  materials: cmdMaterials,
};

const [, , command, ...rest] = process.argv;

if (!command) {
  console.log(USAGE);
  process.exit(0);
}

const run = Object.prototype.hasOwnProperty.call(COMMANDS, command) ? COMMANDS[command] : undefined;
if (!run) {
  console.error(`Error: Unknown command: ${command}`);
  console.error(USAGE);
  process.exit(1);
}

try {
  const flags = parseFlags(rest);
  const [file, ...args] = flags.positional;
  if (!file) die(`Usage: ${command} <file.ppf>`);
  const filepath = resolve(file);
  run(DumpCollection.load(filepath, loadOptions(flags)), filepath, args);
} catch (e) {
  console.error(`\nFATAL: ${e}`);
  if (e instanceof Error && e.stack) {
    console.error(e.stack);
  }
  process.exitCode = 1;
} finally {
  closeLogger();
}
