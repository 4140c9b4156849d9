#!/usr/bin/env node
/* eslint-disable no-console */
// Bot CLI -- entry point for `npm run bot`
//
//   npm run bot -- --file batch.json --ltp 125 --lot-size 75 [--dry-run]
//   npm run bot -- --listen [--channel signals] [--dry-run]

import { readFileSync } from 'fs';
import { loadConfig, loadEnvFile } from '../lib/config';
import { isDatabaseConfigured } from '../lib/db';
import { errorMessage } from '../lib/errors';
import { enableFileLogging } from '../lib/logger';
import { DhanClient } from '../services/dhan/client';
import { ScripMasterResolver } from '../services/dhan/scrip-master';
import { neonSignalLog } from '../services/signal-log';
import type { PipelineConfig } from '../types';
import { MessageListener } from './message-listener';
import {
  InMemorySignalLog,
  StaticInstrumentResolver,
  StaticMarketData,
  batchStart,
  formatOutcome,
  parseBatchFile,
} from './offline';
import { BotRunner, type BotRunnerDeps } from './runner';
import { TradeExecutor } from './trade-executor';

// --- Helpers ---

function getArg(argv: string[], flag: string): string | undefined {
  const idx = argv.indexOf(flag);
  if (idx === -1 || idx + 1 >= argv.length) return undefined;
  return argv[idx + 1];
}

function getNumberArg(argv: string[], flag: string): number | undefined {
  const raw = getArg(argv, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${flag} must be a positive number, got "${raw}"`);
  }
  return value;
}

/**
 * Wire collaborators. Static market data replaces Dhan when --ltp / --lot-size are given;
 * the broker is only contacted for orders when not in dry-run mode.
 */
function buildDeps(args: string[], dryRun: boolean): BotRunnerDeps {
  const ltp = getNumberArg(args, '--ltp');
  const lotSize = getNumberArg(args, '--lot-size');
  const needsDhan = ltp === undefined || !dryRun;
  const dhan = needsDhan ? DhanClient.fromEnv() : null;

  const channel = getArg(args, '--channel') ?? null;

  return {
    resolver: lotSize !== undefined ? new StaticInstrumentResolver(lotSize) : ScripMasterResolver.fromFile(),
    marketData: ltp !== undefined ? new StaticMarketData(ltp) : (dhan ?? DhanClient.fromEnv()),
    submitter: new TradeExecutor(dhan, dryRun),
    signalLog: isDatabaseConfigured() ? neonSignalLog : new InMemorySignalLog(),
    listener: new MessageListener(channel),
  };
}

async function runFile(path: string, config: PipelineConfig, deps: BotRunnerDeps): Promise<void> {
  const messages = parseBatchFile(readFileSync(path, 'utf-8'), path, new Date());
  const runner = new BotRunner(config, deps);
  await runner.rehydrate(batchStart(messages, new Date()));

  const outcomes = await runner.processBatch(messages);
  console.log(`\n${messages.length} message(s) -> ${outcomes.length} candidate(s)\n`);
  for (const outcome of outcomes) {
    console.log(`  ${formatOutcome(outcome)}`);
  }
}

async function runLive(config: PipelineConfig, deps: BotRunnerDeps, dryRun: boolean): Promise<void> {
  const runner = new BotRunner(config, deps);

  async function shutdown(): Promise<void> {
    console.log('\nShutting down...');
    await runner.stop();
    process.exit(0);
  }

  process.on('SIGINT', () => { shutdown().catch(() => process.exit(1)); });
  process.on('SIGTERM', () => { shutdown().catch(() => process.exit(1)); });

  console.log(`Starting signal bot (${dryRun ? 'DRY-RUN' : 'LIVE'})...`);
  await runner.start();
  console.log('  Press Ctrl+C to stop');
}

// --- Main ---

async function main(): Promise<void> {
  loadEnvFile();

  const args = process.argv.slice(2);
  const dryRun = args.includes('--dry-run');
  const file = getArg(args, '--file');
  const logDir = getArg(args, '--log-dir');

  if (!file && !args.includes('--listen')) {
    console.log('Usage: npm run bot -- --file <batch.json|batch.txt> [--ltp N] [--lot-size N] [--dry-run]');
    console.log('       npm run bot -- --listen [--channel NAME] [--dry-run] [--log-dir DIR]');
    process.exit(1);
  }

  if (logDir) {
    console.log(`Logging to ${enableFileLogging(logDir)}`);
  }

  const config = loadConfig();
  const deps = buildDeps(args, dryRun);

  if (file) {
    await runFile(file, config, deps);
  } else {
    await runLive(config, deps, dryRun);
  }
}

process.on('unhandledRejection', (reason: unknown) => {
  console.error(`[unhandledRejection] ${errorMessage(reason)}`);
});

main().catch((err: unknown) => {
  console.error('Fatal error:', errorMessage(err));
  process.exit(1);
});
