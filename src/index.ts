#!/usr/bin/env node

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadConfig, resolveConfigPath } from './config';
import { DependentsFeed } from './discovery/dependents-feed';
import { createHttpClient } from './http';
import { ScannerClient } from './scanners/scanner-client';
import { TriageScheduler, buildCronExpression } from './scheduling/scheduler';
import { TriageOrchestrator } from './triage/orchestrator';
import { WatchConfig } from './types';

interface CommandOptions {
  config?: string;
  exitOnFailure?: boolean;
}

async function initialise(options: CommandOptions): Promise<WatchConfig> {
  const config = await loadConfig(resolveConfigPath(options.config));
  if (options.exitOnFailure) {
    config.exitOnFailure = true;
  }
  console.log(`initialised with dependency target \`${config.target}\``);
  return config;
}

export function createOrchestrator(config: WatchConfig): TriageOrchestrator {
  const client = createHttpClient({ timeoutMs: config.timeoutMs });
  return new TriageOrchestrator({
    feed: new DependentsFeed(client, config.registryUrl),
    scanner: new ScannerClient(client, config.apiKey, config.scannerUrl),
    target: config.target,
    lookbackHours: config.lookbackHours
  });
}

async function watch(options: CommandOptions): Promise<void> {
  const config = await initialise(options);
  const orchestrator = createOrchestrator(config);

  const shutdown = async (exitCode: number): Promise<void> => {
    console.log('🛑 shutting down triage scheduler');
    await scheduler.stop();
    process.exit(exitCode);
  };

  const scheduler = new TriageScheduler(() => orchestrator.runCycle(), {
    expression: buildCronExpression(config.lookbackHours, config.scheduleMinute),
    failurePolicy: config.exitOnFailure ? 'exit' : 'continue',
    onFatal: result => {
      console.error(`❌ exiting after failed triage of ${result.target}: ${result.error.message}`);
      shutdown(1).catch(fatal);
    }
  });

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      console.log(`received ${signal}`);
      shutdown(0).catch(fatal);
    });
  }

  scheduler.start();
}

async function runOnce(options: CommandOptions): Promise<void> {
  const config = await initialise(options);
  const result = await createOrchestrator(config).runCycle();
  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

function fatal(error: unknown): never {
  console.error('Error:', error instanceof Error ? error.message : error);
  process.exit(1);
}

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName('dependents-watch')
    .option('config', {
      alias: 'c',
      describe: 'Path to the JSON config file',
      type: 'string'
    })
    .option('exit-on-failure', {
      describe: 'Exit the process when a scheduled triage cycle fails',
      type: 'boolean'
    })
    .command(['watch', '$0'], 'Triage new dependents on a schedule', {}, async (argv) => {
      await watch(argv);
    })
    .command('run', 'Run a single triage cycle now', {}, async (argv) => {
      await runOnce(argv);
    })
    .strict()
    .help()
    .parse();
}

if (require.main === module) {
  main().catch(fatal);
}
