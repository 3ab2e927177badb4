#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { runInitConfig, runValidate } from './cli/config.js';
import { RunOpts, runUp, runVerify } from './cli/up.js';
import { DEFAULT_CONFIG_PATH } from './config/loader.js';
import { DEFAULT_LOG_DIR } from './logging.js';

const program = new Command();

program
  .name('swarmup')
  .description('Bootstrap a container swarm cluster over SSH and deploy its stacks')
  .version('0.1.0');

function withRunOptions(command: Command): Command {
  return command
    .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_PATH)
    .option('-v, --verbosity <level>', 'log verbosity 1-4 (error, warn, info, debug)')
    .option('--log-dir <dir>', 'directory for setup.log and errors.log', DEFAULT_LOG_DIR)
    .option('--stacks-dir <dir>', 'local directory with the stack compose files');
}

function finish(code: number): void {
  process.exitCode = code;
}

function fail(err: unknown): void {
  console.error(chalk.red(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exitCode = 1;
}

// ── swarmup up ────────────────────────────────────────────
withRunOptions(
  program
    .command('up', { isDefault: true })
    .description('Install the engine, form the cluster and deploy the stacks'),
).action(async (opts: RunOpts) => {
  try {
    finish(await runUp(opts));
  } catch (err) {
    fail(err);
  }
});

// ── swarmup verify ────────────────────────────────────────
withRunOptions(
  program
    .command('verify')
    .description('List nodes and services on the manager and probe published ports'),
).action(async (opts: RunOpts) => {
  try {
    finish(await runVerify(opts));
  } catch (err) {
    fail(err);
  }
});

// ── swarmup validate ──────────────────────────────────────
program
  .command('validate')
  .description('Validate the configuration file and print the resolved values')
  .option('-c, --config <path>', 'configuration file', DEFAULT_CONFIG_PATH)
  .action((opts: { config: string }) => {
    try {
      finish(runValidate(opts));
    } catch (err) {
      fail(err);
    }
  });

// ── swarmup init-config ───────────────────────────────────
program
  .command('init-config <path>')
  .description('Write a configuration template to <path>')
  .action((outputPath: string) => {
    try {
      finish(runInitConfig(outputPath));
    } catch (err) {
      fail(err);
    }
  });

await program.parseAsync(process.argv);
