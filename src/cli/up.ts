/**
 * swarmup up / swarmup verify
 */

import chalk from 'chalk';
import os from 'os';
import { Logger } from 'winston';
import { LoadedConfig, describeConfig, loadConfig, usesDefaultDashboardCredentials } from '../config/loader.js';
import { RawConfig } from '../config/schema.js';
import { parseLogLevel } from '../config/validator.js';
import { ConfigurationError, INTERRUPT_EXIT_CODE, STAGE_EXIT_CODES, errorMessage } from '../errors.js';
import { DEFAULT_LOG_DIR, createLogger, pruneLogs } from '../logging.js';
import { Orchestrator } from '../orchestrator.js';
import { checkPrerequisites } from '../prerequisites.js';
import { SshTransport } from '../remote/ssh.js';
import { defaultStacksDir } from './paths.js';
import { printFieldErrors, printReport } from './summary.js';

export interface RunOpts {
  config: string;
  verbosity?: string;
  logDir?: string;
  stacksDir?: string;
}

function overrides(opts: RunOpts): RawConfig {
  return opts.verbosity ? { log_level: opts.verbosity } : {};
}

function load(opts: RunOpts): LoadedConfig | null {
  try {
    return loadConfig(opts.config, overrides(opts));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(chalk.red('Configuration could not be loaded:'));
      printFieldErrors(error.fieldErrors);
      return null;
    }
    throw error;
  }
}

function announceConfig(loaded: LoadedConfig, logger: Logger): void {
  for (const key of loaded.unknownKeys) {
    logger.warn(`Ignoring unknown configuration key: ${key}`);
  }
  for (const line of describeConfig(loaded.config)) {
    logger.debug(`config ${line}`);
  }
  if (usesDefaultDashboardCredentials(loaded.config)) {
    logger.warn('Dashboard credentials are the insecure defaults (admin/admin); set dashboard_admin_user and dashboard_admin_password');
  }
}

function prune(logDir: string): void {
  try {
    pruneLogs(logDir);
  } catch (error) {
    console.error(chalk.yellow(`Could not prune old logs in ${logDir}: ${errorMessage(error)}`));
  }
}

/**
 * SIGINT/SIGTERM: drop local staging files, prune logs, exit 130.
 * Nodes already joined stay joined.
 */
export function interruptHandler(
  run: Pick<Orchestrator, 'cleanup'>,
  logDir: string,
  exit: (code: number) => void,
): (signal: NodeJS.Signals) => void {
  return (signal) => {
    console.error(chalk.yellow(`\nReceived ${signal}, stopping`));
    run.cleanup();
    prune(logDir);
    exit(INTERRUPT_EXIT_CODE);
  };
}

/** Returns a function that removes the handlers. */
function handleInterrupts(orchestrator: Orchestrator, logDir: string): () => void {
  const onSignal = interruptHandler(orchestrator, logDir, code => process.exit(code));
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

function createOrchestrator(opts: RunOpts, loaded: LoadedConfig, logger: Logger, logDir: string): Orchestrator {
  return new Orchestrator({
    config: loaded.config,
    logger,
    homeDir: os.homedir(),
    logDir,
    stacksDir: opts.stacksDir ?? defaultStacksDir(),
    createTransport: (ssh) => new SshTransport(ssh),
    checkPrerequisites: () => {
      checkPrerequisites(process.env.PATH);
    },
  });
}

async function execute(opts: RunOpts, mode: 'up' | 'verify'): Promise<number> {
  const loaded = load(opts);
  if (!loaded) return STAGE_EXIT_CODES.configuration;

  const logDir = opts.logDir ?? DEFAULT_LOG_DIR;
  const logger = createLogger({ verbosity: parseLogLevel(loaded.config.log_level) ?? 3, logDir });
  announceConfig(loaded, logger);

  const orchestrator = createOrchestrator(opts, loaded, logger, logDir);
  const release = handleInterrupts(orchestrator, logDir);

  try {
    const report = mode === 'up' ? await orchestrator.run() : await orchestrator.verify();
    printReport(report, mode === 'up' ? 'Cluster bootstrap' : 'Cluster verification');
    return report.exitCode;
  } finally {
    release();
    prune(logDir);
  }
}

export async function runUp(opts: RunOpts): Promise<number> {
  return execute(opts, 'up');
}

export async function runVerify(opts: RunOpts): Promise<number> {
  return execute(opts, 'verify');
}
