/**
 * swarmup validate / swarmup init-config
 */

import chalk from 'chalk';
import os from 'os';
import { LoadedConfig, describeConfig, loadConfig, usesDefaultDashboardCredentials, writeConfigTemplate } from '../config/loader.js';
import { validate } from '../config/validator.js';
import { ConfigurationError, STAGE_EXIT_CODES } from '../errors.js';
import { configTemplatePath } from './paths.js';
import { printFieldErrors } from './summary.js';

export interface ValidateOpts {
  config: string;
}

export function runValidate(opts: ValidateOpts): number {
  let loaded: LoadedConfig;
  try {
    loaded = loadConfig(opts.config);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    printFieldErrors(error.fieldErrors);
    return error.exitCode;
  }

  console.log(chalk.bold(`\n  Configuration: ${opts.config}\n`));
  for (const line of describeConfig(loaded.config)) {
    console.log(`  ${line}`);
  }
  console.log();

  for (const key of loaded.unknownKeys) {
    console.log(chalk.yellow(`  ! unknown key ignored: ${key}`));
  }
  if (usesDefaultDashboardCredentials(loaded.config)) {
    console.log(chalk.yellow('  ! dashboard credentials are the insecure defaults'));
  }

  const result = validate(loaded.config, { homeDir: os.homedir() });
  if (!result.ok) {
    console.error(chalk.red(`  Configuration invalid (${result.errors.length} error(s)):`));
    printFieldErrors(result.errors);
    return STAGE_EXIT_CODES.configuration;
  }

  const { manager, workers } = result.settings;
  console.log(chalk.green(`  ✓ valid: manager ${manager.id}, ${workers.length} worker(s)\n`));
  return 0;
}

export function runInitConfig(outputPath: string): number {
  try {
    writeConfigTemplate(configTemplatePath(), outputPath);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) throw error;
    printFieldErrors(error.fieldErrors);
    return error.exitCode;
  }
  console.log(chalk.green(`Configuration template written to ${outputPath}`));
  console.log(chalk.dim('Set manager_host, manager_advertise_addr and worker_hosts before running swarmup up.'));
  return 0;
}
