/**
 * End-of-run summary printed to stdout.
 */

import chalk from 'chalk';
import { FieldError } from '../errors.js';
import { RunReport } from '../report/reporter.js';

export function formatDuration(ms: number): string {
  const seconds = Math.round(ms / 1000);
  if (seconds < 60) return `${seconds}s`;
  return `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

export function printFieldErrors(errors: readonly FieldError[]): void {
  for (const e of errors) {
    console.error(chalk.red(`  ✗ ${e.field}: ${e.message}`));
  }
}

export function printReport(report: RunReport, title: string): void {
  console.log(chalk.bold(`\n  ${title}`));
  console.log(chalk.dim('  ' + '─'.repeat(60)));

  if (report.status === 'success') {
    console.log(`  Status:    ${chalk.green('SUCCESS')}`);
  } else {
    console.log(`  Status:    ${chalk.red('FAILED')} ${chalk.dim(`(exit ${report.exitCode})`)}`);
  }

  if (report.fatal) {
    console.log(`  Stage:     ${report.fatal.stage}`);
    if (report.fatal.host) console.log(`  Host:      ${report.fatal.host}`);
    console.log(`  Operation: ${report.fatal.operation}`);
    for (const line of report.fatal.message.split('\n')) {
      console.log(chalk.red(`    ${line}`));
    }
  }

  const errors = report.errors > 0 ? chalk.red(String(report.errors)) : chalk.green('0');
  const warnings = report.warnings > 0 ? chalk.yellow(String(report.warnings)) : chalk.green('0');
  console.log(`  Errors:    ${errors}   Warnings: ${warnings}`);

  for (const stack of report.stacks) {
    const mark = stack.converged ? chalk.green('✓') : chalk.yellow('!');
    console.log(`  ${mark} stack ${stack.stack.padEnd(12)} ${stack.replicas ?? '-'} ${chalk.dim(`(${stack.attempts} polls)`)}`);
  }

  for (const timeout of report.convergenceTimeouts) {
    console.log(chalk.yellow(`  ! ${timeout.stack} did not converge after ${timeout.attempts} attempts`));
  }

  for (const failure of report.probeFailures) {
    console.log(chalk.yellow(`  ! ${failure.service} not reachable at ${failure.host}:${failure.port} (${failure.reason})`));
  }

  if (report.access.length > 0) {
    console.log(chalk.bold('\n  Access'));
    for (const entry of report.access) {
      console.log(`    ${entry.service.padEnd(16)} ${chalk.cyan(entry.url)}`);
    }
  }

  console.log(chalk.dim(`\n  Duration: ${formatDuration(report.durationMs)}   Logs: ${report.logDir}\n`));
}
