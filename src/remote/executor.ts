import { Logger } from 'winston';
import { TransportError, errorMessage } from '../errors.js';
import { CONNECTION_LOST_EXIT_CODE, RemoteTransport } from './transport.js';

export type FailurePolicy = 'error' | 'warn' | 'ignore';
export type Severity = 'error' | 'warning' | 'none';

export interface ExecutionResult {
  readonly host: string;
  readonly description: string;
  readonly command: string;
  readonly success: boolean;
  readonly output: string;
  readonly exitCode: number;
  readonly severity: Severity;
}

export interface ExecuteOptions {
  /** Do not relay output lines to the log. Output is still captured. */
  quiet?: boolean;
  /** Values replaced with *** wherever the command or output is logged or recorded. */
  redact?: string[];
  /** How a non-zero exit is classified. Read-only queries use 'ignore'. */
  onFailure?: FailurePolicy;
}

export interface RemoteExecutorConfig {
  transport: RemoteTransport;
  logger: Logger;
  maxCapturedLines?: number;
}

const SEVERITY: Record<FailurePolicy, Severity> = {
  error: 'error',
  warn: 'warning',
  ignore: 'none',
};

export function redactText(text: string, secrets: readonly string[] = []): string {
  let result = text;
  for (const secret of secrets) {
    if (secret) result = result.split(secret).join('***');
  }
  return result;
}

export class RemoteExecutor {
  private config: RemoteExecutorConfig;
  private results: ExecutionResult[] = [];
  private maxLines: number;

  constructor(config: RemoteExecutorConfig) {
    this.config = config;
    this.maxLines = config.maxCapturedLines ?? 500;
  }

  get transport(): RemoteTransport {
    return this.config.transport;
  }

  getResults(): readonly ExecutionResult[] {
    return this.results;
  }

  async execute(
    host: string,
    description: string,
    command: string,
    options: ExecuteOptions = {},
  ): Promise<ExecutionResult> {
    const { logger } = this.config;
    const policy = options.onFailure ?? 'error';
    const secrets = options.redact ?? [];
    const shownCommand = redactText(command, secrets);

    if (policy === 'ignore') {
      logger.debug(`Query on ${host}: ${description}`);
    } else {
      logger.info(`Executing on ${host}: ${description}`);
    }
    logger.debug(`Command: ${shownCommand}`, { host });

    const proc = this.config.transport.exec(host, command);
    const lines: string[] = [];

    try {
      for await (const rawLine of proc.output) {
        const line = redactText(rawLine, secrets);
        lines.push(line);
        if (lines.length > this.maxLines) lines.shift();
        if (!options.quiet) logger.debug(`  ${line}`, { host });
      }
    } catch (error) {
      logger.warn(`Output capture failed for "${description}" on ${host}: ${errorMessage(error)}`);
    }

    let exitCode: number;
    try {
      exitCode = await proc.exitCode;
    } catch (error) {
      this.record({
        host, description, command: shownCommand, success: false,
        output: lines.join('\n'), exitCode: -1, severity: SEVERITY[policy],
      });
      throw error;
    }

    if (exitCode === CONNECTION_LOST_EXIT_CODE) {
      this.record({
        host, description, command: shownCommand, success: false,
        output: lines.join('\n'), exitCode, severity: 'error',
      });
      logger.error(`Lost connection to ${host} during: ${description}`);
      throw new TransportError('Lost SSH connection to host', {
        host,
        operation: description,
        exitCode,
        output: lines.join('\n'),
      });
    }

    const success = exitCode === 0;
    const result = this.record({
      host,
      description,
      command: shownCommand,
      success,
      output: lines.join('\n'),
      exitCode,
      severity: success ? 'none' : SEVERITY[policy],
    });

    if (success) {
      if (policy === 'ignore') {
        logger.debug(`Query succeeded: ${description} on ${host}`);
      } else {
        logger.info(`Completed: ${description} on ${host}`);
      }
    } else if (policy === 'error') {
      logger.error(`Failed: ${description} on ${host} (exit code: ${exitCode})`);
    } else if (policy === 'warn') {
      logger.warn(`Failed: ${description} on ${host} (exit code: ${exitCode})`);
    } else {
      logger.debug(`Query returned ${exitCode}: ${description} on ${host}`);
    }

    return result;
  }

  private record(result: ExecutionResult): ExecutionResult {
    const frozen = Object.freeze(result);
    this.results.push(frozen);
    return frozen;
  }
}
