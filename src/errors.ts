export type Stage =
  | 'prerequisites'
  | 'configuration'
  | 'transport'
  | 'prepare'
  | 'install'
  | 'cluster'
  | 'join'
  | 'deploy';

export const STAGE_EXIT_CODES: Record<Stage, number> = {
  prerequisites: 1,
  configuration: 2,
  transport: 3,
  prepare: 4,
  install: 5,
  cluster: 6,
  join: 7,
  deploy: 8,
};

export const INTERRUPT_EXIT_CODE = 130;

const OUTPUT_TAIL_LINES = 5;

export function outputTail(output: string, lines: number = OUTPUT_TAIL_LINES): string {
  return output
    .split('\n')
    .map(l => l.trimEnd())
    .filter(l => l.length > 0)
    .slice(-lines)
    .join('\n');
}

export interface BootstrapErrorDetails {
  host?: string;
  operation: string;
  exitCode?: number;
  output?: string;
}

/**
 * Fatal failure of a pipeline stage. The message always names the host,
 * the operation and, when a command ran, its exit code and output tail.
 */
export class BootstrapError extends Error {
  readonly stage: Stage;
  readonly host?: string;
  readonly operation: string;
  readonly commandExitCode?: number;
  readonly outputTail: string;

  constructor(stage: Stage, summary: string, details: BootstrapErrorDetails) {
    const tail = details.output ? outputTail(details.output) : '';
    const parts = [summary];
    if (details.host) parts.push(`host=${details.host}`);
    parts.push(`operation="${details.operation}"`);
    if (details.exitCode !== undefined) parts.push(`exit code ${details.exitCode}`);
    let message = parts.join(' | ');
    if (tail) message += `\n${tail}`;

    super(message);
    this.name = new.target.name;
    this.stage = stage;
    this.host = details.host;
    this.operation = details.operation;
    this.commandExitCode = details.exitCode;
    this.outputTail = tail;
  }

  get exitCode(): number {
    return STAGE_EXIT_CODES[this.stage];
  }
}

export class PrerequisiteError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('prerequisites', summary, details);
  }
}

export interface FieldError {
  field: string;
  message: string;
}

export class ConfigurationError extends BootstrapError {
  readonly fieldErrors: FieldError[];

  constructor(fieldErrors: FieldError[]) {
    super('configuration', `Configuration validation failed with ${fieldErrors.length} error(s)`, {
      operation: 'validate configuration',
      output: fieldErrors.map(e => `${e.field}: ${e.message}`).join('\n'),
    });
    this.fieldErrors = fieldErrors;
  }
}

export class TransportError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('transport', summary, details);
  }
}

export class HostPreparationError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('prepare', summary, details);
  }
}

export class EngineInstallError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('install', summary, details);
  }
}

export class ClusterSetupError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('cluster', summary, details);
  }
}

/** Host belongs to a cluster in a way the run cannot reconcile by itself. */
export class ClusterConflictError extends BootstrapError {
  constructor(stage: 'cluster' | 'join', summary: string, details: BootstrapErrorDetails) {
    super(stage, summary, details);
  }
}

/** The worker never reached the manager's control port. */
export class JoinTimeoutError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('join', summary, details);
  }
}

/** The manager was reachable but the join did not produce an active member. */
export class JoinRejectedError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('join', summary, details);
  }
}

export class StackDeployError extends BootstrapError {
  constructor(summary: string, details: BootstrapErrorDetails) {
    super('deploy', summary, details);
  }
}

export interface StackConvergenceTimeout {
  kind: 'stack-convergence-timeout';
  stack: string;
  attempts: number;
  lastObserved: string | null;
}

export interface ConnectivityProbeFailure {
  kind: 'connectivity-probe-failure';
  service: string;
  host: string;
  port: number;
  reason: string;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
