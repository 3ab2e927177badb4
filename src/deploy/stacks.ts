import * as path from 'path';
import { Logger } from 'winston';
import { PortOption } from '../config/schema.js';
import { StackKey } from '../config/types.js';
import { StackConvergenceTimeout, StackDeployError } from '../errors.js';
import { ServiceStatus, SwarmControlPlane, isConverged } from '../engine/swarm.js';
import { RetryPolicy, Sleeper, pollUntil } from '../util/retry.js';

export interface StackDefinition {
  key: StackKey;
  name: string;
  title: string;
  /** Ports this stack publishes on the manager; probed after deployment. */
  ports: readonly PortOption[];
}

export const STACKS: readonly StackDefinition[] = [
  { key: 'registry', name: 'nexus', title: 'Container registry', ports: ['registry_port'] },
  { key: 'ingress', name: 'nginx', title: 'Ingress proxy', ports: ['http_port', 'https_port'] },
  { key: 'monitoring', name: 'monitoring', title: 'Monitoring', ports: ['dashboard_port', 'metrics_port'] },
];

export const STACK_ENV_FILE = 'stack.env';
export const DEFAULT_READINESS_POLICY: RetryPolicy = { attempts: 30, delayMs: 2000 };

export function enabledStacks(toggles: Readonly<Record<StackKey, boolean>>): StackDefinition[] {
  return STACKS.filter(s => toggles[s.key]);
}

export function composePath(setupDir: string, stack: StackDefinition): string {
  return path.posix.join(setupDir, 'stacks', stack.name, 'docker-compose.yml');
}

export interface StackOutcome {
  stack: string;
  composePath: string;
  converged: boolean;
  attempts: number;
  /** Replica string of the service that settled readiness, or the last one seen. */
  replicas: string | null;
}

export interface StackDeployerConfig {
  controlPlane: SwarmControlPlane;
  logger: Logger;
  managerHost: string;
  setupDir: string;
  readiness?: RetryPolicy;
  sleep?: Sleeper;
}

export class StackDeployer {
  private config: StackDeployerConfig;
  private timeouts: StackConvergenceTimeout[] = [];

  constructor(config: StackDeployerConfig) {
    this.config = config;
  }

  get envFilePath(): string {
    return path.posix.join(this.config.setupDir, STACK_ENV_FILE);
  }

  getTimeouts(): readonly StackConvergenceTimeout[] {
    return this.timeouts;
  }

  async deployAll(stacks: readonly StackDefinition[]): Promise<StackOutcome[]> {
    const outcomes: StackOutcome[] = [];
    for (const stack of stacks) {
      outcomes.push(await this.deploy(stack));
    }
    return outcomes;
  }

  async deploy(stack: StackDefinition): Promise<StackOutcome> {
    const { controlPlane, logger, managerHost } = this.config;
    const compose = composePath(this.config.setupDir, stack);

    logger.info(`Deploying ${stack.title} stack '${stack.name}'`);
    const result = await controlPlane.deployStack(managerHost, stack.name, compose, this.envFilePath);
    if (!result.success) {
      throw new StackDeployError(`Failed to deploy stack '${stack.name}'`, {
        host: managerHost,
        operation: result.description,
        exitCode: result.exitCode,
        output: result.output,
      });
    }

    return this.waitForReady(stack, compose);
  }

  private async waitForReady(stack: StackDefinition, compose: string): Promise<StackOutcome> {
    const { controlPlane, logger, managerHost } = this.config;
    const policy = this.config.readiness ?? DEFAULT_READINESS_POLICY;
    const observed: { last: string | null } = { last: null };

    const poll = await pollUntil<ServiceStatus>(
      async () => {
        const services = await controlPlane.listServices(managerHost, `${stack.name}_`);
        if (!services || services.length === 0) return null;
        observed.last = services.map(s => `${s.name} ${s.replicas}`).join(', ');
        return services.find(s => isConverged(s.replicas)) ?? null;
      },
      policy,
      {
        sleep: this.config.sleep,
        onRetry: (attempt) => logger.debug(`Stack '${stack.name}' not ready (attempt ${attempt}/${policy.attempts})`),
      },
    );

    if (poll.ok) {
      logger.info(`Stack '${stack.name}' ready: ${poll.value.name} ${poll.value.replicas}`);
      return { stack: stack.name, composePath: compose, converged: true, attempts: poll.attempts, replicas: poll.value.replicas };
    }

    logger.error(`Stack '${stack.name}' did not converge after ${poll.attempts} attempts (last seen: ${observed.last ?? 'no services'})`);
    this.timeouts.push({ kind: 'stack-convergence-timeout', stack: stack.name, attempts: poll.attempts, lastObserved: observed.last });
    return { stack: stack.name, composePath: compose, converged: false, attempts: poll.attempts, replicas: observed.last };
  }
}
