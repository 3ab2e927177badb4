import { Logger } from 'winston';
import { PortOption } from '../config/schema.js';
import {
  BootstrapError,
  ConnectivityProbeFailure,
  Stage,
  StackConvergenceTimeout,
} from '../errors.js';
import { NodeStatus, ServiceStatus, SwarmControlPlane } from '../engine/swarm.js';
import { StackDefinition, StackOutcome } from '../deploy/stacks.js';
import { ExecutionResult } from '../remote/executor.js';
import { RetryPolicy, Sleeper, pollUntil } from '../util/retry.js';
import { PortProbe, tcpProbe } from './probe.js';

export interface ProbeOutcome {
  service: string;
  host: string;
  port: number;
  reachable: boolean;
  attempts: number;
}

export interface ClusterView {
  nodes: NodeStatus[] | null;
  services: ServiceStatus[] | null;
}

export interface FatalSummary {
  stage: Stage;
  message: string;
  host?: string;
  operation: string;
}

export interface RunReport {
  status: 'success' | 'failed';
  exitCode: number;
  fatal: FatalSummary | null;
  errors: number;
  warnings: number;
  convergenceTimeouts: StackConvergenceTimeout[];
  probeFailures: ConnectivityProbeFailure[];
  probes: ProbeOutcome[];
  stacks: StackOutcome[];
  cluster: ClusterView | null;
  access: AccessEntry[];
  durationMs: number;
  logDir: string;
}

export interface ReportInput {
  results: readonly ExecutionResult[];
  fatal: BootstrapError | null;
  stacks?: StackOutcome[];
  convergenceTimeouts?: readonly StackConvergenceTimeout[];
  probes?: ProbeOutcome[];
  probeFailures?: readonly ConnectivityProbeFailure[];
  cluster?: ClusterView | null;
  access?: AccessEntry[];
  startedAt: number;
  finishedAt?: number;
  logDir: string;
}

export interface VerificationReporterConfig {
  controlPlane: SwarmControlPlane;
  logger: Logger;
  probe?: PortProbe;
  probePolicy?: RetryPolicy;
  probeTimeoutMs?: number;
  sleep?: Sleeper;
}

const DEFAULT_PROBE_POLICY: RetryPolicy = { attempts: 2, delayMs: 1000 };

export function tally(results: readonly ExecutionResult[]): { errors: number; warnings: number } {
  let errors = 0;
  let warnings = 0;
  for (const result of results) {
    if (result.severity === 'error') errors++;
    else if (result.severity === 'warning') warnings++;
  }
  return { errors, warnings };
}

export function buildReport(input: ReportInput): RunReport {
  const counts = tally(input.results);
  const fatal = input.fatal;

  return {
    status: fatal ? 'failed' : 'success',
    exitCode: fatal ? fatal.exitCode : 0,
    fatal: fatal
      ? { stage: fatal.stage, message: fatal.message, host: fatal.host, operation: fatal.operation }
      : null,
    errors: counts.errors,
    warnings: counts.warnings,
    convergenceTimeouts: [...(input.convergenceTimeouts ?? [])],
    probeFailures: [...(input.probeFailures ?? [])],
    probes: input.probes ?? [],
    stacks: input.stacks ?? [],
    cluster: input.cluster ?? null,
    access: fatal ? [] : input.access ?? [],
    durationMs: (input.finishedAt ?? Date.now()) - input.startedAt,
    logDir: input.logDir,
  };
}

export class VerificationReporter {
  private config: VerificationReporterConfig;
  private probeFailures: ConnectivityProbeFailure[] = [];

  constructor(config: VerificationReporterConfig) {
    this.config = config;
  }

  async inspectCluster(managerHost: string): Promise<ClusterView> {
    const { controlPlane, logger } = this.config;

    const nodes = await controlPlane.listNodes(managerHost);
    if (nodes) {
      logger.info(`Cluster nodes (${nodes.length}):`);
      for (const node of nodes) {
        const role = node.managerStatus ? ` [${node.managerStatus}]` : '';
        logger.info(`  ${node.hostname} ${node.status} ${node.availability}${role}`);
      }
    } else {
      logger.warn('Could not list cluster nodes');
    }

    const services = await controlPlane.listServices(managerHost, undefined, 'warn');
    if (services) {
      logger.info(`Services (${services.length}):`);
      for (const service of services) {
        logger.info(`  ${service.name} ${service.replicas} ${service.ports}`.trimEnd());
      }
    } else {
      logger.warn('Could not list services');
    }

    return { nodes, services };
  }

  /**
   * TCP probe of every published port of the given stacks. Outcomes are
   * informational; failures are recorded, never thrown.
   */
  async probeStacks(
    host: string,
    stacks: readonly StackDefinition[],
    ports: Readonly<Record<PortOption, number>>,
  ): Promise<ProbeOutcome[]> {
    const { logger } = this.config;
    const probe = this.config.probe ?? tcpProbe;
    const policy = this.config.probePolicy ?? DEFAULT_PROBE_POLICY;
    const timeoutMs = this.config.probeTimeoutMs ?? 5000;
    const outcomes: ProbeOutcome[] = [];

    for (const stack of stacks) {
      for (const option of stack.ports) {
        const port = ports[option];
        let reason = 'no attempt made';

        const result = await pollUntil(
          async () => {
            const attempt = await probe(host, port, timeoutMs);
            if (attempt.reachable) return true;
            reason = attempt.reason;
            return null;
          },
          policy,
          { sleep: this.config.sleep },
        );

        outcomes.push({ service: stack.name, host, port, reachable: result.ok, attempts: result.attempts });
        if (result.ok) {
          logger.info(`${stack.name} reachable at ${host}:${port}`);
        } else {
          logger.warn(`${stack.name} not reachable at ${host}:${port}: ${reason}`);
          this.probeFailures.push({ kind: 'connectivity-probe-failure', service: stack.name, host, port, reason });
        }
      }
    }

    return outcomes;
  }

  getProbeFailures(): readonly ConnectivityProbeFailure[] {
    return this.probeFailures;
  }
}

export interface AccessEntry {
  service: string;
  url: string;
}

const ACCESS_ROUTES: ReadonlyArray<{ stack: string; service: string; port: PortOption; scheme: string }> = [
  { stack: 'nexus', service: 'Registry', port: 'registry_port', scheme: 'http' },
  { stack: 'nginx', service: 'Ingress (HTTP)', port: 'http_port', scheme: 'http' },
  { stack: 'nginx', service: 'Ingress (HTTPS)', port: 'https_port', scheme: 'https' },
  { stack: 'monitoring', service: 'Dashboard', port: 'dashboard_port', scheme: 'http' },
  { stack: 'monitoring', service: 'Metrics', port: 'metrics_port', scheme: 'http' },
];

/** Service URLs for the enabled stacks, for the end-of-run summary. */
export function accessSummary(
  host: string,
  stacks: readonly StackDefinition[],
  ports: Readonly<Record<PortOption, number>>,
): AccessEntry[] {
  const names = new Set(stacks.map(s => s.name));
  return ACCESS_ROUTES
    .filter(route => names.has(route.stack))
    .map(route => ({ service: route.service, url: `${route.scheme}://${host}:${ports[route.port]}` }));
}
