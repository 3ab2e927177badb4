import { EventEmitter } from 'events';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Logger } from 'winston';
import { NodeBootstrapper } from './cluster/bootstrap.js';
import { JoinCoordinator } from './cluster/join.js';
import { NodeStateTracker, StateChange } from './cluster/state.js';
import { Configuration } from './config/schema.js';
import { ClusterSettings, allHosts } from './config/types.js';
import { validate } from './config/validator.js';
import { StackDeployer, StackOutcome, enabledStacks } from './deploy/stacks.js';
import { SwarmControlPlane, shellQuote } from './engine/swarm.js';
import {
  BootstrapError,
  ConfigurationError,
  EngineInstallError,
  HostPreparationError,
  Stage,
  TransportError,
  errorMessage,
} from './errors.js';
import { RemoteExecutor } from './remote/executor.js';
import { CONNECTION_LOST_EXIT_CODE, RemoteTransport } from './remote/transport.js';
import { PortProbe } from './report/probe.js';
import {
  AccessEntry,
  ClusterView,
  ProbeOutcome,
  RunReport,
  VerificationReporter,
  accessSummary,
  buildReport,
} from './report/reporter.js';
import { RetryPolicy, Sleeper } from './util/retry.js';

export type Phase =
  | 'prerequisites'
  | 'validate'
  | 'connect'
  | 'prepare'
  | 'install'
  | 'cluster'
  | 'join'
  | 'data'
  | 'deploy'
  | 'verify'
  | 'complete'
  | 'aborted';

export interface Progress {
  phase: Phase;
  host?: string;
  message: string;
}

export interface OrchestratorConfig {
  config: Configuration;
  logger: Logger;
  homeDir: string;
  logDir: string;
  /** Local directory holding one sub-directory of compose assets per stack. */
  stacksDir: string;
  createTransport: (ssh: ClusterSettings['ssh']) => RemoteTransport;
  checkPrerequisites?: () => void;
  probe?: PortProbe;
  sleep?: Sleeper;
  readiness?: RetryPolicy;
  reachability?: RetryPolicy;
  probePolicy?: RetryPolicy;
  stagingRoot?: string;
}

export const DATA_SUBDIRS = ['nexus-data', 'nginx/conf.d', 'nginx/certs', 'prometheus/data', 'grafana'] as const;

/**
 * Stack environment file, sourced on the manager before `stack deploy`.
 */
export function renderStackEnv(settings: ClusterSettings): string {
  const vars: Record<string, string> = {
    REMOTE_DATA_DIR: settings.remote.dataDir,
    OVERLAY_NETWORK: settings.swarm.networkName,
    REGISTRY_PORT: String(settings.ports.registry_port),
    HTTP_PORT: String(settings.ports.http_port),
    HTTPS_PORT: String(settings.ports.https_port),
    DASHBOARD_PORT: String(settings.ports.dashboard_port),
    METRICS_PORT: String(settings.ports.metrics_port),
    DASHBOARD_ADMIN_USER: settings.dashboard.adminUser,
    DASHBOARD_ADMIN_PASSWORD: settings.dashboard.adminPassword,
  };
  return Object.entries(vars).map(([key, value]) => `${key}=${shellQuote(value)}`).join('\n') + '\n';
}

const PHASE_STAGE: Partial<Record<Phase, Stage>> = {
  prerequisites: 'prerequisites',
  validate: 'configuration',
  connect: 'transport',
  prepare: 'prepare',
  install: 'install',
  cluster: 'cluster',
  join: 'join',
  data: 'prepare',
  deploy: 'deploy',
};

/**
 * Drives a full bootstrap run: validate, connect, prepare, install, form
 * the cluster, deploy stacks, verify. The first fatal error stops the run
 * and becomes the report's fatal entry. Emits 'progress' for every phase.
 */
export class Orchestrator extends EventEmitter {
  private config: OrchestratorConfig;
  private phase: Phase = 'prerequisites';
  private executor: RemoteExecutor | null = null;
  private stagingDir: string | null = null;

  constructor(config: OrchestratorConfig) {
    super();
    this.config = config;
  }

  async run(): Promise<RunReport> {
    const startedAt = Date.now();
    const stacks: StackOutcome[] = [];
    let reporter: VerificationReporter | null = null;
    let deployer: StackDeployer | null = null;
    let probes: ProbeOutcome[] = [];
    let cluster: ClusterView | null = null;
    let access: AccessEntry[] = [];
    let fatal: BootstrapError | null = null;

    try {
      const settings = this.settings();
      const controlPlane = await this.connect(settings, allHosts(settings).map(h => h.id));
      const states = new NodeStateTracker(allHosts(settings).map(h => h.id));
      states.on('stateChange', (change: StateChange) => {
        this.config.logger.debug(`${change.host}: ${change.from} -> ${change.to}`);
      });

      this.progress('prepare', 'Preparing remote directories');
      await this.prepareHosts(settings);

      this.progress('install', 'Ensuring container engine on every host');
      const bootstrapper = new NodeBootstrapper({
        controlPlane, states, logger: this.config.logger, sshUser: settings.ssh.user,
      });
      await bootstrapper.bootstrapAll(allHosts(settings));
      if (!states.allAtLeast('engine-ready')) {
        throw new EngineInstallError('Not every host reached engine-ready', { operation: 'Check bootstrap state' });
      }

      const coordinator = new JoinCoordinator({
        controlPlane,
        states,
        logger: this.config.logger,
        advertiseAddr: settings.advertiseAddr,
        autolock: settings.swarm.autolock,
        networkName: settings.swarm.networkName,
        networkEncrypted: settings.swarm.networkEncrypted,
        reachability: this.config.reachability,
        sleep: this.config.sleep,
      });

      this.progress('cluster', `Setting up manager ${settings.manager.id}`);
      await coordinator.formCluster(settings.manager, settings.workers, worker => {
        this.progress('join', `Joining worker ${worker.id}`, worker.id);
      });

      this.progress('data', 'Preparing data directories on the manager');
      await this.prepareDataDirs(settings);
      await this.listClusterNodes(controlPlane, settings.manager.id);

      const enabled = enabledStacks(settings.stacks);
      this.progress('deploy', `Deploying ${enabled.length} stack(s)`);
      deployer = new StackDeployer({
        controlPlane,
        logger: this.config.logger,
        managerHost: settings.manager.id,
        setupDir: settings.remote.setupDir,
        readiness: this.config.readiness,
        sleep: this.config.sleep,
      });
      stacks.push(...await deployer.deployAll(enabled));

      this.progress('verify', 'Verifying cluster');
      reporter = this.createReporter(controlPlane);
      cluster = await reporter.inspectCluster(settings.manager.id);
      probes = await reporter.probeStacks(settings.manager.id, enabled, settings.ports);
      access = accessSummary(settings.manager.id, enabled, settings.ports);

      this.progress('complete', 'Bootstrap complete');
    } catch (error) {
      fatal = this.toBootstrapError(error);
      this.config.logger.error(fatal.message);
      this.progress('aborted', `Aborted during ${fatal.stage}`);
    } finally {
      this.cleanup();
    }

    return buildReport({
      results: this.executor?.getResults() ?? [],
      fatal,
      stacks,
      convergenceTimeouts: deployer?.getTimeouts() ?? [],
      probes,
      probeFailures: reporter?.getProbeFailures() ?? [],
      cluster,
      access,
      startedAt,
      logDir: this.config.logDir,
    });
  }

  /**
   * Verification only: connect to the manager, list the cluster and probe
   * the enabled stacks' ports.
   */
  async verify(): Promise<RunReport> {
    const startedAt = Date.now();
    let reporter: VerificationReporter | null = null;
    let probes: ProbeOutcome[] = [];
    let cluster: ClusterView | null = null;
    let fatal: BootstrapError | null = null;

    try {
      const settings = this.settings();
      const controlPlane = await this.connect(settings, [settings.manager.id]);

      this.progress('verify', 'Verifying cluster');
      reporter = this.createReporter(controlPlane);
      cluster = await reporter.inspectCluster(settings.manager.id);
      probes = await reporter.probeStacks(settings.manager.id, enabledStacks(settings.stacks), settings.ports);
      this.progress('complete', 'Verification complete');
    } catch (error) {
      fatal = this.toBootstrapError(error);
      this.config.logger.error(fatal.message);
      this.progress('aborted', `Aborted during ${fatal.stage}`);
    }

    return buildReport({
      results: this.executor?.getResults() ?? [],
      fatal,
      probes,
      probeFailures: reporter?.getProbeFailures() ?? [],
      cluster,
      startedAt,
      logDir: this.config.logDir,
    });
  }

  /** Remove the run's local staging directory. Safe to call more than once. */
  cleanup(): void {
    if (!this.stagingDir) return;
    fs.rmSync(this.stagingDir, { recursive: true, force: true });
    this.config.logger.debug(`Removed staging directory ${this.stagingDir}`);
    this.stagingDir = null;
  }

  private settings(): ClusterSettings {
    if (this.config.checkPrerequisites) {
      this.progress('prerequisites', 'Checking local prerequisites');
      this.config.checkPrerequisites();
    }

    this.progress('validate', 'Validating configuration');
    const result = validate(this.config.config, { homeDir: this.config.homeDir });
    if (!result.ok) {
      for (const fieldError of result.errors) {
        this.config.logger.error(`${fieldError.field}: ${fieldError.message}`);
      }
      throw new ConfigurationError(result.errors);
    }
    return result.settings;
  }

  private async connect(settings: ClusterSettings, hosts: readonly string[]): Promise<SwarmControlPlane> {
    const transport = this.config.createTransport(settings.ssh);
    this.executor = new RemoteExecutor({ transport, logger: this.config.logger });

    for (const host of hosts) {
      this.progress('connect', `Connecting to ${host}`, host);
      await transport.connect(host);
    }
    return new SwarmControlPlane(this.executor);
  }

  private createReporter(controlPlane: SwarmControlPlane): VerificationReporter {
    return new VerificationReporter({
      controlPlane,
      logger: this.config.logger,
      probe: this.config.probe,
      probePolicy: this.config.probePolicy,
      sleep: this.config.sleep,
    });
  }

  private async prepareHosts(settings: ClusterSettings): Promise<void> {
    const executor = this.requireExecutor();
    const { setupDir, dataDir } = settings.remote;
    const remoteStacks = path.posix.join(setupDir, 'stacks');

    for (const host of allHosts(settings)) {
      this.progress('prepare', `Preparing ${host.id}`, host.id);
      const dirs = `${shellQuote(setupDir)} ${shellQuote(dataDir)}`;
      const mkdir = await executor.execute(
        host.id,
        'Create remote directories',
        `sudo mkdir -p ${dirs} && sudo chown -R $(id -u):$(id -g) ${dirs} && rm -rf ${shellQuote(remoteStacks)}`,
      );
      if (!mkdir.success) {
        throw new HostPreparationError('Failed to create remote directories', {
          host: host.id,
          operation: mkdir.description,
          exitCode: mkdir.exitCode,
          output: mkdir.output,
        });
      }

      await this.upload(host.id, this.config.stacksDir, remoteStacks, 'Upload stack assets');
    }

    const envFile = path.join(this.staging(), 'stack.env');
    fs.writeFileSync(envFile, renderStackEnv(settings), { mode: 0o600 });
    const remoteEnv = path.posix.join(setupDir, 'stack.env');
    await this.upload(settings.manager.id, envFile, remoteEnv, 'Upload stack environment file');

    const chmod = await executor.execute(settings.manager.id, 'Restrict stack environment file', `chmod 600 ${shellQuote(remoteEnv)}`);
    if (!chmod.success) {
      throw new HostPreparationError('Failed to restrict stack environment file', {
        host: settings.manager.id,
        operation: chmod.description,
        exitCode: chmod.exitCode,
        output: chmod.output,
      });
    }
  }

  private async prepareDataDirs(settings: ClusterSettings): Promise<void> {
    const executor = this.requireExecutor();
    const { dataDir, setupDir } = settings.remote;
    const dirs = DATA_SUBDIRS.map(d => shellQuote(path.posix.join(dataDir, d))).join(' ');
    const prometheusConfig = shellQuote(path.posix.join(dataDir, 'prometheus', 'prometheus.yml'));
    const bundledConfig = shellQuote(path.posix.join(setupDir, 'stacks', 'monitoring', 'prometheus.yml'));

    const result = await executor.execute(
      settings.manager.id,
      'Create data directories',
      `mkdir -p ${dirs} && { [ -f ${prometheusConfig} ] || cp ${bundledConfig} ${prometheusConfig}; }`,
    );
    if (!result.success) {
      throw new HostPreparationError('Failed to create data directories', {
        host: settings.manager.id,
        operation: result.description,
        exitCode: result.exitCode,
        output: result.output,
      });
    }
  }

  private async listClusterNodes(controlPlane: SwarmControlPlane, managerHost: string): Promise<void> {
    const nodes = await controlPlane.listNodes(managerHost);
    if (!nodes) return;
    const names = nodes.map(n => `${n.hostname} (${n.managerStatus || 'worker'}, ${n.status})`);
    this.config.logger.info(`Cluster has ${nodes.length} node(s): ${names.join(', ')}`);
  }

  private async upload(host: string, localPath: string, remotePath: string, operation: string): Promise<void> {
    const transport = this.requireExecutor().transport;
    this.config.logger.info(`Executing on ${host}: ${operation}`);
    const result = await transport.copy(host, localPath, remotePath);
    if (result.exitCode === CONNECTION_LOST_EXIT_CODE) {
      throw new TransportError('Lost SSH connection to host', {
        host,
        operation,
        exitCode: result.exitCode,
        output: result.output,
      });
    }
    if (result.exitCode !== 0) {
      throw new HostPreparationError(`Failed to copy ${path.basename(localPath)}`, {
        host,
        operation,
        exitCode: result.exitCode,
        output: result.output,
      });
    }
  }

  private staging(): string {
    if (!this.stagingDir) {
      this.stagingDir = fs.mkdtempSync(path.join(this.config.stagingRoot ?? os.tmpdir(), 'swarmup-'));
    }
    return this.stagingDir;
  }

  private requireExecutor(): RemoteExecutor {
    if (!this.executor) {
      throw new Error('Remote executor used before hosts were connected');
    }
    return this.executor;
  }

  private toBootstrapError(error: unknown): BootstrapError {
    if (error instanceof BootstrapError) return error;
    const stage = PHASE_STAGE[this.phase] ?? 'deploy';
    return new BootstrapError(stage, `Unexpected error: ${errorMessage(error)}`, { operation: this.phase });
  }

  private progress(phase: Phase, message: string, host?: string): void {
    this.phase = phase;
    const event: Progress = { phase, host, message };
    if (!host) this.config.logger.info(`==> ${message}`);
    this.emit('progress', event);
  }
}
