import { Logger } from 'winston';
import { Host } from '../config/types.js';
import {
  BootstrapError,
  ClusterConflictError,
  ClusterSetupError,
  JoinRejectedError,
  JoinTimeoutError,
} from '../errors.js';
import { SWARM_CONTROL_PORT, SwarmControlPlane, SwarmStatus } from '../engine/swarm.js';
import { redactText } from '../remote/executor.js';
import { RetryPolicy, Sleeper, pollUntil } from '../util/retry.js';
import { NodeStateTracker } from './state.js';
import { JoinToken } from './token.js';

export interface JoinCoordinatorConfig {
  controlPlane: SwarmControlPlane;
  states: NodeStateTracker;
  logger: Logger;
  advertiseAddr: string;
  autolock: boolean;
  networkName: string;
  networkEncrypted: boolean;
  reachability?: RetryPolicy;
  probeTimeoutSec?: number;
  sleep?: Sleeper;
}

export interface ManagerOutcome {
  nodeId: string;
  initialized: boolean;
  autolockEnabled: boolean;
  networkCreated: boolean;
}

export type WorkerAction = 'already-joined' | 'joined' | 'rejoined';

const DEFAULT_REACHABILITY: RetryPolicy = { attempts: 5, delayMs: 2000 };
const TOKEN_PATTERN = /SWMTKN-[\w-]+/g;

export class JoinCoordinator {
  private config: JoinCoordinatorConfig;
  private token = new JoinToken();
  private tokenFetches = 0;
  private managerNodeId: string | null = null;

  constructor(config: JoinCoordinatorConfig) {
    this.config = config;
  }

  get managerEndpoint(): string {
    return `${this.config.advertiseAddr}:${SWARM_CONTROL_PORT}`;
  }

  get tokenFetchCount(): number {
    return this.tokenFetches;
  }

  /**
   * Manager, then token, then each worker in order. `onWorker` runs before
   * each worker's join.
   */
  async formCluster(
    manager: Host,
    workers: readonly Host[],
    onWorker?: (worker: Host) => void,
  ): Promise<Map<string, WorkerAction>> {
    await this.setupManager(manager);
    await this.fetchJoinToken(manager);

    const actions = new Map<string, WorkerAction>();
    for (const worker of workers) {
      onWorker?.(worker);
      actions.set(worker.id, await this.joinWorker(worker));
    }
    return actions;
  }

  async setupManager(manager: Host): Promise<ManagerOutcome> {
    const { controlPlane, states, logger } = this.config;
    const host = manager.id;

    let status = await this.requireStatus(host, 'cluster');
    let initialized = false;

    if (status.state === 'locked') {
      throw new ClusterConflictError('cluster', 'Manager swarm is locked; run "docker swarm unlock" on it first', {
        host,
        operation: 'Query swarm status',
      });
    }

    if (status.state === 'active') {
      if (!status.isManager) {
        throw new ClusterConflictError('cluster', 'Host is a swarm member without the manager role', {
          host,
          operation: 'Query swarm status',
        });
      }
      logger.info(`${host} is already a swarm manager`);
      if (status.nodeAddr && status.nodeAddr !== this.config.advertiseAddr) {
        logger.warn(`Manager advertises ${status.nodeAddr}, configured advertise address is ${this.config.advertiseAddr}`);
      }
    } else if (status.state === 'inactive') {
      logger.info(`Initializing swarm on ${host} advertising ${this.config.advertiseAddr}`);
      const init = await controlPlane.initSwarm(host, this.config.advertiseAddr);
      if (!init.success) {
        throw new ClusterSetupError('Swarm initialization failed', {
          host,
          operation: init.description,
          exitCode: init.exitCode,
          output: init.output,
        });
      }
      status = await this.requireStatus(host, 'cluster');
      if (status.state !== 'active' || !status.isManager) {
        throw new ClusterSetupError(`Swarm initialized but node reports state "${status.state}"`, {
          host,
          operation: init.description,
          exitCode: init.exitCode,
          output: init.output,
        });
      }
      initialized = true;
    } else {
      throw new ClusterConflictError('cluster', `Manager swarm state is "${status.state}"${status.error ? `: ${status.error}` : ''}`, {
        host,
        operation: 'Query swarm status',
      });
    }

    states.advance(host, 'cluster-member');
    this.managerNodeId = status.nodeId;

    let autolockEnabled = false;
    if (this.config.autolock && !status.autolock) {
      const result = await controlPlane.enableAutolock(host);
      if (result.success) {
        autolockEnabled = true;
        logger.info('Swarm autolock enabled; read the unlock key with "docker swarm unlock-key" on the manager and store it safely');
      } else {
        logger.warn(`Failed to enable swarm autolock on ${host} (exit code: ${result.exitCode})`);
      }
    }

    const networkCreated = await this.ensureNetwork(host);

    return { nodeId: status.nodeId, initialized, autolockEnabled, networkCreated };
  }

  /** Fetches at most once per run; later calls return the same token. */
  async fetchJoinToken(manager: Host): Promise<JoinToken> {
    if (this.token.isSet) return this.token;
    if (this.managerNodeId === null) {
      throw new Error('Manager must be confirmed before fetching the join token');
    }

    this.tokenFetches++;
    const { value, result } = await this.config.controlPlane.workerJoinToken(manager.id);
    if (!value) {
      throw new ClusterSetupError('Failed to fetch worker join token', {
        host: manager.id,
        operation: result.description,
        exitCode: result.exitCode,
        output: redactText(result.output, result.output.match(TOKEN_PATTERN) ?? []),
      });
    }
    this.token.set(value);
    this.config.logger.debug(`Worker join token obtained: ${this.token.masked()}`);
    return this.token;
  }

  async joinWorker(worker: Host): Promise<WorkerAction> {
    const { controlPlane, states, logger } = this.config;
    const host = worker.id;
    if (!this.token.isSet) {
      throw new Error('Join token must be fetched before joining workers');
    }
    const status = await this.requireStatus(host, 'join');
    let left = false;

    if (status.state === 'active') {
      states.advance(host, 'cluster-member');

      if (status.isManager) {
        throw new ClusterConflictError('join', 'Worker host is a manager of another swarm; remove it from that swarm manually', {
          host,
          operation: 'Query swarm status',
        });
      }

      if (this.isJoinedToManager(status)) {
        logger.info(`${host} is already joined to ${this.managerEndpoint}`);
        return 'already-joined';
      }

      const current = status.remoteManagers.map(m => m.addr).join(', ') || 'unknown';
      logger.warn(`${host} is joined to a different manager (${current}); leaving before joining ${this.managerEndpoint}`);
    }

    if (status.state !== 'inactive') {
      const leave = await controlPlane.leaveSwarm(host);
      if (!leave.success) {
        throw new ClusterConflictError('join', 'Failed to leave current swarm', {
          host,
          operation: leave.description,
          exitCode: leave.exitCode,
          output: leave.output,
        });
      }
      states.reset(host);
      left = true;
    }

    await this.waitForManager(host);

    const token = this.token.reveal();
    logger.info(`Joining ${host} to ${this.managerEndpoint} with token ${this.token.masked()}`);
    const join = await controlPlane.joinSwarm(host, token, this.config.advertiseAddr);
    if (!join.success) {
      throw new JoinRejectedError('Join rejected by the manager; check that the worker join token is valid', {
        host,
        operation: join.description,
        exitCode: join.exitCode,
        output: join.output,
      });
    }

    const after = await this.requireStatus(host, 'join');
    if (after.state !== 'active') {
      throw new JoinRejectedError('Join command succeeded but swarm membership is not active', {
        host,
        operation: join.description,
        exitCode: join.exitCode,
        output: `LocalNodeState=${after.state} ${after.error}`,
      });
    }

    states.advance(host, 'cluster-member');
    return left ? 'rejoined' : 'joined';
  }

  private isJoinedToManager(status: SwarmStatus): boolean {
    return status.remoteManagers.some(m =>
      m.addr === this.managerEndpoint && (this.managerNodeId === null || m.nodeId === this.managerNodeId)
    );
  }

  private async waitForManager(host: string): Promise<void> {
    const { controlPlane, logger } = this.config;
    const policy = this.config.reachability ?? DEFAULT_REACHABILITY;
    const timeoutSec = this.config.probeTimeoutSec ?? 5;

    const result = await pollUntil(
      async () => (await controlPlane.portReachable(host, this.config.advertiseAddr, SWARM_CONTROL_PORT, timeoutSec)) ? true : null,
      policy,
      {
        sleep: this.config.sleep,
        onRetry: (attempt) => logger.debug(`Manager port not reachable from ${host} (attempt ${attempt}/${policy.attempts})`),
      },
    );

    if (!result.ok) {
      throw new JoinTimeoutError(
        `Manager ${this.managerEndpoint} unreachable from worker after ${result.attempts} attempts; check that TCP ${SWARM_CONTROL_PORT} is open`,
        { host, operation: `Probe ${this.managerEndpoint}` },
      );
    }
  }

  private async ensureNetwork(host: string): Promise<boolean> {
    const { controlPlane, logger, networkName, networkEncrypted } = this.config;

    if (await controlPlane.networkExists(host, networkName)) {
      logger.info(`Overlay network '${networkName}' already exists`);
      return false;
    }

    const result = await controlPlane.createOverlayNetwork(host, networkName, networkEncrypted);
    if (!result.success) {
      throw new ClusterSetupError(`Failed to create overlay network '${networkName}'`, {
        host,
        operation: result.description,
        exitCode: result.exitCode,
        output: result.output,
      });
    }
    return true;
  }

  private async requireStatus(host: string, stage: 'cluster' | 'join'): Promise<SwarmStatus> {
    const { value, result } = await this.config.controlPlane.swarmStatus(host);
    if (!value) {
      throw new BootstrapError(stage, 'Cannot read swarm status from the engine', {
        host,
        operation: result.description,
        exitCode: result.exitCode,
        output: result.output,
      });
    }
    return value;
  }
}
