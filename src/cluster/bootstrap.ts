import { Logger } from 'winston';
import { Host } from '../config/types.js';
import { EngineInstallError } from '../errors.js';
import { SwarmControlPlane, engineInstallSteps } from '../engine/swarm.js';
import { ExecutionResult } from '../remote/executor.js';
import { NodeStateTracker } from './state.js';

export interface NodeBootstrapperConfig {
  controlPlane: SwarmControlPlane;
  states: NodeStateTracker;
  logger: Logger;
  sshUser: string;
}

export type EngineAction = 'none' | 'started-daemon' | 'installed';

export class NodeBootstrapper {
  private config: NodeBootstrapperConfig;

  constructor(config: NodeBootstrapperConfig) {
    this.config = config;
  }

  /**
   * Bring every host to engine-ready, one at a time in the given order.
   * The first failing host aborts the rest.
   */
  async bootstrapAll(hosts: readonly Host[]): Promise<Map<string, EngineAction>> {
    const actions = new Map<string, EngineAction>();
    for (const host of hosts) {
      actions.set(host.id, await this.ensureEngine(host));
    }
    return actions;
  }

  async ensureEngine(host: Host): Promise<EngineAction> {
    const { controlPlane, states, logger } = this.config;

    const version = await controlPlane.engineVersion(host.id);
    if (version) {
      if ((await controlPlane.checkDaemon(host.id)).success) {
        logger.info(`Engine already present on ${host.id}: ${version}`);
        states.advance(host.id, 'engine-ready');
        return 'none';
      }

      logger.warn(`Engine installed on ${host.id} but the daemon is not reachable, starting it`);
      const start = await controlPlane.startDaemon(host.id);
      if (!start.success) {
        throw new EngineInstallError('Engine daemon did not start', {
          host: host.id,
          operation: start.description,
          exitCode: start.exitCode,
          output: start.output,
        });
      }
      this.requireDaemon(host.id, await controlPlane.checkDaemon(host.id), 'Engine daemon unreachable after start');
      states.advance(host.id, 'engine-ready');
      return 'started-daemon';
    }

    logger.info(`Installing engine on ${host.id} (${host.role})`);
    for (const step of engineInstallSteps(this.config.sshUser)) {
      const result = await controlPlane.run(host.id, step.description, step.command);
      if (!result.success) {
        throw new EngineInstallError('Engine installation failed', {
          host: host.id,
          operation: step.description,
          exitCode: result.exitCode,
          output: result.output,
        });
      }
    }

    this.requireDaemon(host.id, await controlPlane.checkDaemon(host.id), 'Engine daemon unreachable after installation');

    states.advance(host.id, 'engine-ready');
    logger.info(`Engine ready on ${host.id}`);
    return 'installed';
  }

  private requireDaemon(host: string, check: ExecutionResult, summary: string): void {
    if (check.success) return;
    throw new EngineInstallError(summary, {
      host,
      operation: check.description,
      exitCode: check.exitCode,
      output: check.output,
    });
  }
}
