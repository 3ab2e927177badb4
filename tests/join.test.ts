import { describe, it, expect } from 'vitest';
import { JoinCoordinator } from '../src/cluster/join.js';
import { NodeStateTracker } from '../src/cluster/state.js';
import { Host } from '../src/config/types.js';
import { SwarmControlPlane } from '../src/engine/swarm.js';
import {
  ClusterConflictError,
  ClusterSetupError,
  JoinRejectedError,
  JoinTimeoutError,
} from '../src/errors.js';
import { RemoteExecutor } from '../src/remote/executor.js';
import { FakeCluster, TEST_TOKEN, createMockLogger, noSleep } from './helpers/fake-cluster.js';

const MANAGER: Host = { id: '203.0.113.10', role: 'manager' };
const W1: Host = { id: '10.0.1.6', role: 'worker' };
const W2: Host = { id: '10.0.1.7', role: 'worker' };
const ADVERTISE = '10.0.1.5';

function setup(options: { autolock?: boolean } = {}) {
  const ids = [MANAGER.id, W1.id, W2.id];
  const cluster = new FakeCluster(ids);
  for (const id of ids) cluster.host(id).engine = 'running';
  const logger = createMockLogger();
  const states = new NodeStateTracker(ids);
  for (const id of ids) states.advance(id, 'engine-ready');
  const coordinator = new JoinCoordinator({
    controlPlane: new SwarmControlPlane(new RemoteExecutor({ transport: cluster, logger })),
    states,
    logger,
    advertiseAddr: ADVERTISE,
    autolock: options.autolock ?? true,
    networkName: 'public',
    networkEncrypted: true,
    sleep: noSleep,
  });
  return { cluster, states, coordinator, logger };
}

const isMutation = (c: string) =>
  /swarm init|autolock|network create|swarm leave|swarm join --token/.test(c);

describe('JoinCoordinator manager setup', () => {
  it('initializes the swarm, enables autolock and creates the network', async () => {
    const { cluster, states, coordinator } = setup();

    const outcome = await coordinator.setupManager(MANAGER);

    expect(outcome).toEqual({
      nodeId: 'node-203.0.113.10',
      initialized: true,
      autolockEnabled: true,
      networkCreated: true,
    });
    expect(cluster.commandsOn(MANAGER.id).filter(isMutation)).toEqual([
      "docker swarm init --advertise-addr '10.0.1.5'",
      'docker swarm update --autolock=true > /dev/null',
      "docker network create -d overlay --attachable --opt encrypted 'public'",
    ]);
    expect(states.get(MANAGER.id)).toBe('cluster-member');
  });

  it('issues no mutations against an already configured manager', async () => {
    const first = setup();
    await first.coordinator.setupManager(MANAGER);
    first.cluster.resetLog();

    const again = new JoinCoordinator({
      controlPlane: new SwarmControlPlane(new RemoteExecutor({ transport: first.cluster, logger: createMockLogger() })),
      states: new NodeStateTracker([MANAGER.id]),
      logger: createMockLogger(),
      advertiseAddr: ADVERTISE,
      autolock: true,
      networkName: 'public',
      networkEncrypted: true,
    });
    const outcome = await again.setupManager(MANAGER);

    expect(outcome.initialized).toBe(false);
    expect(outcome.networkCreated).toBe(false);
    expect(first.cluster.commandsOn(MANAGER.id).filter(isMutation)).toEqual([]);
  });

  it('skips autolock when disabled', async () => {
    const { cluster, coordinator } = setup({ autolock: false });
    await coordinator.setupManager(MANAGER);
    expect(cluster.commandsOn(MANAGER.id).some(c => c.includes('autolock'))).toBe(false);
  });

  it('treats an autolock failure as a warning', async () => {
    const { cluster, coordinator, logger } = setup();
    cluster.failOn(MANAGER.id, /autolock/, { exitCode: 1, output: 'Error: rpc error' });

    const outcome = await coordinator.setupManager(MANAGER);

    expect(outcome.autolockEnabled).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith('Failed to enable swarm autolock on 203.0.113.10 (exit code: 1)');
  });

  it('refuses a manager host that is only a worker of some swarm', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(MANAGER.id).swarm = {
      state: 'active', nodeId: 'x', nodeAddr: '10.9.9.1', isManager: false,
      managers: [{ NodeID: 'other', Addr: '10.9.9.9:2377' }], clusterId: '', autolock: false, error: '',
    };

    const error = await coordinator.setupManager(MANAGER).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClusterConflictError);
    if (!(error instanceof ClusterConflictError)) return;
    expect(error.exitCode).toBe(6);
  });

  it('refuses a locked manager', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(MANAGER.id).swarm.state = 'locked';
    await expect(coordinator.setupManager(MANAGER)).rejects.toThrow(/locked/);
  });

  it('fails the cluster stage when the network cannot be created', async () => {
    const { cluster, coordinator } = setup();
    cluster.failOn(MANAGER.id, /network create/, { exitCode: 1, output: 'Error response from daemon: conflict' });

    await expect(coordinator.setupManager(MANAGER)).rejects.toBeInstanceOf(ClusterSetupError);
  });
});

describe('JoinCoordinator worker join', () => {
  it('fetches the token once for any number of workers', async () => {
    const { cluster, states, coordinator } = setup();

    const actions = await coordinator.formCluster(MANAGER, [W1, W2]);

    expect([...actions.entries()]).toEqual([[W1.id, 'joined'], [W2.id, 'joined']]);
    expect(coordinator.tokenFetchCount).toBe(1);
    expect(cluster.commandsOn(MANAGER.id).filter(c => c.includes('join-token'))).toHaveLength(1);
    expect(states.allAtLeast('cluster-member')).toBe(true);
  });

  it('fetches the token once even with zero workers', async () => {
    const { coordinator } = setup();
    await coordinator.formCluster(MANAGER, []);
    expect(coordinator.tokenFetchCount).toBe(1);
  });

  it('refuses to fetch the token before the manager is confirmed', async () => {
    const { coordinator } = setup();
    await expect(coordinator.fetchJoinToken(MANAGER)).rejects.toThrow('Manager must be confirmed before fetching the join token');
  });

  it('joins each worker with the manager advertise address', async () => {
    const { cluster, coordinator } = setup();
    await coordinator.formCluster(MANAGER, [W1]);

    expect(cluster.commandsOn(W1.id).filter(isMutation)).toEqual([`docker swarm join --token '${TEST_TOKEN}' 10.0.1.5:2377`]);
  });

  it('leaves a foreign swarm before joining', async () => {
    const { cluster, coordinator, logger } = setup();
    cluster.host(W1.id).swarm = {
      state: 'active', nodeId: 'w-old', nodeAddr: W1.id, isManager: false,
      managers: [{ NodeID: 'foreign', Addr: '10.9.9.9:2377' }], clusterId: '', autolock: false, error: '',
    };

    const actions = await coordinator.formCluster(MANAGER, [W1]);

    expect(actions.get(W1.id)).toBe('rejoined');
    expect(cluster.commandsOn(W1.id).filter(isMutation)).toEqual([
      'docker swarm leave',
      `docker swarm join --token '${TEST_TOKEN}' 10.0.1.5:2377`,
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      '10.0.1.6 is joined to a different manager (10.9.9.9:2377); leaving before joining 10.0.1.5:2377',
    );
  });

  it('treats a manager at the same address but with another node ID as foreign', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(W1.id).swarm = {
      state: 'active', nodeId: 'w-old', nodeAddr: W1.id, isManager: false,
      managers: [{ NodeID: 'rebuilt-manager', Addr: '10.0.1.5:2377' }], clusterId: '', autolock: false, error: '',
    };

    await coordinator.formCluster(MANAGER, [W1]);

    expect(cluster.commandsOn(W1.id)).toContain('docker swarm leave');
  });

  it('does nothing for a worker already joined to this manager', async () => {
    const { cluster, coordinator } = setup();
    await coordinator.formCluster(MANAGER, [W1]);
    cluster.resetLog();

    expect(await coordinator.joinWorker(W1)).toBe('already-joined');
    expect(cluster.commandsOn(W1.id).filter(isMutation)).toEqual([]);
  });

  it('refuses a worker that manages another swarm', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(W1.id).swarm = {
      state: 'active', nodeId: 'other-mgr', nodeAddr: W1.id, isManager: true,
      managers: [{ NodeID: 'other-mgr', Addr: '10.0.1.6:2377' }], clusterId: 'c2', autolock: false, error: '',
    };

    const error = await coordinator.formCluster(MANAGER, [W1]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClusterConflictError);
    if (!(error instanceof ClusterConflictError)) return;
    expect(error.exitCode).toBe(7);
    expect(cluster.commandsOn(W1.id)).not.toContain('docker swarm leave');
  });

  it('reports an unreachable manager port as a timeout, not a rejection', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(W1.id).managerPortReachable = false;

    const error = await coordinator.formCluster(MANAGER, [W1]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JoinTimeoutError);
    if (!(error instanceof JoinTimeoutError)) return;
    expect(error.message).toMatch(/^Manager 10\.0\.1\.5:2377 unreachable from worker after 5 attempts/);
    expect(cluster.commandsOn(W1.id).filter(c => c.startsWith('timeout '))).toHaveLength(5);
    expect(cluster.commandsOn(W1.id).some(c => c.startsWith('docker swarm join'))).toBe(false);
  });

  it('reports a refused join as a rejection naming the token', async () => {
    const { cluster, coordinator } = setup();
    cluster.failOn(W1.id, /^docker swarm join /, { exitCode: 1, output: 'Error response from daemon: invalid join token' });

    const error = await coordinator.formCluster(MANAGER, [W1]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(JoinRejectedError);
    if (!(error instanceof JoinRejectedError)) return;
    expect(error.message).toContain('join token');
    expect(error.message).not.toContain(TEST_TOKEN);
    expect(error.exitCode).toBe(7);
  });

  it('fails when membership is not active after a successful join command', async () => {
    const { cluster, coordinator } = setup();
    cluster.failOn(W1.id, /^docker swarm join /, { exitCode: 0, output: 'This node joined a swarm as a worker.' });

    await expect(coordinator.formCluster(MANAGER, [W1])).rejects.toThrow(
      /^Join command succeeded but swarm membership is not active/,
    );
  });

  it('carries the exit code and output into a failed token fetch', async () => {
    const { cluster, coordinator } = setup();
    cluster.failOn(MANAGER.id, /join-token/, { exitCode: 1, output: 'Error response from daemon: rpc error: manager quorum lost' });

    const error = await coordinator.formCluster(MANAGER, [W1]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClusterSetupError);
    if (!(error instanceof ClusterSetupError)) return;
    expect(error.exitCode).toBe(6);
    expect(error.message).toBe(
      'Failed to fetch worker join token | host=203.0.113.10 | operation="Fetch worker join token" | exit code 1\n' +
      'Error response from daemon: rpc error: manager quorum lost',
    );
  });

  it('masks anything token-shaped in a failed token fetch', async () => {
    const { cluster, coordinator } = setup();
    cluster.failOn(MANAGER.id, /join-token/, { exitCode: 2, output: 'SWMTKN-1-partial-output\nwrite error' });

    await expect(coordinator.formCluster(MANAGER, [])).rejects.toThrow(
      'Failed to fetch worker join token | host=203.0.113.10 | operation="Fetch worker join token" | exit code 2\n***\nwrite error',
    );
  });

  it('stops a worker whose leave from a foreign swarm fails', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(W1.id).swarm = {
      state: 'active', nodeId: 'w-old', nodeAddr: W1.id, isManager: false,
      managers: [{ NodeID: 'foreign', Addr: '10.9.9.9:2377' }], clusterId: '', autolock: false, error: '',
    };
    cluster.failOn(W1.id, /^docker swarm leave$/, { exitCode: 1, output: 'Error response from daemon: context deadline exceeded' });

    const error = await coordinator.formCluster(MANAGER, [W1]).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ClusterConflictError);
    if (!(error instanceof ClusterConflictError)) return;
    expect(error.stage).toBe('join');
    expect(error.exitCode).toBe(7);
    expect(error.message).toBe(
      'Failed to leave current swarm | host=10.0.1.6 | operation="Leave current swarm" | exit code 1\n' +
      'Error response from daemon: context deadline exceeded',
    );
    expect(cluster.commandsOn(W1.id).some(c => c.startsWith('docker swarm join --token'))).toBe(false);
  });

  it('refuses to touch a worker before the token is fetched', async () => {
    const { cluster, coordinator } = setup();
    cluster.host(W1.id).swarm = {
      state: 'active', nodeId: 'w-old', nodeAddr: W1.id, isManager: false,
      managers: [{ NodeID: 'foreign', Addr: '10.9.9.9:2377' }], clusterId: '', autolock: false, error: '',
    };

    await expect(coordinator.joinWorker(W1)).rejects.toThrow('Join token must be fetched before joining workers');
    expect(cluster.commandsOn(W1.id)).toEqual([]);
  });

  it('reports an unreadable worker swarm status with the engine output', async () => {
    const { cluster, coordinator } = setup();
    cluster.failOn(W1.id, /^docker info --format '\{\{json \.Swarm\}\}'$/, { exitCode: 1, output: 'permission denied' });

    await expect(coordinator.formCluster(MANAGER, [W1])).rejects.toThrow(
      'Cannot read swarm status from the engine | host=10.0.1.6 | operation="Query swarm status" | exit code 1\npermission denied',
    );
  });

  it('reports each worker before joining it', async () => {
    const { coordinator } = setup();
    const seen: string[] = [];

    await coordinator.formCluster(MANAGER, [W1, W2], worker => seen.push(worker.id));

    expect(seen).toEqual([W1.id, W2.id]);
  });
});
