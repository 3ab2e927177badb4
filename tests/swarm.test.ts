import { describe, it, expect } from 'vitest';
import {
  SwarmControlPlane,
  engineInstallSteps,
  isConverged,
  parseReplicas,
  parseSwarmStatus,
  shellQuote,
} from '../src/engine/swarm.js';
import { RemoteExecutor } from '../src/remote/executor.js';
import { FakeCluster, TEST_TOKEN, createMockLogger } from './helpers/fake-cluster.js';

const ACTIVE_WORKER = JSON.stringify({
  NodeID: 'w1',
  NodeAddr: '10.0.1.6',
  LocalNodeState: 'active',
  ControlAvailable: false,
  Error: '',
  RemoteManagers: [{ NodeID: 'm1', Addr: '10.0.1.5:2377' }],
  Nodes: 0,
  Managers: 0,
  Cluster: null,
});

describe('parseSwarmStatus', () => {
  it('reads membership, role and remote managers', () => {
    expect(parseSwarmStatus(ACTIVE_WORKER)).toEqual({
      state: 'active',
      nodeId: 'w1',
      nodeAddr: '10.0.1.6',
      isManager: false,
      remoteManagers: [{ nodeId: 'm1', addr: '10.0.1.5:2377' }],
      clusterId: null,
      autolock: false,
      error: '',
    });
  });

  it('reads the autolock flag from the cluster spec', () => {
    const status = parseSwarmStatus(JSON.stringify({
      NodeID: 'm1',
      NodeAddr: '10.0.1.5',
      LocalNodeState: 'active',
      ControlAvailable: true,
      RemoteManagers: [{ NodeID: 'm1', Addr: '10.0.1.5:2377' }],
      Cluster: { ID: 'c1', Spec: { EncryptionConfig: { AutoLockManagers: true } } },
    }));

    expect(status?.isManager).toBe(true);
    expect(status?.clusterId).toBe('c1');
    expect(status?.autolock).toBe(true);
  });

  it('parses an inactive node with empty fields', () => {
    const status = parseSwarmStatus('{"NodeID":"","NodeAddr":"","LocalNodeState":"inactive","ControlAvailable":false,"Error":"","RemoteManagers":null}');
    expect(status?.state).toBe('inactive');
    expect(status?.remoteManagers).toEqual([]);
  });

  it('skips leading noise before the JSON line', () => {
    expect(parseSwarmStatus(`WARNING: No swap limit support\n${ACTIVE_WORKER}`)?.nodeId).toBe('w1');
  });

  it('returns null for output that is not a swarm document', () => {
    expect(parseSwarmStatus('')).toBeNull();
    expect(parseSwarmStatus('{not json')).toBeNull();
    expect(parseSwarmStatus('{"LocalNodeState":"sleeping"}')).toBeNull();
  });
});

describe('replica parsing', () => {
  it('parses running/desired and ignores trailing detail', () => {
    expect(parseReplicas('2/3')).toEqual({ running: 2, desired: 3 });
    expect(parseReplicas('1/1 (max 1 per node)')).toEqual({ running: 1, desired: 1 });
    expect(parseReplicas('n/a')).toBeNull();
  });

  it('is converged only when k/k with k at least 1', () => {
    expect(isConverged('1/1')).toBe(true);
    expect(isConverged('3/3')).toBe(true);
    expect(isConverged('0/0')).toBe(false);
    expect(isConverged('1/2')).toBe(false);
    expect(isConverged('')).toBe(false);
  });
});

describe('shellQuote / engineInstallSteps', () => {
  it('single-quotes and escapes embedded quotes', () => {
    expect(shellQuote('plain')).toBe("'plain'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });

  it('ends the install by granting the SSH user engine access', () => {
    const steps = engineInstallSteps('ops');
    expect(steps).toHaveLength(7);
    expect(steps[steps.length - 1].command).toBe('sudo usermod -aG docker ops');
  });
});

describe('SwarmControlPlane', () => {
  function setup() {
    const cluster = new FakeCluster(['10.0.1.5', '10.0.1.6']);
    const executor = new RemoteExecutor({ transport: cluster, logger: createMockLogger() });
    return { cluster, executor, plane: new SwarmControlPlane(executor) };
  }

  it('reports a missing engine as null version', async () => {
    const { plane } = setup();
    expect(await plane.engineVersion('10.0.1.5')).toBeNull();
  });

  it('hands back the failed command when the daemon cannot answer', async () => {
    const { cluster, plane } = setup();
    cluster.host('10.0.1.5').engine = 'stopped';

    const status = await plane.swarmStatus('10.0.1.5');
    const daemon = await plane.checkDaemon('10.0.1.5');

    expect(status.value).toBeNull();
    expect(status.result.exitCode).toBe(1);
    expect(status.result.output).toBe('Cannot connect to the Docker daemon');
    expect(daemon.success).toBe(false);
    expect(daemon.description).toBe('Check engine daemon');
  });

  it('initializes a swarm and reads it back', async () => {
    const { cluster, plane } = setup();
    cluster.host('10.0.1.5').engine = 'running';

    const init = await plane.initSwarm('10.0.1.5', '10.0.1.5');
    const status = await plane.swarmStatus('10.0.1.5');

    expect(init.command).toBe("docker swarm init --advertise-addr '10.0.1.5'");
    expect(status.value?.state).toBe('active');
    expect(status.value?.isManager).toBe(true);
    expect((await plane.workerJoinToken('10.0.1.5')).value).toBe(TEST_TOKEN);
  });

  it('never records the join token in a command', async () => {
    const { cluster, executor, plane } = setup();
    cluster.host('10.0.1.5').engine = 'running';
    cluster.host('10.0.1.6').engine = 'running';
    await plane.initSwarm('10.0.1.5', '10.0.1.5');

    const join = await plane.joinSwarm('10.0.1.6', TEST_TOKEN, '10.0.1.5');

    expect(join.success).toBe(true);
    expect(join.command).toBe("docker swarm join --token '***' 10.0.1.5:2377");
    expect(executor.getResults().some(r => r.command.includes(TEST_TOKEN))).toBe(false);
  });

  it('creates an encrypted attachable overlay network', async () => {
    const { cluster, plane } = setup();

    expect(await plane.networkExists('10.0.1.5', 'public')).toBe(false);
    const created = await plane.createOverlayNetwork('10.0.1.5', 'public', true);

    expect(created.command).toBe("docker network create -d overlay --attachable --opt encrypted 'public'");
    expect(cluster.host('10.0.1.5').networks.has('public')).toBe(true);
    expect(await plane.networkExists('10.0.1.5', 'public')).toBe(true);
  });

  it('lists services filtered by name prefix', async () => {
    const { cluster, plane } = setup();
    await plane.deployStack('10.0.1.5', 'nexus', '/opt/swarm-setup/stacks/nexus/docker-compose.yml', '/opt/swarm-setup/stack.env');
    await plane.deployStack('10.0.1.5', 'nginx', '/opt/swarm-setup/stacks/nginx/docker-compose.yml', '/opt/swarm-setup/stack.env');

    const services = await plane.listServices('10.0.1.5', 'nginx_');

    expect(services).toEqual([
      { id: 'id-nginx_proxy', name: 'nginx_proxy', mode: 'replicated', replicas: '1/1', ports: '' },
    ]);
    expect(cluster.commandsOn('10.0.1.5')).toContain("docker service ls --filter 'name=nginx_' --format '{{json .}}'");
  });

  it('sources the environment file before deploying a stack', async () => {
    const { plane } = setup();
    const result = await plane.deployStack('10.0.1.5', 'nexus', '/s/nexus/docker-compose.yml', '/s/stack.env');

    expect(result.command).toBe(
      "set -a && . '/s/stack.env' && set +a && docker stack deploy -c '/s/nexus/docker-compose.yml' 'nexus'",
    );
  });

  it('probes a port from a remote host with a bounded timeout', async () => {
    const { cluster, plane } = setup();
    expect(await plane.portReachable('10.0.1.6', '10.0.1.5', 2377, 5)).toBe(true);
    expect(cluster.commandsOn('10.0.1.6')).toEqual(["timeout 5 bash -c '</dev/tcp/10.0.1.5/2377'"]);

    cluster.host('10.0.1.6').managerPortReachable = false;
    expect(await plane.portReachable('10.0.1.6', '10.0.1.5', 2377, 5)).toBe(false);
  });
});
