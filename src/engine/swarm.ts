import { z } from 'zod';
import { ExecuteOptions, ExecutionResult, FailurePolicy, RemoteExecutor } from '../remote/executor.js';
import {
  LocalNodeState,
  NodeRowSchema,
  ServiceRowSchema,
  SwarmInfoSchema,
} from './schemas.js';

export const SWARM_CONTROL_PORT = 2377;

export interface RemoteManager {
  nodeId: string;
  addr: string;
}

export interface SwarmStatus {
  state: LocalNodeState;
  nodeId: string;
  nodeAddr: string;
  isManager: boolean;
  remoteManagers: RemoteManager[];
  clusterId: string | null;
  autolock: boolean;
  error: string;
}

export interface ServiceStatus {
  id: string;
  name: string;
  mode: string;
  replicas: string;
  ports: string;
}

export interface NodeStatus {
  id: string;
  hostname: string;
  status: string;
  availability: string;
  managerStatus: string;
}

export interface ReplicaCount {
  running: number;
  desired: number;
}

export interface InstallStep {
  description: string;
  command: string;
}

/**
 * Ubuntu/Debian engine installation from the vendor apt repository.
 */
export function engineInstallSteps(sshUser: string): InstallStep[] {
  return [
    { description: 'Refresh package index', command: 'sudo apt-get update -y' },
    {
      description: 'Install repository prerequisites',
      command: 'sudo apt-get install -y ca-certificates curl gnupg lsb-release',
    },
    {
      description: 'Add engine repository key',
      command:
        'sudo install -m 0755 -d /etc/apt/keyrings && ' +
        'curl -fsSL https://download.docker.com/linux/ubuntu/gpg | sudo gpg --batch --yes --dearmor -o /etc/apt/keyrings/docker.gpg',
    },
    {
      description: 'Add engine repository',
      command:
        'echo "deb [arch=$(dpkg --print-architecture) signed-by=/etc/apt/keyrings/docker.gpg] ' +
        'https://download.docker.com/linux/ubuntu $(. /etc/os-release && echo $VERSION_CODENAME) stable" | ' +
        'sudo tee /etc/apt/sources.list.d/docker.list > /dev/null',
    },
    {
      description: 'Install engine packages',
      command:
        'sudo apt-get update -y && sudo apt-get install -y docker-ce docker-ce-cli containerd.io ' +
        'docker-buildx-plugin docker-compose-plugin',
    },
    { description: 'Enable engine daemon', command: 'sudo systemctl enable --now docker' },
    { description: 'Grant engine access to SSH user', command: `sudo usermod -aG docker ${sshUser}` },
  ];
}

const REPLICAS_PATTERN = /^(\d+)\/(\d+)/;

export function parseReplicas(replicas: string): ReplicaCount | null {
  const match = REPLICAS_PATTERN.exec(replicas.trim());
  if (!match) return null;
  return { running: Number(match[1]), desired: Number(match[2]) };
}

export function isConverged(replicas: string): boolean {
  const count = parseReplicas(replicas);
  return count !== null && count.desired > 0 && count.running === count.desired;
}

function parseJsonLines<T>(output: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T[] | null {
  const rows: T[] = [];
  for (const line of output.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed.startsWith('{')) continue;
    let json: unknown;
    try {
      json = JSON.parse(trimmed);
    } catch {
      return null;
    }
    const parsed = schema.safeParse(json);
    if (!parsed.success) return null;
    rows.push(parsed.data);
  }
  return rows;
}

export function parseSwarmStatus(output: string): SwarmStatus | null {
  const line = output.split('\n').map(l => l.trim()).find(l => l.startsWith('{'));
  if (!line) return null;

  let json: unknown;
  try {
    json = JSON.parse(line);
  } catch {
    return null;
  }

  const parsed = SwarmInfoSchema.safeParse(json);
  if (!parsed.success) return null;
  const info = parsed.data;

  return {
    state: info.LocalNodeState,
    nodeId: info.NodeID,
    nodeAddr: info.NodeAddr,
    isManager: info.ControlAvailable,
    remoteManagers: (info.RemoteManagers ?? []).map(m => ({ nodeId: m.NodeID, addr: m.Addr })),
    clusterId: info.Cluster?.ID || null,
    autolock: info.Cluster?.Spec.EncryptionConfig.AutoLockManagers ?? false,
    error: info.Error,
  };
}

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** Parsed query value (null when the engine could not answer) and the command behind it. */
export interface QueryResult<T> {
  value: T | null;
  result: ExecutionResult;
}

/**
 * Engine control plane reached over remote exec. Queries whose failure can be
 * fatal return a QueryResult so the caller can report the command's exit code
 * and output; mutations return the raw ExecutionResult.
 */
export class SwarmControlPlane {
  private executor: RemoteExecutor;

  constructor(executor: RemoteExecutor) {
    this.executor = executor;
  }

  /** Run an arbitrary action through the executor. */
  async run(host: string, description: string, command: string, options: ExecuteOptions = {}): Promise<ExecutionResult> {
    return this.executor.execute(host, description, command, options);
  }

  async engineVersion(host: string): Promise<string | null> {
    const result = await this.executor.execute(host, 'Check engine binary', 'docker --version', { onFailure: 'ignore' });
    return result.success ? result.output.trim() || null : null;
  }

  async checkDaemon(host: string): Promise<ExecutionResult> {
    return this.executor.execute(
      host,
      'Check engine daemon',
      "docker info --format '{{.ServerVersion}}'",
      { onFailure: 'ignore' },
    );
  }

  async startDaemon(host: string): Promise<ExecutionResult> {
    return this.executor.execute(host, 'Start engine daemon', 'sudo systemctl enable --now docker');
  }

  async swarmStatus(host: string): Promise<QueryResult<SwarmStatus>> {
    const result = await this.executor.execute(
      host,
      'Query swarm status',
      "docker info --format '{{json .Swarm}}'",
      { onFailure: 'ignore' },
    );
    return { value: result.success ? parseSwarmStatus(result.output) : null, result };
  }

  async initSwarm(host: string, advertiseAddr: string): Promise<ExecutionResult> {
    return this.executor.execute(
      host,
      'Initialize swarm',
      `docker swarm init --advertise-addr ${shellQuote(advertiseAddr)}`,
    );
  }

  async enableAutolock(host: string): Promise<ExecutionResult> {
    // stdout carries the unlock key
    return this.executor.execute(host, 'Enable swarm autolock', 'docker swarm update --autolock=true > /dev/null', {
      onFailure: 'warn',
      quiet: true,
    });
  }

  async networkExists(host: string, name: string): Promise<boolean> {
    const result = await this.executor.execute(
      host,
      `Inspect network ${name}`,
      `docker network inspect ${shellQuote(name)}`,
      { onFailure: 'ignore', quiet: true },
    );
    return result.success;
  }

  async createOverlayNetwork(host: string, name: string, encrypted: boolean): Promise<ExecutionResult> {
    const opts = encrypted ? ' --opt encrypted' : '';
    return this.executor.execute(
      host,
      `Create ${encrypted ? 'encrypted ' : ''}overlay network ${name}`,
      `docker network create -d overlay --attachable${opts} ${shellQuote(name)}`,
    );
  }

  async workerJoinToken(host: string): Promise<QueryResult<string>> {
    const result = await this.executor.execute(host, 'Fetch worker join token', 'docker swarm join-token -q worker', {
      quiet: true,
    });
    if (!result.success) return { value: null, result };
    const token = result.output.split('\n').map(l => l.trim()).find(l => l.length > 0);
    return { value: token ?? null, result };
  }

  async joinSwarm(host: string, token: string, managerAddr: string): Promise<ExecutionResult> {
    return this.executor.execute(
      host,
      'Join swarm',
      `docker swarm join --token ${shellQuote(token)} ${managerAddr}:${SWARM_CONTROL_PORT}`,
      { redact: [token] },
    );
  }

  async leaveSwarm(host: string): Promise<ExecutionResult> {
    return this.executor.execute(host, 'Leave current swarm', 'docker swarm leave');
  }

  async portReachable(fromHost: string, addr: string, port: number, timeoutSec: number): Promise<boolean> {
    const result = await this.executor.execute(
      fromHost,
      `Probe ${addr}:${port}`,
      `timeout ${timeoutSec} bash -c ${shellQuote(`</dev/tcp/${addr}/${port}`)}`,
      { onFailure: 'ignore', quiet: true },
    );
    return result.success;
  }

  async deployStack(host: string, name: string, composePath: string, envFile: string): Promise<ExecutionResult> {
    return this.executor.execute(
      host,
      `Deploy stack ${name}`,
      `set -a && . ${shellQuote(envFile)} && set +a && docker stack deploy -c ${shellQuote(composePath)} ${shellQuote(name)}`,
    );
  }

  async listServices(host: string, namePrefix?: string, onFailure: FailurePolicy = 'ignore'): Promise<ServiceStatus[] | null> {
    const filter = namePrefix ? ` --filter ${shellQuote(`name=${namePrefix}`)}` : '';
    const result = await this.executor.execute(
      host,
      namePrefix ? `List services ${namePrefix}*` : 'List services',
      `docker service ls${filter} --format '{{json .}}'`,
      { onFailure },
    );
    if (!result.success) return null;
    const rows = parseJsonLines(result.output, ServiceRowSchema);
    return rows?.map(r => ({ id: r.ID, name: r.Name, mode: r.Mode, replicas: r.Replicas, ports: r.Ports })) ?? null;
  }

  async listNodes(host: string): Promise<NodeStatus[] | null> {
    const result = await this.executor.execute(host, 'List cluster nodes', "docker node ls --format '{{json .}}'", {
      onFailure: 'warn',
    });
    if (!result.success) return null;
    const rows = parseJsonLines(result.output, NodeRowSchema);
    return rows?.map(r => ({
      id: r.ID,
      hostname: r.Hostname,
      status: r.Status,
      availability: r.Availability,
      managerStatus: r.ManagerStatus,
    })) ?? null;
  }
}
