import { PortOption } from './schema.js';

export type HostRole = 'manager' | 'worker';

export interface Host {
  id: string;
  role: HostRole;
}

export type LogVerbosity = 1 | 2 | 3 | 4;

export type StackKey = 'registry' | 'ingress' | 'monitoring';

/**
 * Validated, typed form of a Configuration. Produced only by `validate()`.
 */
export interface ClusterSettings {
  readonly ssh: {
    readonly user: string;
    readonly privateKeyPath: string;
    readonly connectTimeoutSec: number;
  };
  readonly manager: Host;
  readonly workers: readonly Host[];
  readonly advertiseAddr: string;
  readonly swarm: {
    readonly autolock: boolean;
    readonly networkName: string;
    readonly networkEncrypted: boolean;
  };
  readonly stacks: Readonly<Record<StackKey, boolean>>;
  readonly remote: {
    readonly setupDir: string;
    readonly dataDir: string;
  };
  readonly ports: Readonly<Record<PortOption, number>>;
  readonly dashboard: {
    readonly adminUser: string;
    readonly adminPassword: string;
  };
  readonly logLevel: LogVerbosity;
}

export function allHosts(settings: ClusterSettings): Host[] {
  return [settings.manager, ...settings.workers];
}
