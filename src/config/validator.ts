import * as fs from 'fs';
import * as path from 'path';
import { FieldError } from '../errors.js';
import {
  Configuration,
  PORT_OPTIONS,
  PortOption,
  REQUIRED_OPTIONS,
  splitHostList,
} from './schema.js';
import { ClusterSettings, Host, LogVerbosity } from './types.js';

export type ValidationResult =
  | { ok: true; settings: ClusterSettings }
  | { ok: false; errors: FieldError[] };

export interface ValidateOptions {
  homeDir: string;
}

const IPV4_PATTERN = /^\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$/;
const HOSTNAME_PATTERN = /^[A-Za-z0-9.-]+$/;
const DIGITS_PATTERN = /^\d+$/;

export function validateIp(candidate: string): boolean {
  if (!IPV4_PATTERN.test(candidate)) return false;
  return candidate.split('.').every(part => Number(part) <= 255);
}

export function validateIpOrHostname(candidate: string): boolean {
  return validateIp(candidate) || HOSTNAME_PATTERN.test(candidate);
}

export function validatePort(candidate: string): boolean {
  if (!DIGITS_PATTERN.test(candidate)) return false;
  const port = Number(candidate);
  return port >= 1 && port <= 65535;
}

export function expandHome(filePath: string, homeDir: string): string {
  if (filePath === '~') return homeDir;
  if (filePath.startsWith('~/')) return path.join(homeDir, filePath.slice(2));
  return filePath;
}

function isReadableFile(filePath: string): boolean {
  try {
    if (!fs.statSync(filePath).isFile()) return false;
    fs.accessSync(filePath, fs.constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

function isLogVerbosity(value: number): value is LogVerbosity {
  return value === 1 || value === 2 || value === 3 || value === 4;
}

export function parseLogLevel(candidate: string): LogVerbosity | null {
  const value = DIGITS_PATTERN.test(candidate) ? Number(candidate) : NaN;
  return isLogVerbosity(value) ? value : null;
}

/**
 * Check a configuration snapshot. Every check runs; errors accumulate.
 * A field that is missing is not also reported for its format.
 */
export function validate(config: Configuration, options: ValidateOptions): ValidationResult {
  const errors: FieldError[] = [];
  const missing = new Set<string>();

  for (const field of REQUIRED_OPTIONS) {
    if (config[field].trim() === '') {
      errors.push({ field, message: 'is required but empty' });
      missing.add(field);
    }
  }

  const keyPath = expandHome(config.ssh_private_key_path, options.homeDir);
  if (!missing.has('ssh_private_key_path') && !isReadableFile(keyPath)) {
    errors.push({ field: 'ssh_private_key_path', message: `file not found or not readable: ${keyPath}` });
  }

  if (!missing.has('manager_host') && !validateIpOrHostname(config.manager_host)) {
    errors.push({ field: 'manager_host', message: `invalid IP address or hostname: ${config.manager_host}` });
  }

  if (!missing.has('manager_advertise_addr') && !validateIp(config.manager_advertise_addr)) {
    errors.push({
      field: 'manager_advertise_addr',
      message: `must be an IPv4 address: ${config.manager_advertise_addr}`,
    });
  }

  const workerIds = splitHostList(config.worker_hosts);
  for (const worker of workerIds) {
    if (!validateIpOrHostname(worker)) {
      errors.push({ field: 'worker_hosts', message: `invalid IP address or hostname: ${worker}` });
    }
  }

  const seen = new Set<string>();
  for (const id of [config.manager_host, ...workerIds]) {
    if (id === '') continue;
    if (seen.has(id)) {
      errors.push({ field: 'worker_hosts', message: `duplicate host: ${id}` });
    }
    seen.add(id);
  }

  for (const field of PORT_OPTIONS) {
    if (!validatePort(config[field])) {
      errors.push({ field, message: `invalid port: ${config[field]}` });
    }
  }

  if (!DIGITS_PATTERN.test(config.ssh_connect_timeout) || Number(config.ssh_connect_timeout) < 1) {
    errors.push({ field: 'ssh_connect_timeout', message: `must be a positive number of seconds: ${config.ssh_connect_timeout}` });
  }

  const logLevel = parseLogLevel(config.log_level);
  if (logLevel === null) {
    errors.push({ field: 'log_level', message: `must be 1-4: ${config.log_level}` });
  }

  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const ports: Record<PortOption, number> = {
    registry_port: Number(config.registry_port),
    http_port: Number(config.http_port),
    https_port: Number(config.https_port),
    dashboard_port: Number(config.dashboard_port),
    metrics_port: Number(config.metrics_port),
  };

  const workers: Host[] = workerIds.map(id => ({ id, role: 'worker' }));

  return {
    ok: true,
    settings: {
      ssh: {
        user: config.ssh_user,
        privateKeyPath: keyPath,
        connectTimeoutSec: Number(config.ssh_connect_timeout),
      },
      manager: { id: config.manager_host, role: 'manager' },
      workers,
      advertiseAddr: config.manager_advertise_addr,
      swarm: {
        autolock: config.swarm_autolock,
        networkName: config.overlay_network_name,
        networkEncrypted: config.overlay_network_encrypted,
      },
      stacks: {
        registry: config.deploy_registry_stack,
        ingress: config.deploy_ingress_stack,
        monitoring: config.deploy_monitoring_stack,
      },
      remote: {
        setupDir: config.remote_setup_dir,
        dataDir: config.remote_data_dir,
      },
      ports,
      dashboard: {
        adminUser: config.dashboard_admin_user,
        adminPassword: config.dashboard_admin_password,
      },
      logLevel: logLevel ?? 3,
    },
  };
}
