/**
 * Typed option schema for swarmup configuration files.
 *
 * Every recognized key declares its value type and default here. Ports and the
 * log level stay as text: the validator decides whether they are numeric.
 * `resolveConfig` is the only place defaults are applied.
 */

import { z } from 'zod';

function coerceText(value: unknown): string | undefined {
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value)) return value.map(v => String(v).trim()).join(',');
  return undefined;
}

function coerceBoolean(value: unknown): boolean | undefined {
  if (typeof value === 'boolean') return value;
  const text = coerceText(value);
  if (text === undefined || text === '') return undefined;
  return text.toLowerCase() === 'true';
}

const text = (fallback: string) =>
  z.preprocess(coerceText, z.string().optional())
    .transform(v => (v === undefined || v === '' ? fallback : v));

const flag = (fallback: boolean) =>
  z.preprocess(coerceBoolean, z.boolean().optional())
    .transform(v => v ?? fallback);

export const ConfigSchema = z.object({
  ssh_user: text('ubuntu'),
  ssh_private_key_path: text('~/.ssh/aws-swarm.pem'),
  ssh_connect_timeout: text('10'),
  manager_host: text(''),
  worker_hosts: text(''),
  manager_advertise_addr: text(''),
  swarm_autolock: flag(true),
  overlay_network_name: text('public'),
  overlay_network_encrypted: flag(true),
  deploy_registry_stack: flag(true),
  deploy_ingress_stack: flag(true),
  deploy_monitoring_stack: flag(true),
  remote_setup_dir: text('/opt/swarm-setup'),
  remote_data_dir: text('/opt/swarm-data'),
  registry_port: text('8081'),
  http_port: text('80'),
  https_port: text('443'),
  dashboard_port: text('3000'),
  metrics_port: text('9090'),
  dashboard_admin_user: text('admin'),
  dashboard_admin_password: text('admin'),
  log_level: text('3'),
});

export type Configuration = Readonly<z.output<typeof ConfigSchema>>;
export type OptionKey = keyof Configuration;
export type RawConfig = Record<string, unknown>;

export const REQUIRED_OPTIONS = [
  'ssh_user',
  'ssh_private_key_path',
  'manager_host',
  'manager_advertise_addr',
] as const satisfies readonly OptionKey[];

export const PORT_OPTIONS = [
  'registry_port',
  'http_port',
  'https_port',
  'dashboard_port',
  'metrics_port',
] as const satisfies readonly OptionKey[];

export type PortOption = (typeof PORT_OPTIONS)[number];

export const SECRET_OPTIONS: readonly string[] = ['dashboard_admin_password'];

/**
 * Apply schema defaults to a raw key-value snapshot. Unknown keys are dropped
 * and empty values count as unset.
 */
export function resolveConfig(raw: RawConfig, schema: typeof ConfigSchema = ConfigSchema): Configuration {
  return Object.freeze(schema.parse(raw));
}

export function unknownKeys(raw: RawConfig): string[] {
  return Object.keys(raw).filter(key => !(key in ConfigSchema.shape));
}

export function splitHostList(list: string): string[] {
  return list
    .split(',')
    .map(h => h.trim())
    .filter(h => h.length > 0);
}
