import * as fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { ConfigurationError, errorMessage } from '../errors.js';
import { Configuration, RawConfig, SECRET_OPTIONS, resolveConfig, unknownKeys } from './schema.js';

export const DEFAULT_CONFIG_PATH = 'config/swarmup.yaml';

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function loadRawConfig(configPath: string): RawConfig {
  let content: string;
  try {
    content = fs.readFileSync(configPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError([{ field: 'config', message: `cannot read ${configPath}: ${errorMessage(error)}` }]);
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (error) {
    throw new ConfigurationError([{ field: 'config', message: `invalid YAML in ${configPath}: ${errorMessage(error)}` }]);
  }

  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new ConfigurationError([{ field: 'config', message: `${configPath} must contain a key-value mapping` }]);
  }
  return parsed;
}

export interface LoadedConfig {
  config: Configuration;
  unknownKeys: string[];
}

export function loadConfig(configPath: string, overrides: RawConfig = {}): LoadedConfig {
  const raw = { ...loadRawConfig(configPath), ...overrides };
  return {
    config: resolveConfig(raw),
    unknownKeys: unknownKeys(raw),
  };
}

/**
 * Render the resolved configuration as `key=value` lines, secrets masked.
 */
export function describeConfig(config: Configuration): string[] {
  return Object.entries(config).map(([key, value]) =>
    `${key}=${SECRET_OPTIONS.includes(key) ? '********' : String(value)}`,
  );
}

export function usesDefaultDashboardCredentials(config: Configuration): boolean {
  return config.dashboard_admin_user === 'admin' && config.dashboard_admin_password === 'admin';
}

export function writeConfigTemplate(templatePath: string, outputPath: string): void {
  if (fs.existsSync(outputPath)) {
    throw new ConfigurationError([{ field: 'config', message: `refusing to overwrite existing ${outputPath}` }]);
  }
  fs.copyFileSync(templatePath, outputPath);
}
