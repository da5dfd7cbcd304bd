/**
 * Builds the effective configuration for a run and the typed settings
 * the rest of the program consumes
 */

import type { ConfigTree, ConfigValue, EffectiveConfig } from '../types/config.js';
import { ConfigurationError } from '../errors.js';
import { isLogLevel } from '../logger.js';
import type { Logger, LogLevel } from '../logger.js';
import { loadConfigFile } from './loader.js';
import type { CliValues } from './resolver.js';
import { ConfigResolver } from './resolver.js';
import { isRecord } from '../utils/guards.js';
import { CONFIG_DEFAULTS, CONFIG_GROUPS, CONFIG_OPTIONS } from './schema.js';

export interface Settings {
  username?: string;
  password?: string;
  appsFile?: string;
  outputDir: string;
  timeoutMs: number;
  logLevel: LogLevel;
}

export interface LoadSettingsOptions {
  cliValues: CliValues;
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  defaults?: ConfigTree;
  logger: Logger;
}

export interface LoadedSettings {
  settings: Settings;
  config: EffectiveConfig;
}

function asString(value: ConfigValue | undefined): string | undefined {
  return value === undefined ? undefined : String(value);
}

function parseTimeout(value: ConfigValue | undefined): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new ConfigurationError(`Invalid value '${value ?? ''}' for timeout. Must be a positive number of seconds`, {
      key: 'splunkbase.timeout',
    });
  }
  return seconds * 1000;
}

/**
 * Render the effective configuration for debug output, masking secret options
 */
export function describeConfig(config: EffectiveConfig): string {
  const secrets = new Set(
    CONFIG_OPTIONS.filter(spec => spec.secret).map(spec => (spec.section ? `${spec.section}.${spec.key}` : spec.key)),
  );
  const masked: Record<string, unknown> = {};
  for (const [name, value] of Object.entries(config)) {
    if (!isRecord(value)) {
      masked[name] = secrets.has(name) && value !== undefined ? '***' : value;
      continue;
    }
    const section: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      section[key] = secrets.has(`${name}.${key}`) && entry !== undefined ? '***' : entry;
    }
    masked[name] = section;
  }
  return JSON.stringify(masked);
}

export async function loadSettings(options: LoadSettingsOptions): Promise<LoadedSettings> {
  const document = await loadConfigFile(options.configPath, options.logger);
  const resolver = new ConfigResolver({
    cli: options.cliValues,
    document,
    env: options.env ?? process.env,
    defaults: options.defaults ?? CONFIG_DEFAULTS,
    options: CONFIG_OPTIONS,
    logger: options.logger,
  });

  const groups: Record<string, Record<string, ConfigValue | undefined>> = {};
  for (const group of CONFIG_GROUPS) {
    groups[group.section] = resolver.resolveGroup(group.section, group.keys, group.envPrefix);
  }

  const { splunkbase = {}, apps = {}, logging = {} } = groups;
  const logLevel = logging.level;
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`Invalid value '${logLevel ?? ''}' for level`, { key: 'logging.level' });
  }

  return {
    settings: {
      username: asString(splunkbase.username),
      password: asString(splunkbase.password),
      appsFile: asString(apps.file),
      outputDir: asString(apps.output) ?? './',
      timeoutMs: parseTimeout(splunkbase.timeout),
      logLevel,
    },
    config: resolver.snapshot(),
  };
}
