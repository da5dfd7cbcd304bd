/**
 * Layered configuration resolver.
 *
 * Sources are consulted in order and the first present value wins:
 * CLI argument, configuration file, environment variable, defaults mapping,
 * then the caller's fallback. Empty strings, 0 and false count as absent.
 */

import type {
  ConfigDocument,
  ConfigOptionSpec,
  ConfigSection,
  ConfigSourceName,
  ConfigTree,
  ConfigValue,
  EffectiveConfig,
} from '../types/config.js';
import { ConfigurationError } from '../errors.js';
import type { Logger } from '../logger.js';
import { silentLogger } from '../logger.js';
import { isRecord } from '../utils/guards.js';
import { flagName } from './schema.js';

export type CliValues = Record<string, string | undefined>;

export interface LookupRequest {
  key: string;
  section?: string;
  envKey: string;
  flag: string;
}

export interface ConfigSource {
  name: Exclude<ConfigSourceName, 'fallback'>;
  lookup(request: LookupRequest): ConfigValue | undefined;
}

export interface ResolverOptions {
  cli?: CliValues;
  document?: ConfigDocument;
  env?: NodeJS.ProcessEnv;
  defaults?: ConfigTree;
  options?: readonly ConfigOptionSpec[];
  logger?: Logger;
}

function isConfigValue(value: unknown): value is ConfigValue {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Truthiness check: a source holding '', 0 or false has nothing to offer
 */
export function isPresent(value: ConfigValue | undefined): value is ConfigValue {
  return value !== undefined && value !== '' && value !== 0 && value !== false;
}

/**
 * Look up `tree[section][key]`, or `tree[key]` without a section
 */
export function lookupPath(tree: unknown, key: string, section?: string): ConfigValue | undefined {
  const scope = section ? (isRecord(tree) ? tree[section] : undefined) : tree;
  if (!isRecord(scope)) return undefined;
  const value = scope[key];
  return isConfigValue(value) ? value : undefined;
}

export function cliSource(values: CliValues): ConfigSource {
  return {
    name: 'cli',
    lookup: ({ flag }) => values[flag],
  };
}

export function fileSource(document: ConfigDocument): ConfigSource {
  return {
    name: 'file',
    lookup: ({ key, section }) =>
      document.format === 'none' ? undefined : lookupPath(document.data, key, section),
  };
}

export function envSource(env: NodeJS.ProcessEnv): ConfigSource {
  return {
    name: 'env',
    lookup: ({ envKey }) => env[envKey],
  };
}

export function defaultsSource(defaults: ConfigTree): ConfigSource {
  return {
    name: 'defaults',
    lookup: ({ key, section }) => lookupPath(defaults, key, section),
  };
}

function optionId(key: string, section?: string): string {
  return section ? `${section}.${key}` : key;
}

function freeze(tree: ConfigTree): EffectiveConfig {
  const copy: Record<string, ConfigValue | Readonly<ConfigSection> | undefined> = {};
  for (const [name, value] of Object.entries(tree)) {
    copy[name] = isRecord(value) ? Object.freeze({ ...value }) : value;
  }
  return Object.freeze(copy);
}

export class ConfigResolver {
  private readonly sources: readonly ConfigSource[];
  private readonly options = new Map<string, ConfigOptionSpec>();
  private readonly resolved: ConfigTree = {};
  private readonly origins = new Map<string, ConfigSourceName>();
  private readonly logger: Logger;

  constructor(options: ResolverOptions = {}) {
    this.sources = [
      cliSource(options.cli ?? {}),
      fileSource(options.document ?? { format: 'none', data: {} }),
      envSource(options.env ?? process.env),
      defaultsSource(options.defaults ?? {}),
    ];
    for (const spec of options.options ?? []) {
      this.options.set(optionId(spec.key, spec.section), spec);
    }
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Resolve a single key and record it in the effective configuration
   */
  resolve(
    key: string,
    section?: string,
    envKeyOverride?: string,
    fallback?: ConfigValue,
  ): ConfigValue | undefined {
    const id = optionId(key, section);
    const spec = this.options.get(id);
    const request: LookupRequest = {
      key,
      section,
      envKey: envKeyOverride || key.toUpperCase(),
      flag: flagName({ key, flag: spec?.flag }),
    };

    let value: ConfigValue | undefined;
    let origin: ConfigSourceName | undefined;
    for (const source of this.sources) {
      const candidate = source.lookup(request);
      if (isPresent(candidate)) {
        value = candidate;
        origin = source.name;
        break;
      }
    }
    if (origin === undefined && fallback !== undefined) {
      value = fallback;
      origin = 'fallback';
    }

    if (spec?.choices && !(value !== undefined && spec.choices.includes(String(value)))) {
      throw new ConfigurationError(
        `Invalid value '${value ?? ''}' for ${key}. Must be one of: ${spec.choices.join(', ')}`,
        { key: id },
      );
    }

    this.store(key, section, value);
    if (origin) {
      this.origins.set(id, origin);
      this.logger.debug(`Config ${id} resolved from ${origin}`);
    } else {
      this.origins.delete(id);
      this.logger.debug(`Config ${id} is not set`);
    }
    return value;
  }

  /**
   * Resolve every key of a section, deriving `{envPrefix}_{KEY}` env names
   */
  resolveGroup(section: string, keys: readonly string[], envPrefix?: string): ConfigSection {
    const group: ConfigSection = {};
    for (const key of keys) {
      group[key] = this.resolve(key, section, envPrefix ? `${envPrefix}_${key.toUpperCase()}` : undefined);
    }
    return group;
  }

  sourceOf(key: string, section?: string): ConfigSourceName | undefined {
    return this.origins.get(optionId(key, section));
  }

  snapshot(): EffectiveConfig {
    return freeze(this.resolved);
  }

  private store(key: string, section: string | undefined, value: ConfigValue | undefined): void {
    if (!section) {
      this.resolved[key] = value;
      return;
    }
    const existing = this.resolved[section];
    const target: ConfigSection = isRecord(existing) ? existing : {};
    target[key] = value;
    this.resolved[section] = target;
  }
}
