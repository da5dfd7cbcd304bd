/**
 * Types for layered configuration resolution
 */

export type ConfigValue = string | number | boolean;

export type ConfigSection = Record<string, ConfigValue | undefined>;

/**
 * Two-level mapping: bare keys at the top, or section -> key -> value
 */
export type ConfigTree = Record<string, ConfigValue | ConfigSection | undefined>;

export type EffectiveConfig = Readonly<Record<string, ConfigValue | Readonly<ConfigSection> | undefined>>;

export type ConfigSourceName = 'cli' | 'file' | 'env' | 'defaults' | 'fallback';

export type ConfigFileFormat = 'yaml' | 'ini' | 'none';

/**
 * Parsed configuration file. `data` is whatever the parser produced.
 */
export interface ConfigDocument {
  format: ConfigFileFormat;
  path?: string;
  data: Record<string, unknown>;
}

/**
 * Declared configuration option. Drives both CLI flag registration and
 * choice validation during resolution.
 */
export interface ConfigOptionSpec {
  key: string;
  section?: string;
  /** CLI flag name without dashes; defaults to the key with dots as hyphens */
  flag?: string;
  short?: string;
  valueName?: string;
  description: string;
  choices?: readonly string[];
  /** Never echoed in logs */
  secret?: boolean;
}

export interface ConfigGroupSpec {
  section: string;
  keys: string[];
  envPrefix?: string;
}
