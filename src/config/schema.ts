/**
 * Declared configuration options, groups and defaults
 */

import type { ConfigGroupSpec, ConfigOptionSpec, ConfigTree } from '../types/config.js';
import { LOG_LEVELS } from '../logger.js';

export const ENV_PREFIX = 'SPLUNK_ASD';

export const CONFIG_FILE_OPTION: ConfigOptionSpec = {
  key: 'config',
  short: 'c',
  valueName: 'path',
  description: 'Path to the configuration file (.conf, .ini, .yaml or .yml)',
};

export const CONFIG_OPTIONS: readonly ConfigOptionSpec[] = [
  {
    section: 'splunkbase',
    key: 'username',
    short: 'u',
    valueName: 'name',
    description: 'Splunkbase username',
  },
  {
    section: 'splunkbase',
    key: 'password',
    short: 'p',
    valueName: 'password',
    description: 'Splunkbase password',
    secret: true,
  },
  {
    section: 'splunkbase',
    key: 'timeout',
    short: 't',
    valueName: 'seconds',
    description: 'Request timeout in seconds',
  },
  {
    section: 'apps',
    key: 'file',
    flag: 'apps_file',
    short: 'a',
    valueName: 'path',
    description: 'Path to the apps list file',
  },
  {
    section: 'apps',
    key: 'output',
    short: 'o',
    valueName: 'dir',
    description: 'Output directory',
  },
  {
    section: 'logging',
    key: 'level',
    flag: 'log-level',
    short: 'l',
    valueName: 'level',
    description: 'Log level',
    choices: LOG_LEVELS,
  },
];

export const CONFIG_GROUPS: readonly ConfigGroupSpec[] = [
  { section: 'splunkbase', keys: ['username', 'password', 'timeout'], envPrefix: ENV_PREFIX },
  { section: 'apps', keys: ['file', 'output'], envPrefix: ENV_PREFIX },
  { section: 'logging', keys: ['level'], envPrefix: `${ENV_PREFIX}_LOG` },
];

export const CONFIG_DEFAULTS: ConfigTree = {
  splunkbase: { timeout: 30 },
  apps: { output: './' },
  logging: { level: 'info' },
};

export function flagName(spec: Pick<ConfigOptionSpec, 'key' | 'flag'>): string {
  return spec.flag ?? spec.key.replace(/\./g, '-');
}
