/**
 * Command-line surface: options are registered from the declared config schema
 */

import { Command, Option } from 'commander';
import type { ConfigOptionSpec } from './types/config.js';
import type { CliValues } from './config/resolver.js';
import { CONFIG_FILE_OPTION, CONFIG_OPTIONS, ENV_PREFIX, flagName } from './config/schema.js';

export const VERSION = '0.1.0';

export interface CliInput {
  configPath?: string;
  values: CliValues;
}

function toOption(spec: ConfigOptionSpec): Option {
  const value = spec.valueName ?? 'value';
  const flags = `${spec.short ? `-${spec.short}, ` : ''}--${flagName(spec)} <${value}>`;
  const description = spec.choices
    ? `${spec.description} (${spec.choices.join('|')})`
    : spec.description;
  return new Option(flags, description);
}

/**
 * Build the program. No commander defaults are set: precedence between the
 * CLI, files, environment and defaults belongs to the resolver.
 */
export function createProgram(): Command {
  const program = new Command()
    .name('splunkbase-downloader')
    .description('Check Splunkbase for new releases of the apps in an apps file and download them')
    .version(VERSION)
    .addOption(toOption(CONFIG_FILE_OPTION))
    .addHelpText(
      'after',
      `\nEvery option except --config can also come from the configuration file or from ${ENV_PREFIX}_* environment variables.`,
    );

  for (const spec of CONFIG_OPTIONS) {
    program.addOption(toOption(spec));
  }
  return program;
}

/**
 * Map parsed commander options back to flag names for the CLI source
 */
export function collectCliInput(program: Command): CliInput {
  const opts: Record<string, unknown> = program.opts();
  const values: CliValues = {};

  for (const spec of CONFIG_OPTIONS) {
    const option = toOption(spec);
    const value = opts[option.attributeName()];
    values[flagName(spec)] = typeof value === 'string' ? value : undefined;
  }

  const configPath = opts[toOption(CONFIG_FILE_OPTION).attributeName()];
  return {
    configPath: typeof configPath === 'string' ? configPath : undefined,
    values,
  };
}
