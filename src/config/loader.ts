/**
 * Loads the optional configuration file (INI or YAML, chosen by extension)
 */

import { promises as fs } from 'fs';
import { extname } from 'path';
import ini from 'ini';
import { load as parseYaml } from 'js-yaml';
import type { ConfigDocument, ConfigFileFormat } from '../types/config.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { isRecord } from '../utils/guards.js';

const EXTENSION_FORMATS: Record<string, ConfigFileFormat> = {
  '.conf': 'ini',
  '.ini': 'ini',
  '.yaml': 'yaml',
  '.yml': 'yaml',
};

const EMPTY_DOCUMENT: ConfigDocument = { format: 'none', data: {} };

export function detectFormat(configPath: string): ConfigFileFormat {
  return EXTENSION_FORMATS[extname(configPath).toLowerCase()] ?? 'none';
}

function asMapping(value: unknown): Record<string, unknown> {
  return isRecord(value) ? value : {};
}

const INI_ENTRY = /^([^=:]+)[=:](.*)$/;

/**
 * Rewrite `key = value` and `key: value` lines as `key = "value"`.
 * Quoted values reach ini's parser whole, so `;` and `#` inside a value
 * are kept rather than read as an inline comment. Keys are lower-cased.
 */
export function normalizeIni(content: string): string {
  return content
    .split(/\r?\n/)
    .map(line => {
      const trimmed = line.trim();
      if (trimmed === '' || trimmed.startsWith('[') || trimmed.startsWith(';') || trimmed.startsWith('#')) {
        return line;
      }
      const entry = INI_ENTRY.exec(trimmed);
      if (!entry) return line;
      return `${entry[1].trim().toLowerCase()} = ${JSON.stringify(entry[2].trim())}`;
    })
    .join('\n');
}

export function parseConfig(content: string, format: ConfigFileFormat): Record<string, unknown> {
  switch (format) {
    case 'yaml':
      return asMapping(parseYaml(content));
    case 'ini':
      return asMapping(ini.parse(normalizeIni(content)));
    case 'none':
      return {};
  }
}

/**
 * Read and parse the configuration file. A missing file is not an error:
 * resolution carries on without a file source.
 */
export async function loadConfigFile(
  configPath: string | undefined,
  logger: Logger,
): Promise<ConfigDocument> {
  if (!configPath) return EMPTY_DOCUMENT;

  const format = detectFormat(configPath);
  if (format === 'none') {
    logger.warn(`Unsupported configuration file type '${configPath}'. Expected .conf, .ini, .yaml or .yml.`);
    return EMPTY_DOCUMENT;
  }

  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      logger.warn(`Configuration file ${configPath} not found. Continuing without it.`);
      return EMPTY_DOCUMENT;
    }
    throw new ConfigurationError(`Failed to read configuration file ${configPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  try {
    const data = parseConfig(content, format);
    logger.debug(`Loaded ${format} configuration from ${configPath}`);
    return { format, path: configPath, data };
  } catch (err) {
    throw new ConfigurationError(`Invalid configuration file ${configPath}: ${errorMessage(err)}`, {
      cause: err,
    });
  }
}
