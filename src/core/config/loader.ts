/**
 * Configuration loading from YAML files.
 */

import { readFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { ConfigError } from '../errors.js';
import { parseConfig, type Config } from './schema.js';

/**
 * Load and validate configuration from a YAML file.
 *
 * @throws ConfigError if the file is missing, unreadable YAML or invalid
 */
export async function loadConfig(configPath: string): Promise<Config> {
  const absolutePath = resolve(configPath);

  if (!existsSync(absolutePath)) {
    throw new ConfigError(`Configuration file not found: ${absolutePath}`);
  }

  const content = await readFile(absolutePath, 'utf-8');

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Configuration file is not valid YAML: ${message}`);
  }

  return parseConfig(raw);
}
