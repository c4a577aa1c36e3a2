/**
 * Configuration file loader
 *
 * Reads an optional YAML file of the form:
 *
 * ```yaml
 * neo4j:
 *   uri: ${NEO4J_URI}
 *   username: neo4j
 *   password: ${NEO4J_PASSWORD}
 *   database: docs
 * ```
 *
 * `${VAR}` placeholders are replaced from the environment; a placeholder
 * whose variable is unset leaves the field unset.
 */

import { promises as fs } from 'fs';
import YAML from 'yaml';
import type { MdGraphConfigFile, Neo4jConfig } from '../runtime/types/config.js';
import { ConfigError, getErrorMessage } from '../runtime/utils/errors.js';
import type { Env } from './credentials.js';

const PLACEHOLDER = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;
const NEO4J_KEYS = ['uri', 'username', 'password', 'database'] as const;

/**
 * Replace `${VAR}` placeholders; undefined when any variable is unset
 */
export function interpolateEnv(value: string, env: Env): string | undefined {
  let missing = false;
  const result = value.replace(PLACEHOLDER, (_match, name: string) => {
    const replacement = env[name];
    if (replacement === undefined) {
      missing = true;
      return '';
    }
    return replacement;
  });
  return missing ? undefined : result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate parsed YAML into a config file shape
 */
export function parseConfigFile(parsed: unknown, env: Env, source = 'config'): MdGraphConfigFile {
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${source}: expected a mapping at the top level`);
  }

  const section = parsed.neo4j;
  if (section === undefined || section === null) return {};
  if (!isPlainObject(section)) {
    throw new ConfigError(`${source}: "neo4j" must be a mapping`);
  }

  const neo4j: Partial<Neo4jConfig> = {};
  for (const key of NEO4J_KEYS) {
    const raw = section[key];
    if (raw === undefined || raw === null) continue;
    if (typeof raw !== 'string' && typeof raw !== 'number') {
      throw new ConfigError(`${source}: "neo4j.${key}" must be a string`);
    }
    const value = interpolateEnv(String(raw), env);
    if (value !== undefined) neo4j[key] = value;
  }

  return { neo4j };
}

export async function loadConfigFile(filePath: string, env: Env = process.env): Promise<MdGraphConfigFile> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }

  return parseConfigFile(parsed, env, filePath);
}
