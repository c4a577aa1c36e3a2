/**
 * Neo4j credential resolution
 *
 * Priority: explicit option > environment variable > config file > default.
 * Empty strings count as unset at every layer.
 */

import type { Neo4jConfig } from '../runtime/types/config.js';

export const DEFAULT_NEO4J_URI = 'bolt://localhost:7687';
export const DEFAULT_NEO4J_USERNAME = 'neo4j';
export const DEFAULT_NEO4J_PASSWORD = 'neo4j';

export type Env = Record<string, string | undefined>;

function pick(...values: Array<string | undefined>): string | undefined {
  return values.find(value => value !== undefined && value !== '');
}

export function resolveNeo4jCredentials(
  explicit: Partial<Neo4jConfig> = {},
  env: Env = process.env,
  fromFile: Partial<Neo4jConfig> = {}
): Neo4jConfig {
  const config: Neo4jConfig = {
    uri: pick(explicit.uri, env.NEO4J_URI, fromFile.uri) ?? DEFAULT_NEO4J_URI,
    username: pick(explicit.username, env.NEO4J_USERNAME, fromFile.username) ?? DEFAULT_NEO4J_USERNAME,
    password: pick(explicit.password, env.NEO4J_PASSWORD, fromFile.password) ?? DEFAULT_NEO4J_PASSWORD,
  };

  const database = pick(explicit.database, env.NEO4J_DATABASE, fromFile.database);
  if (database) config.database = database;

  return config;
}
