/**
 * Option parsing helpers shared by the commands
 */

import { loadConfigFile } from '../../src/config/loader.js';
import { resolveNeo4jCredentials } from '../../src/config/credentials.js';
import type { Neo4jConfig } from '../../src/runtime/types/config.js';
import type { CommandContext } from './context.js';

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface ConnectionOptions {
  uri?: string;
  username?: string;
  password?: string;
  database?: string;
  config?: string;
}

export interface GlobalOptions {
  verbose: number;
  /** Arguments left once the global flags are removed */
  rest: string[];
}

/**
 * Strip `-v` / `--verbose` / `-vv...` from anywhere in argv and count them
 */
export function extractGlobalOptions(args: string[]): GlobalOptions {
  let verbose = 0;
  const rest: string[] = [];

  for (const arg of args) {
    if (arg === '--verbose') {
      verbose++;
    } else if (/^-v+$/.test(arg)) {
      verbose += arg.length - 1;
    } else {
      rest.push(arg);
    }
  }

  return { verbose, rest };
}

/**
 * Value following a flag at `args[i]`, taken verbatim even when it starts
 * with a dash (passwords may)
 */
export function takeValue(args: string[], i: number): string {
  const value = args[i + 1];
  if (value === undefined) {
    throw new UsageError(`Option ${args[i]} requires a value`);
  }
  return value;
}

/**
 * Parse a connection flag at `args[i]` into `options`.
 * @returns true when the flag was a connection flag (and consumed a value)
 */
export function parseConnectionFlag(args: string[], i: number, options: ConnectionOptions): boolean {
  switch (args[i]) {
    case '--uri':
    case '-u':
      options.uri = takeValue(args, i);
      return true;
    case '--username':
      options.username = takeValue(args, i);
      return true;
    case '--password':
      options.password = takeValue(args, i);
      return true;
    case '--database':
      options.database = takeValue(args, i);
      return true;
    case '--config':
    case '-c':
      options.config = takeValue(args, i);
      return true;
    default:
      return false;
  }
}

export async function resolveConnection(options: ConnectionOptions, ctx: CommandContext): Promise<Neo4jConfig> {
  const fromFile = options.config ? await loadConfigFile(options.config, ctx.env) : {};
  const config = resolveNeo4jCredentials(
    { uri: options.uri, username: options.username, password: options.password, database: options.database },
    ctx.env,
    fromFile.neo4j
  );
  ctx.logger.debug(`Using Neo4j at ${config.uri} as ${config.username}`);
  return config;
}

export const CONNECTION_HELP = `Connection options:
  -u, --uri <uri>        Neo4j URI (env NEO4J_URI, default bolt://localhost:7687)
  --username <name>      Neo4j username (env NEO4J_USERNAME, default neo4j)
  --password <password>  Neo4j password (env NEO4J_PASSWORD, default neo4j)
  --database <name>      Neo4j database (env NEO4J_DATABASE, server default)
  -c, --config <path>    YAML config file with a "neo4j" section`;
