/**
 * Shared command plumbing: the injected logger, output sink and the
 * Neo4j client factory commands connect through.
 */

import { Neo4jClient, type CypherRunner } from '../../src/runtime/client/neo4j-client.js';
import type { TransactionalRunner } from '../../src/ingestion/graph-writer.js';
import type { Neo4jConfig } from '../../src/runtime/types/config.js';
import type { Env } from '../../src/config/credentials.js';
import type { Logger } from '../../src/runtime/utils/logger.js';

export interface GraphClient extends CypherRunner, TransactionalRunner {
  verifyConnectivity(): Promise<void>;
  close(): Promise<void>;
}

export type ClientFactory = (config: Neo4jConfig, logger: Logger) => GraphClient;

export interface CommandContext {
  logger: Logger;
  env: Env;
  /** Receives everything a command prints to standard output */
  stdout: (text: string) => void;
  createClient: ClientFactory;
}

export const createNeo4jClient: ClientFactory = (config, logger) => new Neo4jClient(config, logger);

/**
 * Open a client, hand it to `work`, and always close it afterwards
 */
export async function withClient<T>(
  ctx: CommandContext,
  config: Neo4jConfig,
  work: (client: GraphClient) => Promise<T>
): Promise<T> {
  const client = ctx.createClient(config, ctx.logger);
  try {
    await client.verifyConnectivity();
    return await work(client);
  } finally {
    await client.close();
  }
}
