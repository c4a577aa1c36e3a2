/**
 * Graph Writer
 *
 * Replaces the stored graph with the graph of a document tree. The wipe and
 * every create run in one write transaction, so a failure part-way leaves
 * the previous graph in place.
 */

import type { TreeNode } from '../runtime/types/tree.js';
import type { CypherRunner } from '../runtime/client/neo4j-client.js';
import type { Logger } from '../runtime/utils/logger.js';
import { buildGraphStatements, toCypherQuery } from './graph-statements.js';

/**
 * What the writer needs from a client: a way to run a transaction
 */
export interface TransactionalRunner {
  executeWrite<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T>;
}

export interface WriteStats {
  nodesCreated: number;
  relationshipsCreated: number;
}

export class GraphWriter {
  constructor(
    private readonly client: TransactionalRunner,
    private readonly logger: Logger
  ) {}

  async writeTree(root: TreeNode): Promise<WriteStats> {
    this.logger.info('Creating graph from markdown tree');

    const statements = buildGraphStatements(root);
    const stats: WriteStats = { nodesCreated: 0, relationshipsCreated: 0 };

    await this.client.executeWrite(async tx => {
      for (const statement of statements) {
        const { query, params } = toCypherQuery(statement);
        await tx.run(query, params);
      }
    });

    for (const statement of statements) {
      if (statement.kind === 'node') stats.nodesCreated++;
      else if (statement.kind === 'edge') stats.relationshipsCreated++;
    }

    this.logger.info(
      `Graph creation completed: ${stats.nodesCreated} nodes, ${stats.relationshipsCreated} relationships`
    );
    return stats;
  }
}
