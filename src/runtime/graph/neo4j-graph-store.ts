/**
 * Read access to a stored document graph
 */

import { isInt, isNode } from 'neo4j-driver';
import type { CypherRunner } from '../client/neo4j-client.js';
import type { PersistedNode } from '../types/tree.js';
import { CONTAINS, NODE_LABEL } from '../types/tree.js';
import { MdGraphError } from '../utils/errors.js';

export interface GraphStore {
  /** The unique `root` node, or null when the graph is empty */
  getRootNode(): Promise<PersistedNode | null>;
  /** Direct children of a node, in document order */
  getChildren(nodeId: string): Promise<PersistedNode[]>;
}

function toLevel(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (isInt(value)) return value.toNumber();
  return undefined;
}

/**
 * Convert a driver value to a PersistedNode
 */
export function parsePersistedNode(value: unknown): PersistedNode {
  if (!isNode(value)) {
    throw new MdGraphError('data', 'Expected a graph node in query result');
  }

  const { id, type, content, level } = value.properties;
  if (typeof id !== 'string' || typeof type !== 'string') {
    throw new MdGraphError('data', `Stored node is missing its id or type: ${JSON.stringify(value.properties)}`);
  }

  const node: PersistedNode = { id, type, content: typeof content === 'string' ? content : '' };
  const parsedLevel = toLevel(level);
  if (parsedLevel !== undefined) node.level = parsedLevel;
  return node;
}

export class Neo4jGraphStore implements GraphStore {
  constructor(private readonly runner: CypherRunner) {}

  async getRootNode(): Promise<PersistedNode | null> {
    const result = await this.runner.run(
      `
      MATCH (n:${NODE_LABEL} {type: 'root'})
      RETURN n
      LIMIT 1
      `
    );

    if (result.records.length === 0) {
      return null;
    }
    return parsePersistedNode(result.records[0].get('n'));
  }

  async getChildren(nodeId: string): Promise<PersistedNode[]> {
    // ids are assigned in pre-order, so their numeric suffix is document order
    const result = await this.runner.run(
      `
      MATCH (parent:${NODE_LABEL} {id: $nodeId})-[:${CONTAINS}]->(child:${NODE_LABEL})
      RETURN child
      ORDER BY toInteger(split(child.id, '_')[1]), child.id
      `,
      { nodeId }
    );

    return result.records.map(record => parsePersistedNode(record.get('child')));
  }
}
