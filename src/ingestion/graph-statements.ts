/**
 * Graph Statements
 *
 * The ordered wipe / create-node / create-edge list for a document tree.
 * The live writer turns it into parameterised queries, the script renderer
 * into Cypher text, so both output modes share the same ids and ordering.
 */

import type { PersistedNode, TreeNode } from '../runtime/types/tree.js';
import { CONTAINS, NODE_LABEL } from '../runtime/types/tree.js';
import { assignNodeIds, walkTree } from './tree-walk.js';

export type GraphStatement =
  | { kind: 'wipe' }
  | { kind: 'node'; node: PersistedNode }
  | { kind: 'edge'; parentId: string; childId: string };

export interface CypherQuery {
  query: string;
  params: Record<string, unknown>;
}

function requireId(node: TreeNode): string {
  if (!node.id) {
    throw new Error(`Tree node "${node.content}" has no id assigned`);
  }
  return node.id;
}

function toPersistedNode(node: TreeNode): PersistedNode {
  const persisted: PersistedNode = { id: requireId(node), type: node.type, content: node.content };
  if (node.type === 'heading' && node.level !== undefined) {
    persisted.level = node.level;
  }
  return persisted;
}

/**
 * Assign ids and list every statement needed to replace the stored graph
 */
export function buildGraphStatements(root: TreeNode): GraphStatement[] {
  assignNodeIds(root);

  const statements: GraphStatement[] = [{ kind: 'wipe' }];

  statements.push({ kind: 'node', node: toPersistedNode(root) });
  for (const { child } of walkTree(root)) {
    statements.push({ kind: 'node', node: toPersistedNode(child) });
  }

  for (const { parent, child } of walkTree(root)) {
    statements.push({ kind: 'edge', parentId: requireId(parent), childId: requireId(child) });
  }

  return statements;
}

/**
 * Parameterised query for one statement
 */
export function toCypherQuery(statement: GraphStatement): CypherQuery {
  switch (statement.kind) {
    case 'wipe':
      return { query: 'MATCH (n) DETACH DELETE n', params: {} };

    case 'node':
      return {
        query: `CREATE (n:${NODE_LABEL} {id: $id, type: $type, content: $content, level: $level})`,
        params: {
          id: statement.node.id,
          type: statement.node.type,
          content: statement.node.content,
          // a null property is simply not stored
          level: statement.node.level ?? null,
        },
      };

    case 'edge':
      return {
        query: `
        MATCH (parent:${NODE_LABEL} {id: $parentId})
        MATCH (child:${NODE_LABEL} {id: $childId})
        CREATE (parent)-[:${CONTAINS}]->(child)
        `,
        params: { parentId: statement.parentId, childId: statement.childId },
      };
  }
}
