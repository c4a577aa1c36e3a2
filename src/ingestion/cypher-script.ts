/**
 * Cypher Script renderer
 *
 * Renders the statements for a tree as a standalone script that can be
 * piped into cypher-shell. Nothing is executed.
 */

import type { TreeNode } from '../runtime/types/tree.js';
import { CONTAINS, NODE_LABEL } from '../runtime/types/tree.js';
import { buildGraphStatements, type GraphStatement } from './graph-statements.js';

/**
 * Escape a value for use inside a single-quoted Cypher string literal
 */
export function escapeCypherString(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/'/g, "\\'")
    .replace(/\n/g, '\\n')
    .replace(/\r/g, '\\r');
}

function renderStatement(statement: GraphStatement): string {
  switch (statement.kind) {
    case 'wipe':
      return 'MATCH (n) DETACH DELETE n;';

    case 'node': {
      const { id, type, content, level } = statement.node;
      const props = [
        `id: '${escapeCypherString(id)}'`,
        `type: '${escapeCypherString(type)}'`,
        `content: '${escapeCypherString(content)}'`,
      ];
      if (level !== undefined) props.push(`level: ${level}`);
      return `CREATE (${id}:${NODE_LABEL} {${props.join(', ')}});`;
    }

    case 'edge':
      return [
        `MATCH (parent:${NODE_LABEL} {id: '${escapeCypherString(statement.parentId)}'})`,
        `MATCH (child:${NODE_LABEL} {id: '${escapeCypherString(statement.childId)}'})`,
        `CREATE (parent)-[:${CONTAINS}]->(child);`,
      ].join('\n');
  }
}

export function generateCypherScript(root: TreeNode): string {
  const statements = buildGraphStatements(root);
  const section = (kind: GraphStatement['kind']) =>
    statements.filter(s => s.kind === kind).map(renderStatement);

  return [
    '// Clear existing graph',
    ...section('wipe'),
    '',
    '// Create nodes',
    ...section('node'),
    '',
    '// Create relationships',
    ...section('edge'),
  ].join('\n');
}
