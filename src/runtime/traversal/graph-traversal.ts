/**
 * Graph Traversal
 *
 * Walks a stored document graph depth-first from its root and renders it
 * back into Markdown. Every rendered block is followed by a blank line.
 */

import type { GraphStore } from '../graph/neo4j-graph-store.js';
import type { PersistedNode } from '../types/tree.js';
import type { Logger } from '../utils/logger.js';

/**
 * Markdown for a single node, or null for node types that render nothing
 */
export function renderNode(node: PersistedNode): string | null {
  switch (node.type) {
    case 'heading':
      return `${'#'.repeat(node.level ?? 1)} ${node.content}`;
    case 'paragraph':
      return node.content;
    default:
      return null;
  }
}

export class GraphTraversal {
  constructor(
    private readonly store: GraphStore,
    private readonly logger: Logger
  ) {}

  async traverseToMarkdown(): Promise<string> {
    this.logger.info('Traversing graph');

    const root = await this.store.getRootNode();
    if (!root) {
      this.logger.error('Root node not found in graph');
      return '';
    }

    const blocks: string[] = [];
    const stack: PersistedNode[] = [root];

    while (stack.length > 0) {
      const node = stack.pop();
      if (!node) break;

      if (node !== root) {
        const block = renderNode(node);
        if (block !== null) blocks.push(block);
      }

      const children = await this.store.getChildren(node.id);
      this.logger.trace(`${node.id}: ${children.length} children`);
      // reversed so the first child is popped next
      for (let i = children.length - 1; i >= 0; i--) {
        stack.push(children[i]);
      }
    }

    this.logger.debug(`Rendered ${blocks.length} blocks`);
    return blocks.map(block => `${block}\n\n`).join('');
  }
}
