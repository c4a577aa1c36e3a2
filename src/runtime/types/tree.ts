/**
 * Document tree and persisted graph types
 */

export type TreeNodeType = 'root' | 'heading' | 'paragraph';

/**
 * In-memory node produced by the tree builder.
 *
 * Children are owned by their parent's `children` array; parent lookups go
 * through the (parent, child) pairs yielded by `walkTree`.
 */
export interface TreeNode {
  type: TreeNodeType;
  content: string;
  /** Heading level 1-6, headings only */
  level?: number;
  children: TreeNode[];
  /** Assigned right before the tree is written ("node_N") */
  id?: string;
}

/**
 * Node as stored in Neo4j (`:Node`)
 */
export interface PersistedNode {
  id: string;
  type: string;
  content: string;
  level?: number;
}

export const NODE_LABEL = 'Node';
export const CONTAINS = 'CONTAINS';
