/**
 * Runtime Type Exports
 */

export type { Neo4jConfig, MdGraphConfigFile } from './config.js';
export type { TreeNode, TreeNodeType, PersistedNode } from './tree.js';
export { NODE_LABEL, CONTAINS } from './tree.js';
