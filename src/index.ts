/**
 * mdgraph - Markdown documents as Neo4j graphs
 */

export { MarkdownTreeBuilder, createRootNode, inlineText } from './ingestion/markdown-tree.js';
export { walkTree, assignNodeIds, nodeId, type TreeEdge } from './ingestion/tree-walk.js';
export {
  buildGraphStatements,
  toCypherQuery,
  type GraphStatement,
  type CypherQuery,
} from './ingestion/graph-statements.js';
export { GraphWriter, type WriteStats, type TransactionalRunner } from './ingestion/graph-writer.js';
export { generateCypherScript, escapeCypherString } from './ingestion/cypher-script.js';

export { Neo4jClient, type CypherRunner, type CypherResult, type QueryParams } from './runtime/client/neo4j-client.js';
export { Neo4jGraphStore, parsePersistedNode, type GraphStore } from './runtime/graph/neo4j-graph-store.js';
export { GraphTraversal, renderNode } from './runtime/traversal/graph-traversal.js';
export * from './runtime/types/index.js';
export { Logger, levelFromVerbosity, type LogLevel, type LoggerOptions } from './runtime/utils/logger.js';
export { MdGraphError, ConfigError, getErrorMessage, type MdGraphErrorKind } from './runtime/utils/errors.js';

export {
  resolveNeo4jCredentials,
  DEFAULT_NEO4J_URI,
  DEFAULT_NEO4J_USERNAME,
  DEFAULT_NEO4J_PASSWORD,
  type Env,
} from './config/credentials.js';
export { loadConfigFile, parseConfigFile, interpolateEnv } from './config/loader.js';
