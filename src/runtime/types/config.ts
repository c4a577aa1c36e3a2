/**
 * Runtime Configuration Types
 */

export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  /** Target database (server default when omitted) */
  database?: string;
}

/**
 * Shape of the optional YAML configuration file
 */
export interface MdGraphConfigFile {
  neo4j?: Partial<Neo4jConfig>;
}
