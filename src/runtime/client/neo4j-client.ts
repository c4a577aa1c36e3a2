/**
 * Neo4j Client
 *
 * Thin wrapper over the driver: one driver per CLI command, a fresh session
 * per query, and explicit write transactions for multi-statement writes.
 * Callers must `close()` when done.
 */

import neo4j from 'neo4j-driver';
import type { Driver, Record as Neo4jRecord } from 'neo4j-driver';
import type { Neo4jConfig } from '../types/config.js';
import { MdGraphError, getErrorMessage } from '../utils/errors.js';
import type { Logger } from '../utils/logger.js';

export type QueryParams = Record<string, unknown>;

export interface CypherResult {
  records: Neo4jRecord[];
}

/**
 * Anything that can run a Cypher query: the client itself, or the
 * transaction handed to `executeWrite` work.
 */
export interface CypherRunner {
  run(query: string, params?: QueryParams): Promise<CypherResult>;
}

export class Neo4jClient implements CypherRunner {
  private readonly driver: Driver;
  private closed = false;

  constructor(
    private readonly config: Neo4jConfig,
    private readonly logger: Logger
  ) {
    this.driver = neo4j.driver(config.uri, neo4j.auth.basic(config.username, config.password), {
      disableLosslessIntegers: true,
    });
  }

  /**
   * Fail early when the server is unreachable or rejects the credentials
   */
  async verifyConnectivity(): Promise<void> {
    try {
      await this.driver.verifyConnectivity({ database: this.config.database });
      this.logger.info(`Connected to Neo4j at ${this.config.uri}`);
    } catch (error) {
      throw new MdGraphError(
        'connection',
        `Failed to connect to Neo4j at ${this.config.uri}: ${getErrorMessage(error)}`,
        { cause: error }
      );
    }
  }

  async run(query: string, params: QueryParams = {}): Promise<CypherResult> {
    this.logQuery(query, params);
    const session = this.driver.session({ database: this.config.database });
    try {
      return await session.run(query, params);
    } catch (error) {
      throw new MdGraphError('statement', `Query failed: ${getErrorMessage(error)}`, { cause: error });
    } finally {
      await session.close();
    }
  }

  /**
   * Run `work` inside a single write transaction.
   *
   * Every query issued through the given runner commits together, or none
   * does when `work` throws. The transaction is explicit, so the driver
   * never retries it.
   */
  async executeWrite<T>(work: (tx: CypherRunner) => Promise<T>): Promise<T> {
    const session = this.driver.session({
      database: this.config.database,
      defaultAccessMode: neo4j.session.WRITE,
    });
    const tx = session.beginTransaction();
    try {
      const result = await work({
        run: async (query, params = {}) => {
          this.logQuery(query, params);
          return await tx.run(query, params);
        },
      });
      await tx.commit();
      return result;
    } catch (error) {
      if (tx.isOpen()) {
        await tx.rollback().catch(rollbackError => {
          this.logger.warning(`Rollback failed: ${getErrorMessage(rollbackError)}`);
        });
      }
      if (error instanceof MdGraphError) throw error;
      throw new MdGraphError('statement', `Write transaction failed: ${getErrorMessage(error)}`, {
        cause: error,
      });
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.driver.close();
    this.logger.info('Disconnected from Neo4j');
  }

  private logQuery(query: string, params: QueryParams): void {
    this.logger.debug(`Executing query: ${query.trim()}`);
    if (this.logger.isEnabled('TRACE')) {
      this.logger.trace(`Parameters: ${JSON.stringify(params)}`);
    }
  }
}
