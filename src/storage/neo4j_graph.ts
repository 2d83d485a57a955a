/**
 * @fileoverview Neo4j-backed graph store
 *
 * One driver and one session per chat session: `open()` acquires both,
 * `close()` releases both. Lookups never re-open the connection.
 */

import neo4j, { type Driver, type Session } from 'neo4j-driver';
import { StoreError } from '../core/errors.js';
import { logDebug } from '../telemetry/logger.js';
import { toError } from '../utils/errors.js';
import type { GraphNeighborRow, GraphStats, GraphStore } from './types.js';

export interface Neo4jGraphOptions {
  uri: string;
  user: string;
  password: string;
  database?: string;
}

export const OUTGOING_QUERY = `
  MATCH (source {id: $entityId})-[r]->(target)
  RETURN target.id AS id, target.name AS name,
         target.description AS description, type(r) AS relation
  LIMIT $limit
`;

const LABEL_COUNTS_QUERY = 'MATCH (n) RETURN labels(n) AS labels, count(n) AS count ORDER BY count DESC';
const TOTAL_NODES_QUERY = 'MATCH (n) RETURN count(n) AS total';
const RELATION_COUNTS_QUERY = 'MATCH ()-[r]->() RETURN type(r) AS type, count(r) AS count ORDER BY count DESC';

function asText(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === null || value === undefined) return '';
  return String(value);
}

function asCount(value: unknown): number {
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  return 0;
}

function asStringList(value: unknown): string[] {
  return Array.isArray(value) ? value.map(asText) : [];
}

export class Neo4jGraphStore implements GraphStore {
  private driver: Driver | null = null;
  private session: Session | null = null;

  constructor(private readonly options: Neo4jGraphOptions) {}

  async open(): Promise<void> {
    if (this.session) return;
    const driver = neo4j.driver(
      this.options.uri,
      neo4j.auth.basic(this.options.user, this.options.password),
      { disableLosslessIntegers: true },
    );
    try {
      await driver.verifyConnectivity();
    } catch (error) {
      await driver.close();
      const cause = toError(error);
      throw new StoreError('graph', 'connect', true, `${this.options.uri}: ${cause.message}`, cause);
    }
    this.driver = driver;
    this.session = driver.session({
      database: this.options.database,
      defaultAccessMode: neo4j.session.READ,
    });
    logDebug('graph session opened', { uri: this.options.uri });
  }

  private requireSession(): Session {
    if (!this.session) {
      throw new StoreError('graph', 'query', false, 'session is not open');
    }
    return this.session;
  }

  async outgoing(entityId: string, limit: number): Promise<GraphNeighborRow[]> {
    const session = this.requireSession();
    try {
      const result = await session.run(OUTGOING_QUERY, { entityId, limit: neo4j.int(limit) });
      return result.records.map((record) => {
        const description: unknown = record.get('description');
        return {
          targetId: asText(record.get('id')),
          targetName: asText(record.get('name')),
          targetDescription: typeof description === 'string' ? description : null,
          relation: asText(record.get('relation')),
        };
      });
    } catch (error) {
      const cause = toError(error);
      throw new StoreError('graph', 'query', true, `expanding ${entityId}: ${cause.message}`, cause);
    }
  }

  async stats(): Promise<GraphStats> {
    const session = this.requireSession();
    try {
      const labelResult = await session.run(LABEL_COUNTS_QUERY);
      const totalResult = await session.run(TOTAL_NODES_QUERY);
      const relationResult = await session.run(RELATION_COUNTS_QUERY);
      const relationTypes = relationResult.records.map((record) => ({
        type: asText(record.get('type')),
        count: asCount(record.get('count')),
      }));
      return {
        totalNodes: asCount(totalResult.records[0]?.get('total')),
        totalRelationships: relationTypes.reduce((sum, entry) => sum + entry.count, 0),
        labels: labelResult.records.map((record) => ({
          labels: asStringList(record.get('labels')),
          count: asCount(record.get('count')),
        })),
        relationTypes,
      };
    } catch (error) {
      const cause = toError(error);
      throw new StoreError('graph', 'describe', true, cause.message, cause);
    }
  }

  async close(): Promise<void> {
    const session = this.session;
    const driver = this.driver;
    this.session = null;
    this.driver = null;
    try {
      if (session) await session.close();
    } finally {
      if (driver) await driver.close();
    }
    if (driver) logDebug('graph session closed');
  }
}
