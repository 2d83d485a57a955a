/**
 * @fileoverview Graph Expander
 *
 * One-hop outgoing expansion of seed entities. Each id gets its own capped
 * lookup; results are concatenated in id order and never de-duplicated, so
 * a target reachable from two seeds appears twice.
 *
 * The single-id and multi-id forms share one cap (default 3) and one output
 * shape ({@link RelationFact}).
 */

import { StoreError, ValidationError } from '../core/errors.js';
import type { GraphNeighborRow, GraphStore } from '../storage/types.js';
import { logDebug } from '../telemetry/logger.js';
import { DESCRIPTION_BUDGET, type RelationFact } from '../types.js';
import { toError } from '../utils/errors.js';

export const DEFAULT_PER_ID_LIMIT = 3;

export class GraphExpander {
  constructor(private readonly store: GraphStore) {}

  async expand(entityIds: readonly string[], perIdLimit: number = DEFAULT_PER_ID_LIMIT): Promise<RelationFact[]> {
    assertLimit(perIdLimit);
    const facts: RelationFact[] = [];
    for (const entityId of entityIds) {
      facts.push(...(await this.lookup(entityId, perIdLimit)));
    }
    logDebug('graph expansion complete', { seeds: entityIds.length, facts: facts.length });
    return facts;
  }

  async expandOne(entityId: string, perIdLimit: number = DEFAULT_PER_ID_LIMIT): Promise<RelationFact[]> {
    assertLimit(perIdLimit);
    return this.lookup(entityId, perIdLimit);
  }

  private async lookup(entityId: string, limit: number): Promise<RelationFact[]> {
    let rows: GraphNeighborRow[];
    try {
      rows = await this.store.outgoing(entityId, limit);
    } catch (error) {
      if (error instanceof StoreError) throw error;
      const cause = toError(error);
      throw new StoreError('graph', 'query', true, `expanding ${entityId}: ${cause.message}`, cause);
    }
    return rows.slice(0, limit).map((row) => toRelationFact(entityId, row));
  }
}

function assertLimit(perIdLimit: number): void {
  if (!Number.isInteger(perIdLimit) || perIdLimit < 1) {
    throw new ValidationError('perIdLimit', 'integer >= 1', String(perIdLimit));
  }
}

export function toRelationFact(source: string, row: GraphNeighborRow): RelationFact {
  return {
    source,
    relation: row.relation,
    targetId: row.targetId,
    targetName: row.targetName,
    targetDescription: (row.targetDescription ?? '').slice(0, DESCRIPTION_BUDGET),
  };
}
