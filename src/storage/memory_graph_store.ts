import { StoreError, ValidationError } from '../core/errors.js';
import { isEntityType, isRelationType, type Entity } from '../types.js';
import type { GraphNeighborRow, GraphStats, GraphStore } from './types.js';

/** Entity as loaded from a fixture; the type tag is checked on insert. */
export type MemoryEntity = Omit<Entity, 'type'> & { type: string };

export interface MemoryRelationship {
  source: string;
  relation: string;
  target: string;
}

/**
 * Adjacency-list graph held in process memory.
 *
 * Stand-in for the graph database in tests. Tracks the connection lifecycle
 * so callers can assert the store was opened once and released.
 */
export class MemoryGraphStore implements GraphStore {
  private readonly nodes = new Map<string, Entity>();
  private readonly edges = new Map<string, MemoryRelationship[]>();
  openCount = 0;
  closeCount = 0;
  /** Entity ids passed to `outgoing`, in call order */
  readonly lookups: string[] = [];

  constructor(entities: MemoryEntity[] = [], relationships: MemoryRelationship[] = []) {
    for (const entity of entities) this.addEntity(entity);
    for (const relationship of relationships) this.relate(relationship);
  }

  get isOpen(): boolean {
    return this.openCount > this.closeCount;
  }

  addEntity(entity: MemoryEntity): void {
    const { type } = entity;
    if (!isEntityType(type)) {
      throw new ValidationError('type', 'City, Attraction, Hotel or Activity', type);
    }
    this.nodes.set(entity.id, { ...entity, type });
  }

  relate(relationship: MemoryRelationship): void {
    if (!isRelationType(relationship.relation)) {
      throw new ValidationError('relation', 'UPPER_SNAKE_CASE relation tag', relationship.relation);
    }
    const list = this.edges.get(relationship.source) ?? [];
    list.push(relationship);
    this.edges.set(relationship.source, list);
  }

  async open(): Promise<void> {
    this.openCount += 1;
  }

  async outgoing(entityId: string, limit: number): Promise<GraphNeighborRow[]> {
    if (!this.isOpen) {
      throw new StoreError('graph', 'query', false, 'session is not open');
    }
    this.lookups.push(entityId);
    const rows: GraphNeighborRow[] = [];
    for (const edge of this.edges.get(entityId) ?? []) {
      const target = this.nodes.get(edge.target);
      if (!target) continue;
      rows.push({
        targetId: target.id,
        targetName: target.name,
        targetDescription: target.description.length > 0 ? target.description : null,
        relation: edge.relation,
      });
      if (rows.length >= limit) break;
    }
    return rows;
  }

  async stats(): Promise<GraphStats> {
    const labelCounts = new Map<string, number>();
    for (const node of this.nodes.values()) {
      labelCounts.set(node.type, (labelCounts.get(node.type) ?? 0) + 1);
    }
    const relationCounts = new Map<string, number>();
    let totalRelationships = 0;
    for (const list of this.edges.values()) {
      for (const edge of list) {
        totalRelationships += 1;
        relationCounts.set(edge.relation, (relationCounts.get(edge.relation) ?? 0) + 1);
      }
    }
    return {
      totalNodes: this.nodes.size,
      totalRelationships,
      labels: [...labelCounts]
        .map(([label, count]) => ({ labels: [label, 'Entity'], count }))
        .sort((a, b) => b.count - a.count),
      relationTypes: [...relationCounts]
        .map(([type, count]) => ({ type, count }))
        .sort((a, b) => b.count - a.count),
    };
  }

  async close(): Promise<void> {
    if (this.isOpen) this.closeCount += 1;
  }
}
