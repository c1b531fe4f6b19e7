import { SchemaError } from '../core/errors.js';
import { getAssociations, type Association } from './association.js';
import { qualifiedName, type RelationDef } from './table.js';

/**
 * Registry of relation descriptors for one schema.
 *
 * Associations are resolved when a relation is registered, so a broken foreign
 * key fails at registration time instead of during the first join. After
 * registration the registry is only read.
 */
export class SchemaRegistry {
  private readonly relations = new Map<string, RelationDef>();
  /** Reverse lookup: parent qualified name → associations pointing at it */
  private readonly incoming = new Map<string, Association[]>();

  register(...relations: RelationDef[]): this {
    for (const relation of relations) {
      const key = qualifiedName(relation);
      const existing = this.relations.get(key);
      if (existing === relation) continue;
      if (existing) {
        throw new SchemaError(`Relation '${key}' is already registered`, { relation: key });
      }
      const outgoing = getAssociations(relation);
      this.relations.set(key, relation);
      for (const association of outgoing) {
        const parentKey = qualifiedName(association.parent);
        const bucket = this.incoming.get(parentKey) ?? [];
        bucket.push(association);
        this.incoming.set(parentKey, bucket);
      }
    }
    return this;
  }

  has(name: string): boolean {
    return this.relations.has(name);
  }

  /**
   * Looks a relation up by qualified name.
   */
  get(name: string): RelationDef {
    const relation = this.relations.get(name);
    if (!relation) {
      throw new SchemaError(`Relation '${name}' is not registered`, { relation: name });
    }
    return relation;
  }

  list(): RelationDef[] {
    return [...this.relations.values()];
  }

  outgoingAssociations(child: RelationDef): readonly Association[] {
    return getAssociations(child);
  }

  /**
   * Associations in which `parent` is the parent side, in registration order.
   */
  incomingAssociations(parent: RelationDef): readonly Association[] {
    return this.incoming.get(qualifiedName(parent)) ?? [];
  }
}

export const createSchema = (...relations: RelationDef[]): SchemaRegistry =>
  new SchemaRegistry().register(...relations);
