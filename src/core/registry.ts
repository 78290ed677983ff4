/**
 * Semantic Registry
 *
 * Global vocabulary of semantic entities. An entity's role is assigned when it
 * is first registered and never changes afterwards.
 */

import { RoleConflictError, ValidationError } from './errors.js';
import {
  ALL_ROLES,
  isSemanticRole,
  ok,
  err,
  type GlobalConfiguration,
  type Result,
  type SemanticEntity,
  type SemanticRole,
} from './types.js';

export class SemanticRegistry {
  private entities = new Map<string, SemanticEntity>();

  constructor(entities: Iterable<SemanticEntity> = []) {
    for (const entity of entities) {
      const result = this.register(entity);
      if (!result.ok) {
        throw result.error;
      }
    }
  }

  static fromGlobal(config: GlobalConfiguration): SemanticRegistry {
    return new SemanticRegistry(config.entities);
  }

  /**
   * Add an entity. Registering the same id with the same role again is a
   * no-op; a different role is a conflict and leaves the registry unchanged.
   */
  register(entity: SemanticEntity): Result<void, RoleConflictError> {
    if (!isSemanticRole(entity.role)) {
      throw new ValidationError(`Unknown semantic role "${String(entity.role)}" for entity "${entity.id}"`);
    }
    if (entity.id.trim() === '') {
      throw new ValidationError('Entity id must not be empty');
    }

    const existing = this.entities.get(entity.id);
    if (existing) {
      if (existing.role !== entity.role) {
        return err(new RoleConflictError(entity.id, existing.role, entity.role));
      }
      return ok(undefined);
    }

    this.entities.set(entity.id, { ...entity });
    return ok(undefined);
  }

  lookup(entityId: string): SemanticEntity | undefined {
    const entity = this.entities.get(entityId);
    return entity ? { ...entity } : undefined;
  }

  has(entityId: string): boolean {
    return this.entities.has(entityId);
  }

  allRoles(): readonly SemanticRole[] {
    return ALL_ROLES;
  }

  /** Entities in registration order */
  snapshot(): SemanticEntity[] {
    return [...this.entities.values()].map((e) => ({ ...e }));
  }

  byRole(role: SemanticRole): SemanticEntity[] {
    return this.snapshot().filter((e) => e.role === role);
  }

  get size(): number {
    return this.entities.size;
  }
}

/**
 * Check that every entity of `previous` survives in `next` with the same role.
 * Returns the offending entity ids.
 */
export function findRoleViolations(
  previous: readonly SemanticEntity[],
  next: readonly SemanticEntity[],
): { missing: string[]; changed: string[] } {
  const nextById = new Map(next.map((e) => [e.id, e]));
  const missing: string[] = [];
  const changed: string[] = [];

  for (const entity of previous) {
    const later = nextById.get(entity.id);
    if (!later) {
      missing.push(entity.id);
    } else if (later.role !== entity.role) {
      changed.push(entity.id);
    }
  }

  return { missing, changed };
}
