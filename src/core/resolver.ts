/**
 * Configuration Merge Resolver
 *
 * Two-level lookup: the project's override first, then the global default.
 * Configurations are never flattened, so every answer keeps its provenance.
 */

import {
  EXPLICIT_NONE,
  UNMAPPED,
  type DefaultMapping,
  type ExplainedResolution,
  type GlobalConfiguration,
  type MappingKey,
  type OverrideEntry,
  type ProjectConfiguration,
  type Resolution,
  type SemanticEntity,
  type SemanticRole,
} from './types.js';
import type { SemanticRegistry } from './registry.js';

export function mappingKey(tool: string, rawConceptId: string): string {
  return `${tool}\u0000${rawConceptId}`;
}

export function keyOf(entry: MappingKey): string {
  return mappingKey(entry.tool, entry.rawConceptId);
}

export function resolutionEntityId(resolution: Resolution): string | null {
  return typeof resolution === 'object' ? resolution.entityId : null;
}

/** Per-project view used by the normalizer and by plugins */
export interface EffectiveMapping {
  readonly projectId: string;
  resolve(tool: string, rawConceptId: string): Resolution;
  explain(tool: string, rawConceptId: string): ExplainedResolution;
  lookup(entityId: string): SemanticEntity | undefined;
}

export class MergeResolver {
  private defaults: Map<string, DefaultMapping>;
  private overrides = new Map<string, Map<string, OverrideEntry>>();

  constructor(
    global: GlobalConfiguration,
    projects: Iterable<ProjectConfiguration>,
    private registry?: SemanticRegistry,
  ) {
    // Defaults are append-only; the first entry for a key is authoritative
    this.defaults = new Map();
    for (const mapping of global.defaultMappings) {
      const key = keyOf(mapping);
      if (!this.defaults.has(key)) {
        this.defaults.set(key, mapping);
      }
    }

    for (const project of projects) {
      this.overrides.set(
        project.projectId,
        new Map(project.overrides.map((o) => [keyOf(o), o])),
      );
    }
  }

  resolve(projectId: string, tool: string, rawConceptId: string): Resolution {
    return this.explain(projectId, tool, rawConceptId).resolution;
  }

  explain(projectId: string, tool: string, rawConceptId: string): ExplainedResolution {
    const key = mappingKey(tool, rawConceptId);

    const override = this.overrides.get(projectId)?.get(key);
    if (override) {
      const resolution: Resolution =
        override.target === EXPLICIT_NONE ? EXPLICIT_NONE : { entityId: override.target.entityId };
      return { resolution, source: 'project' };
    }

    const fallback = this.defaults.get(key);
    if (fallback) {
      return { resolution: { entityId: fallback.entityId }, source: 'global' };
    }

    return { resolution: UNMAPPED, source: 'none' };
  }

  /** True when the project has no override and a global default exists */
  inheritsDefault(projectId: string, tool: string, rawConceptId: string): boolean {
    return this.explain(projectId, tool, rawConceptId).source === 'global';
  }

  hasProject(projectId: string): boolean {
    return this.overrides.has(projectId);
  }

  projectIds(): string[] {
    return [...this.overrides.keys()];
  }

  /** Role of the entity a concept resolves to, when the registry knows it */
  mappedRole(projectId: string, tool: string, rawConceptId: string): SemanticRole | undefined {
    const entityId = resolutionEntityId(this.resolve(projectId, tool, rawConceptId));
    if (entityId === null) return undefined;
    return this.registry?.lookup(entityId)?.role;
  }

  forProject(projectId: string): EffectiveMapping {
    return {
      projectId,
      resolve: (tool, rawConceptId) => this.resolve(projectId, tool, rawConceptId),
      explain: (tool, rawConceptId) => this.explain(projectId, tool, rawConceptId),
      lookup: (entityId) => this.registry?.lookup(entityId),
    };
  }

  /**
   * Every mapping visible to a project, overrides first, with provenance.
   * Used for display; lookups go through `explain`.
   */
  describeProject(projectId: string): Array<MappingKey & ExplainedResolution> {
    const rows: Array<MappingKey & ExplainedResolution> = [];
    const seen = new Set<string>();

    for (const override of this.overrides.get(projectId)?.values() ?? []) {
      seen.add(keyOf(override));
      rows.push({
        tool: override.tool,
        rawConceptId: override.rawConceptId,
        ...this.explain(projectId, override.tool, override.rawConceptId),
      });
    }

    for (const mapping of this.defaults.values()) {
      if (seen.has(keyOf(mapping))) continue;
      rows.push({
        tool: mapping.tool,
        rawConceptId: mapping.rawConceptId,
        resolution: { entityId: mapping.entityId },
        source: 'global',
      });
    }

    return rows;
  }
}
