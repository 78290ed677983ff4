/**
 * Change Detector
 *
 * Compares a discovery snapshot against the registry and the merged
 * configuration. Concepts that are unclassified, flagged by their plugin, or
 * left open by an earlier deferral become changes; everything already
 * decided is left alone.
 */

import { getLogger } from './logger.js';
import { MergeResolver, keyOf, mappingKey } from './resolver.js';
import type { SemanticRegistry } from './registry.js';
import {
  EXPLICIT_NONE,
  UNMAPPED,
  compareStrings,
  type ChangeKind,
  type ChangeSet,
  type Decision,
  type DetectedChange,
  type DiscoverySnapshot,
  type GlobalConfiguration,
  type Observation,
  type ProjectConfiguration,
  type SemanticRole,
} from './types.js';

const log = () => getLogger('detector');

export interface DetectorConfigs {
  global: GlobalConfiguration;
  projects: ProjectConfiguration[];
}

const KIND_PRECEDENCE: Record<ChangeKind, number> = {
  changed: 3,
  new: 2,
  reopened: 1,
};

interface Classification {
  kind: ChangeKind;
  reason: string;
  currentEntityId: string | null;
  inheritedDefault: boolean;
}

interface PendingChange {
  observation: Observation;
  kind: ChangeKind;
  reason: string;
  currentEntityId: string | null;
  roleHint: SemanticRole | null;
  projects: Set<string>;
  inheritedDefault: boolean;
}

/** Latest decision per (project, tool, concept) */
export function latestDecisions(projects: ProjectConfiguration[]): Map<string, Decision> {
  const latest = new Map<string, Decision>();
  for (const project of projects) {
    for (const decision of project.decisions) {
      latest.set(`${project.projectId}\u0000${mappingKey(decision.tool, decision.rawConceptId)}`, decision);
    }
  }
  return latest;
}

function classify(
  observation: Observation,
  resolver: MergeResolver,
  registry: SemanticRegistry,
  latest: Map<string, Decision>,
): Classification | null {
  const { projectId, entity } = observation;
  const explained = resolver.explain(projectId, entity.tool, entity.rawConceptId);
  const { resolution } = explained;

  if (resolution === EXPLICIT_NONE) {
    return null;
  }

  if (resolution === UNMAPPED) {
    const previous = latest.get(`${projectId}\u0000${keyOf(entity)}`);
    if (previous?.outcome.type === 'defer') {
      return { kind: 'reopened', reason: 'deferred earlier', currentEntityId: null, inheritedDefault: false };
    }
    return { kind: 'new', reason: 'no mapping', currentEntityId: null, inheritedDefault: false };
  }

  const inheritedDefault = explained.source === 'global';
  const entityId = resolution.entityId;

  if (!registry.has(entityId)) {
    return {
      kind: 'changed',
      reason: `mapped to unknown entity "${entityId}"`,
      currentEntityId: entityId,
      inheritedDefault,
    };
  }

  if (observation.conflict) {
    return {
      kind: 'changed',
      reason: `usage conflicts with role of "${entityId}"`,
      currentEntityId: entityId,
      inheritedDefault,
    };
  }

  return null;
}

/**
 * Detect new and changed semantics. One change per distinct
 * (tool, rawConceptId), carrying every affected project. Output order is
 * stable, so identical inputs give identical change sets.
 */
export function detect(
  snapshot: DiscoverySnapshot,
  registry: SemanticRegistry,
  configs: DetectorConfigs,
): ChangeSet {
  const resolver = new MergeResolver(configs.global, configs.projects, registry);
  const latest = latestDecisions(configs.projects);
  const pending = new Map<string, PendingChange>();

  for (const observation of snapshot.observations) {
    const classification = classify(observation, resolver, registry, latest);
    if (!classification) continue;

    const key = keyOf(observation.entity);
    const existing = pending.get(key);

    if (!existing) {
      pending.set(key, {
        observation,
        kind: classification.kind,
        reason: classification.reason,
        currentEntityId: classification.currentEntityId,
        roleHint: observation.roleHint ?? null,
        projects: new Set([observation.projectId]),
        inheritedDefault: classification.inheritedDefault,
      });
      continue;
    }

    existing.projects.add(observation.projectId);
    existing.roleHint ??= observation.roleHint ?? null;
    existing.inheritedDefault ||= classification.inheritedDefault;
    if (KIND_PRECEDENCE[classification.kind] > KIND_PRECEDENCE[existing.kind]) {
      existing.kind = classification.kind;
      existing.reason = classification.reason;
      existing.currentEntityId = classification.currentEntityId;
    }
  }

  const knownProjects = new Set([
    ...configs.projects.map((p) => p.projectId),
    ...snapshot.observations.map((o) => o.projectId),
  ]);

  const changes: DetectedChange[] = [];
  for (const change of pending.values()) {
    const { entity } = change.observation;

    // A correction to an inherited default would ripple into every project
    // that inherits it, so those projects are affected too.
    if (change.kind === 'changed' && change.inheritedDefault) {
      for (const projectId of knownProjects) {
        if (resolver.inheritsDefault(projectId, entity.tool, entity.rawConceptId)) {
          change.projects.add(projectId);
        }
      }
    }

    changes.push({
      kind: change.kind,
      tool: entity.tool,
      rawConceptId: entity.rawConceptId,
      entity: { ...entity, attributes: { ...entity.attributes } },
      affectedProjects: [...change.projects].sort(),
      currentEntityId: change.currentEntityId,
      roleHint: change.roleHint,
      reason: change.reason,
    });
  }

  changes.sort(
    (a, b) => compareStrings(a.tool, b.tool) || compareStrings(a.rawConceptId, b.rawConceptId),
  );

  const affected = new Set(changes.flatMap((c) => c.affectedProjects));
  const changeSet: ChangeSet = {
    newEntities: changes.filter((c) => c.kind === 'new').map((c) => c.entity),
    affectedProjects: [...affected].sort(),
    changes,
    partialProjects: [...new Set(snapshot.partialProjects)].sort(),
  };

  log().debug(
    {
      observations: snapshot.observations.length,
      changes: changes.length,
      affected: changeSet.affectedProjects.length,
    },
    'change detection complete',
  );

  return changeSet;
}

