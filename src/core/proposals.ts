/**
 * Proposal Generator
 *
 * One inert proposal per detected change. Candidate roles and suggested
 * entities are hints for the person deciding; nothing here touches
 * configuration.
 */

import { createHash } from 'node:crypto';
import type { SemanticRegistry } from './registry.js';
import { assertNever } from './types.js';
import type {
  ChangeSet,
  DecisionOutcome,
  DetectedChange,
  Proposal,
  ProposalState,
} from './types.js';

/** Deterministic 12-char id for a (tool, rawConceptId) pair */
export function proposalId(tool: string, rawConceptId: string): string {
  const hash = createHash('sha256').update(`${tool}\u0000${rawConceptId}`).digest('hex');
  return `p-${hash.substring(0, 12)}`;
}

/** "+Needs Review" -> "needs-review" */
export function slugify(rawLabel: string): string {
  return rawLabel
    .toLowerCase()
    .replace(/^[^a-z0-9]+/, '')
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/-+$/, '');
}

function suggestEntity(change: DetectedChange, registry: SemanticRegistry): string | null {
  if (change.kind === 'changed') {
    return change.currentEntityId;
  }

  const candidate = registry.lookup(slugify(change.entity.rawLabel));
  if (!candidate) return null;
  if (change.roleHint && candidate.role !== change.roleHint) return null;
  return candidate.id;
}

export function generate(changeSet: ChangeSet, registry: SemanticRegistry): Proposal[] {
  return changeSet.changes.map((change) => ({
    id: proposalId(change.tool, change.rawConceptId),
    kind: change.kind,
    tool: change.tool,
    rawConceptId: change.rawConceptId,
    rawLabel: change.entity.rawLabel,
    candidateRole: change.roleHint ?? 'unknown',
    suggestedEntityId: suggestEntity(change, registry),
    affectedProjects: [...change.affectedProjects],
  }));
}

export function stateAfter(outcomeType: DecisionOutcome['type']): ProposalState {
  switch (outcomeType) {
    case 'accept':
    case 'create':
      return 'accepted';
    case 'ignore':
      return 'ignored';
    case 'defer':
      return 'deferred';
    default:
      return assertNever(outcomeType);
  }
}
