/**
 * Decision Applicator
 *
 * Validates a decision against the registry and the proposal it answers,
 * then commits its consequences. A decision that creates an entity touches
 * two records (global vocabulary and project overrides); both land or
 * neither does.
 *
 * Lock order is always project, then global.
 */

import {
  ConfigConflictError,
  NotFoundError,
  PersistenceError,
  RoleConflictError,
  SemsyncError,
  StaleRecordError,
  ValidationError,
} from './errors.js';
import { getLogger } from './logger.js';
import { stateAfter } from './proposals.js';
import { SemanticRegistry } from './registry.js';
import { keyOf } from './resolver.js';
import { GLOBAL_RECORD, type ConfigStore, type GlobalRecord, type ProjectRecord } from '../store/config-store.js';
import {
  EXPLICIT_NONE,
  assertNever,
  err,
  ok,
  type AppliedDecision,
  type Decision,
  type GlobalConfiguration,
  type OverrideTarget,
  type ProjectConfiguration,
  type Proposal,
  type Result,
  type SemanticEntity,
} from './types.js';

const log = () => getLogger('applicator');

export type ApplyError =
  | RoleConflictError
  | ConfigConflictError
  | PersistenceError
  | ValidationError
  | NotFoundError;

/** True for failures that put the shared global record at risk */
export function isGlobalPersistenceFailure(error: Error): boolean {
  return error instanceof PersistenceError && error.record === GLOBAL_RECORD;
}

function withOverride(
  config: ProjectConfiguration,
  decision: Decision,
  target: OverrideTarget | null,
): ProjectConfiguration {
  const key = keyOf(decision);
  const overrides = config.overrides.filter((o) => keyOf(o) !== key);
  if (target !== null) {
    overrides.push({ tool: decision.tool, rawConceptId: decision.rawConceptId, target });
  }
  return {
    projectId: config.projectId,
    overrides,
    decisions: [...config.decisions, decision],
  };
}

function appendEntity(
  global: GlobalConfiguration,
  entity: SemanticEntity,
  defaultFor: Decision | null,
): GlobalConfiguration {
  const defaultMappings = [...global.defaultMappings];
  if (defaultFor && !defaultMappings.some((m) => keyOf(m) === keyOf(defaultFor))) {
    defaultMappings.push({
      tool: defaultFor.tool,
      rawConceptId: defaultFor.rawConceptId,
      entityId: entity.id,
    });
  }
  return {
    entities: [...global.entities, { ...entity }],
    defaultMappings,
  };
}

function toApplyError(error: unknown, record: string): ApplyError {
  if (
    error instanceof RoleConflictError ||
    error instanceof ConfigConflictError ||
    error instanceof PersistenceError ||
    error instanceof ValidationError ||
    error instanceof NotFoundError
  ) {
    return error;
  }
  if (error instanceof SemsyncError) {
    return new PersistenceError(record, error.message, { cause: error });
  }
  return new PersistenceError(record, 'Write failed', { cause: error });
}

export class DecisionApplicator {
  constructor(private store: ConfigStore) {}

  async apply(decision: Decision, proposal: Proposal): Promise<Result<AppliedDecision, ApplyError>> {
    try {
      this.validateAgainstProposal(decision, proposal);
      const applied = await this.store.withProjectLock(decision.projectId, () =>
        this.applyLocked(decision, proposal),
      );
      log().info(
        {
          project: decision.projectId,
          tool: decision.tool,
          concept: decision.rawConceptId,
          outcome: decision.outcome.type,
          projectVersion: applied.projectVersion,
        },
        'decision applied',
      );
      return ok(applied);
    } catch (error) {
      const applyError = toApplyError(error, `project:${decision.projectId}`);
      log().warn(
        {
          project: decision.projectId,
          tool: decision.tool,
          concept: decision.rawConceptId,
          outcome: decision.outcome.type,
          err: applyError.message,
        },
        'decision rejected',
      );
      return err(applyError);
    }
  }

  /**
   * Administrative removal of an override, the only way to lift an
   * ExplicitNone. Returns false when there was nothing to clear.
   */
  async clearOverride(projectId: string, tool: string, rawConceptId: string): Promise<boolean> {
    return this.store.withProjectLock(projectId, async () => {
      const record = await this.store.readProject(projectId);
      const key = keyOf({ tool, rawConceptId });
      const overrides = record.data.overrides.filter((o) => keyOf(o) !== key);
      if (overrides.length === record.data.overrides.length) {
        return false;
      }
      await this.store.commitProject(record.version, { ...record.data, overrides });
      log().info({ project: projectId, tool, concept: rawConceptId }, 'override cleared');
      return true;
    });
  }

  private validateAgainstProposal(decision: Decision, proposal: Proposal): void {
    if (decision.proposalId !== proposal.id) {
      throw new ValidationError(`Decision answers ${decision.proposalId}, not proposal ${proposal.id}`);
    }
    if (decision.tool !== proposal.tool || decision.rawConceptId !== proposal.rawConceptId) {
      throw new ValidationError(
        `Decision concept ${decision.tool}/${decision.rawConceptId} does not match proposal ${proposal.id}`,
      );
    }
    if (!proposal.affectedProjects.includes(decision.projectId)) {
      throw new ValidationError(
        `Project "${decision.projectId}" is not affected by proposal ${proposal.id}`,
      );
    }
  }

  private async applyLocked(decision: Decision, proposal: Proposal): Promise<AppliedDecision> {
    const project = await this.store.readProject(decision.projectId);
    this.assertOpen(project, decision, proposal);

    const { outcome } = decision;
    switch (outcome.type) {
      case 'accept': {
        const global = await this.store.readGlobal();
        const registry = SemanticRegistry.fromGlobal(global.data);
        const entity = registry.lookup(outcome.entityId);
        if (!entity) {
          throw new NotFoundError(`Entity "${outcome.entityId}" is not registered`, {
            fix: 'Create the entity with a create decision, or pick an existing one.',
          });
        }
        const expectedRole = outcome.expectedRole ?? proposal.candidateRole;
        if (expectedRole !== 'unknown' && entity.role !== expectedRole) {
          throw new RoleConflictError(entity.id, entity.role, expectedRole);
        }
        const saved = await this.store.commitProject(
          project.version,
          withOverride(project.data, decision, { entityId: entity.id }),
        );
        return this.applied(decision, global.version, saved.version);
      }

      case 'create':
        return this.applyCreate(decision, outcome.entity, outcome.promoteDefault ?? false, project);

      case 'ignore': {
        const saved = await this.store.commitProject(
          project.version,
          withOverride(project.data, decision, EXPLICIT_NONE),
        );
        const global = await this.store.readGlobal();
        return this.applied(decision, global.version, saved.version);
      }

      case 'defer': {
        const saved = await this.store.commitProject(project.version, {
          ...project.data,
          decisions: [...project.data.decisions, decision],
        });
        const global = await this.store.readGlobal();
        return this.applied(decision, global.version, saved.version);
      }

      default:
        return assertNever(outcome);
    }
  }

  /**
   * Accepted and ignored tuples are terminal while their override stands.
   * Changed proposals reopen a mapped concept and may replace the override.
   */
  private assertOpen(project: ProjectRecord, decision: Decision, proposal: Proposal): void {
    if (proposal.kind === 'changed') return;

    const key = keyOf(decision);
    const override = project.data.overrides.find((o) => keyOf(o) === key);
    if (override) {
      const state = override.target === EXPLICIT_NONE ? 'ignored' : 'accepted';
      throw new ValidationError(
        `${decision.tool}/${decision.rawConceptId} is already ${state} in project "${decision.projectId}"`,
        { fix: `Clear the override first: semsync clear ${decision.projectId} ${decision.tool} ${decision.rawConceptId}` },
      );
    }
  }

  private async applyCreate(
    decision: Decision,
    entity: SemanticEntity,
    promoteDefault: boolean,
    project: ProjectRecord,
  ): Promise<AppliedDecision> {
    // Optimistic read outside the global lock; the commit below is a
    // compare-and-append against this version.
    let global = await this.store.readGlobal();
    this.assertCreatable(global, entity);

    return this.store.withGlobalLock(async () => {
      let committed: GlobalRecord | null = null;
      let previous = global;

      for (let attempt = 0; attempt < 2 && committed === null; attempt++) {
        try {
          previous = global;
          committed = await this.store.commitGlobal(
            global.version,
            appendEntity(global.data, entity, promoteDefault ? decision : null),
          );
        } catch (error) {
          if (!(error instanceof StaleRecordError)) {
            throw toGlobalError(error);
          }
          log().debug(
            { entity: entity.id, expected: error.expectedVersion, actual: error.actualVersion },
            'global record moved, re-reading',
          );
          if (attempt > 0) {
            throw new ConfigConflictError(entity.id);
          }
          global = await this.store.readGlobal();
          if (global.data.entities.some((e) => e.id === entity.id)) {
            this.assertCreatable(global, entity, true);
          }
        }
      }

      if (committed === null) {
        throw new ConfigConflictError(entity.id);
      }
      const appended = committed;

      try {
        const saved = await this.store.commitProject(
          project.version,
          withOverride(project.data, decision, { entityId: entity.id }),
        );
        return this.applied(decision, appended.version, saved.version);
      } catch (error) {
        const reverted = await this.store
          .revertGlobal(appended.version, previous.data)
          .catch((revertError: unknown) => {
            throw new PersistenceError(GLOBAL_RECORD, 'Rollback failed', { cause: revertError });
          });
        log().warn(
          { project: decision.projectId, entity: entity.id, revertedTo: previous.version, version: reverted.version },
          'project write failed, global record rolled back',
        );
        throw toApplyError(error, `project:${decision.projectId}`);
      }
    });
  }

  /**
   * An existing id with another role is a role conflict; with the same role
   * it is a conflicting create (the caller should accept it instead).
   */
  private assertCreatable(global: GlobalRecord, entity: SemanticEntity, raced = false): void {
    const registry = SemanticRegistry.fromGlobal(global.data);
    const existing = registry.lookup(entity.id);
    if (!existing) return;

    if (existing.role !== entity.role) {
      throw new RoleConflictError(entity.id, existing.role, entity.role);
    }
    throw new ConfigConflictError(
      entity.id,
      raced
        ? `Entity "${entity.id}" was registered concurrently`
        : `Entity "${entity.id}" already exists`,
    );
  }

  private applied(decision: Decision, globalVersion: number, projectVersion: number): AppliedDecision {
    return {
      decision,
      state: stateAfter(decision.outcome.type),
      globalVersion,
      projectVersion,
    };
  }
}

function toGlobalError(error: unknown): ApplyError {
  if (error instanceof PersistenceError) return error;
  return new PersistenceError(GLOBAL_RECORD, 'Global commit failed', { cause: error });
}
