/**
 * semsync Mediation Engine
 *
 * One run: parallel discovery per tool, change detection, proposal
 * generation, decision collection and application.
 */

import { DecisionApplicator, isGlobalPersistenceFailure } from './applicator.js';
import { collectDecisions, fanOut } from './decisions.js';
import { detect } from './detector.js';
import { NotFoundError, PluginDiscoveryError, toError } from './errors.js';
import { getLogger } from './logger.js';
import { normalizeAll } from './normalizer.js';
import { generate } from './proposals.js';
import { SemanticRegistry } from './registry.js';
import { assertNever, compareStrings } from './types.js';
import { MergeResolver } from './resolver.js';
import type { ConfigStore, GlobalRecord, ProjectRecord } from '../store/config-store.js';
import type { ProjectBinding } from '../store/schema.js';
import type {
  AppliedDecision,
  CIFTask,
  ChangeSet,
  Decision,
  DecisionSource,
  DiscoveryFailure,
  DiscoveryPlugin,
  DiscoverySnapshot,
  ExplainedResolution,
  FailedDecision,
  Observation,
  Proposal,
  RawTaskRecord,
  RunOptions,
  RunResult,
} from './types.js';

const log = () => getLogger('engine');

export interface MediationEngineOptions {
  store: ConfigStore;
  plugins: Iterable<DiscoveryPlugin>;
  projects: ProjectBinding[];
}

export interface EngineState {
  global: GlobalRecord;
  registry: SemanticRegistry;
  projects: ProjectRecord[];
  resolver: MergeResolver;
}

export interface DiscoveryOutcome {
  snapshot: DiscoverySnapshot;
  records: Map<string, RawTaskRecord[]>;
  errors: DiscoveryFailure[];
}

export interface DetectionOutcome extends DiscoveryOutcome {
  changeSet: ChangeSet;
  proposals: Proposal[];
}

export interface EngineStatus {
  globalVersion: number;
  entities: number;
  defaultMappings: number;
  projects: Array<{ id: string; version: number; overrides: number; decisions: number; sources: string[] }>;
  plugins: string[];
}

export class MediationEngine {
  private store: ConfigStore;
  private plugins: Map<string, DiscoveryPlugin>;
  private bindings: ProjectBinding[];
  private applicator: DecisionApplicator;

  constructor(options: MediationEngineOptions) {
    this.store = options.store;
    this.plugins = new Map([...options.plugins].map((p) => [p.tool, p]));
    this.bindings = options.projects;
    this.applicator = new DecisionApplicator(options.store);
  }

  /** Project ids from settings plus any project the store already knows */
  async projectIds(): Promise<string[]> {
    const ids = new Set(this.bindings.map((b) => b.id));
    for (const id of await this.store.listProjects()) ids.add(id);
    return [...ids].sort();
  }

  async loadState(projectIds?: string[]): Promise<EngineState> {
    const global = await this.store.readGlobal();
    const registry = SemanticRegistry.fromGlobal(global.data);
    const ids = projectIds ?? (await this.projectIds());
    const projects = await Promise.all(ids.map((id) => this.store.readProject(id)));
    const resolver = new MergeResolver(global.data, projects.map((p) => p.data), registry);
    return { global, registry, projects, resolver };
  }

  async getStatus(): Promise<EngineStatus> {
    const state = await this.loadState();
    return {
      globalVersion: state.global.version,
      entities: state.global.data.entities.length,
      defaultMappings: state.global.data.defaultMappings.length,
      projects: state.projects.map((p) => ({
        id: p.data.projectId,
        version: p.version,
        overrides: p.data.overrides.length,
        decisions: p.data.decisions.length,
        sources: this.bindingFor(p.data.projectId)?.sources.map((s) => `${s.tool}:${s.target}`) ?? [],
      })),
      plugins: [...this.plugins.keys()].sort(),
    };
  }

  /**
   * Run every plugin concurrently, one task per tool. A failing binding is
   * recorded and its project marked partial; other tools carry on.
   */
  async discover(state: EngineState, projectIds: string[], signal?: AbortSignal): Promise<DiscoveryOutcome> {
    const byTool = new Map<string, Array<{ projectId: string; target: string }>>();
    for (const projectId of projectIds) {
      for (const source of this.bindingFor(projectId)?.sources ?? []) {
        const list = byTool.get(source.tool) ?? [];
        list.push({ projectId, target: source.target });
        byTool.set(source.tool, list);
      }
    }

    const tools = [...byTool.keys()].sort();
    const settled = await Promise.allSettled(
      tools.map((tool) => this.discoverTool(tool, byTool.get(tool) ?? [], state, signal)),
    );

    const observations: Observation[] = [];
    const records = new Map<string, RawTaskRecord[]>();
    const errors: DiscoveryFailure[] = [];

    settled.forEach((outcome, index) => {
      const tool = tools[index] ?? 'unknown';
      if (outcome.status === 'rejected') {
        const message = toError(outcome.reason).message;
        for (const { projectId } of byTool.get(tool) ?? []) {
          errors.push({ tool, projectId, message });
        }
        return;
      }
      observations.push(...outcome.value.observations);
      errors.push(...outcome.value.errors);
      for (const [projectId, list] of outcome.value.records) {
        records.set(projectId, [...(records.get(projectId) ?? []), ...list]);
      }
    });

    for (const failure of errors) {
      log().warn(failure, 'discovery failed');
    }

    return {
      snapshot: {
        observations,
        partialProjects: [...new Set(errors.map((e) => e.projectId))].sort(),
      },
      records,
      errors,
    };
  }

  /** Discovery plus detection and proposal generation; writes nothing */
  async detect(options: RunOptions = {}): Promise<DetectionOutcome & { state: EngineState }> {
    const known = await this.projectIds();
    for (const id of options.projects ?? []) {
      if (!known.includes(id)) {
        throw new NotFoundError(`Unknown project "${id}"`, {
          fix: 'Add the project to .semsync/config.json.',
        });
      }
    }
    const projectIds = options.projects ?? known;

    const state = await this.loadState();
    const discovery = await this.discover(state, projectIds, options.signal);
    const changeSet = detect(discovery.snapshot, state.registry, {
      global: state.global.data,
      projects: state.projects.map((p) => p.data),
    });
    const proposals = generate(changeSet, state.registry);

    log().info(
      {
        observations: discovery.snapshot.observations.length,
        proposals: proposals.length,
        partial: discovery.snapshot.partialProjects,
      },
      'detection finished',
    );

    return { ...discovery, changeSet, proposals, state };
  }

  async run(source: DecisionSource, options: RunOptions = {}): Promise<RunResult> {
    const detection = await this.detect(options);
    const result: RunResult = {
      changeSet: detection.changeSet,
      proposals: detection.proposals,
      applied: [],
      failed: [],
      skipped: [],
      discoveryErrors: detection.errors,
      abortedBy: null,
      stats: {
        observations: detection.snapshot.observations.length,
        proposals: detection.proposals.length,
        accepted: 0,
        created: 0,
        ignored: 0,
        deferred: 0,
        failed: 0,
      },
    };

    if (options.dryRun || detection.proposals.length === 0) {
      return result;
    }

    const inputs = await collectDecisions(source, detection.proposals, {
      timeoutMs: options.timeoutMs,
      signal: options.signal,
    });
    const decisions = fanOut(detection.proposals, inputs);
    await this.applyAll(decisions, detection.proposals, result, options.signal);

    log().info({ ...result.stats, abortedBy: result.abortedBy }, 'run finished');
    return result;
  }

  /** Apply decisions project by project, in proposal order within each */
  private async applyAll(
    decisions: Decision[],
    proposals: Proposal[],
    result: RunResult,
    signal?: AbortSignal,
  ): Promise<void> {
    const proposalsById = new Map(proposals.map((p) => [p.id, p]));
    const ordered = [...decisions].sort((a, b) => compareStrings(a.projectId, b.projectId));

    for (const decision of ordered) {
      if (signal?.aborted || result.abortedBy !== null) {
        result.skipped.push(decision);
        continue;
      }

      const proposal = proposalsById.get(decision.proposalId);
      if (!proposal) {
        result.failed.push({ decision, error: new NotFoundError(`Unknown proposal ${decision.proposalId}`) });
        result.stats.failed += 1;
        continue;
      }

      const outcome = await this.applicator.apply(decision, proposal);
      if (outcome.ok) {
        this.record(result, outcome.value);
        continue;
      }

      const failure: FailedDecision = { decision, error: outcome.error };
      result.failed.push(failure);
      result.stats.failed += 1;
      if (isGlobalPersistenceFailure(outcome.error)) {
        result.abortedBy = outcome.error.message;
        log().error({ err: outcome.error.message }, 'global persistence failure, batch stopped');
      }
    }
  }

  private record(result: RunResult, applied: AppliedDecision): void {
    result.applied.push(applied);
    switch (applied.decision.outcome.type) {
      case 'accept':
        result.stats.accepted += 1;
        break;
      case 'create':
        result.stats.created += 1;
        break;
      case 'ignore':
        result.stats.ignored += 1;
        break;
      case 'defer':
        result.stats.deferred += 1;
        break;
      default:
        assertNever(applied.decision.outcome);
    }
  }

  async resolve(projectId: string, tool: string, rawConceptId: string): Promise<ExplainedResolution> {
    const state = await this.loadState([projectId]);
    return state.resolver.explain(projectId, tool, rawConceptId);
  }

  /** Discover the project's task records and normalize them to CIF */
  async normalizeProject(projectId: string, signal?: AbortSignal): Promise<{ tasks: CIFTask[]; errors: DiscoveryFailure[] }> {
    const state = await this.loadState([projectId]);
    const discovery = await this.discover(state, [projectId], signal);
    const mapping = state.resolver.forProject(projectId);
    return {
      tasks: normalizeAll(discovery.records.get(projectId) ?? [], mapping),
      errors: discovery.errors,
    };
  }

  async clearOverride(projectId: string, tool: string, rawConceptId: string): Promise<boolean> {
    return this.applicator.clearOverride(projectId, tool, rawConceptId);
  }

  private bindingFor(projectId: string): ProjectBinding | undefined {
    return this.bindings.find((b) => b.id === projectId);
  }

  private async discoverTool(
    tool: string,
    targets: Array<{ projectId: string; target: string }>,
    state: EngineState,
    signal?: AbortSignal,
  ): Promise<{ observations: Observation[]; records: Map<string, RawTaskRecord[]>; errors: DiscoveryFailure[] }> {
    const plugin = this.plugins.get(tool);
    if (!plugin) {
      throw new PluginDiscoveryError(tool, `no plugin registered (available: ${[...this.plugins.keys()].join(', ') || 'none'})`);
    }

    const observations: Observation[] = [];
    const records = new Map<string, RawTaskRecord[]>();
    const errors: DiscoveryFailure[] = [];

    for (const { projectId, target } of targets) {
      try {
        const report = await plugin.discover(target, {
          projectId,
          mappedRole: (rawConceptId) => state.resolver.mappedRole(projectId, tool, rawConceptId),
          signal,
        });

        for (const discovered of report.entities) {
          if (discovered.entity.tool !== tool) {
            throw new PluginDiscoveryError(
              tool,
              `reported entity ${discovered.entity.rawConceptId} for tool ${discovered.entity.tool}`,
            );
          }
        }

        observations.push(...report.entities.map((e) => ({ ...e, projectId })));
        records.set(projectId, [...(records.get(projectId) ?? []), ...report.records]);
        log().debug({ tool, project: projectId, entities: report.entities.length }, 'discovered');
      } catch (error) {
        const wrapped =
          error instanceof PluginDiscoveryError
            ? error
            : new PluginDiscoveryError(tool, toError(error).message, { cause: error });
        errors.push({ tool, projectId, message: wrapped.message });
      }
    }

    return { observations, records, errors };
  }
}
