/**
 * End-to-end tests of the mediation engine over an in-memory store and a
 * scripted discovery plugin.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { MediationEngine } from '../sync.js';
import { NonInteractiveDecisionSource, ScriptedDecisionSource } from '../decisions.js';
import { NotFoundError, PersistenceError } from '../errors.js';
import { MemoryConfigStore, type MemoryConfigStoreSeed } from '../../store/memory-store.js';
import { FileConfigStore, type ConfigStore, type GlobalRecord } from '../../store/config-store.js';
import { acquireLock } from '../../store/lock.js';
import type { ProjectBinding } from '../../store/schema.js';
import {
  EXPLICIT_NONE,
  type DecisionInput,
  type DecisionSource,
  type DiscoveredEntity,
  type DiscoveryContext,
  type DiscoveryPlugin,
  type DiscoveryReport,
  type Proposal,
  type RawTaskRecord,
} from '../types.js';

interface FakeConcept {
  id: string;
  conflict?: boolean;
}

/** Serves fixed concepts per target; a missing target fails discovery */
class FakePlugin implements DiscoveryPlugin {
  readonly tool = 'fake';
  contexts: DiscoveryContext[] = [];

  constructor(
    private targets: Record<string, FakeConcept[]>,
    private records: Record<string, RawTaskRecord[]> = {},
  ) {}

  async discover(target: string, context: DiscoveryContext): Promise<DiscoveryReport> {
    this.contexts.push(context);
    const concepts = this.targets[target];
    if (!concepts) throw new Error(`no such target ${target}`);
    return {
      entities: concepts.map((c): DiscoveredEntity => ({
        entity: { tool: this.tool, rawConceptId: c.id, rawLabel: c.id, attributes: {} },
        roleHint: 'label',
        conflict: c.conflict,
      })),
      records: this.records[target] ?? [],
    };
  }
}

class NeverAnswers implements DecisionSource {
  collect(): Promise<DecisionInput[]> {
    return new Promise(() => undefined);
  }
}

class BrokenGlobalStore extends MemoryConfigStore {
  protected async saveGlobal(_record: GlobalRecord): Promise<void> {
    throw new Error('read-only filesystem');
  }
}

const bindings: ProjectBinding[] = [
  { id: 'p1', sources: [{ tool: 'fake', target: 'a' }] },
  { id: 'p2', sources: [{ tool: 'fake', target: 'b' }] },
];

function engineWith(
  plugin: DiscoveryPlugin,
  seed: MemoryConfigStoreSeed = {},
  store: ConfigStore = new MemoryConfigStore(seed),
) {
  return { store, engine: new MediationEngine({ store, plugins: [plugin], projects: bindings }) };
}

function createOutcome(id: string) {
  return { type: 'create' as const, entity: { id, role: 'label' as const, description: '' } };
}

describe('MediationEngine', () => {
  it('quiets a concept once it has been created and mapped', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+bug' }], b: [] });
    const { engine } = engineWith(plugin);
    const source = new ScriptedDecisionSource({ 'fake/+bug': createOutcome('bug') });

    const first = await engine.run(source);
    expect(first.proposals.map((p) => p.rawConceptId)).toEqual(['+bug']);
    expect(first.stats).toMatchObject({ proposals: 1, created: 1, failed: 0 });

    const second = await engine.run(source);
    expect(second.proposals).toEqual([]);
    expect(source.seen).toHaveLength(1);
    expect(await engine.resolve('p1', 'fake', '+bug')).toEqual({
      resolution: { entityId: 'bug' },
      source: 'project',
    });
  });

  it('keeps an ignored concept quiet even when flagged later', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+noise' }], b: [] });
    const { engine, store } = engineWith(plugin);
    await engine.run(new NonInteractiveDecisionSource('ignore'));

    const flagged = new FakePlugin({ a: [{ id: '+noise', conflict: true }], b: [] });
    const result = await engineWith(flagged, {}, store).engine.detect();
    expect(result.proposals).toEqual([]);
  });

  it('reopens deferred concepts on the next run', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+later' }], b: [] });
    const { engine } = engineWith(plugin);

    const first = await engine.run(new NonInteractiveDecisionSource('defer'));
    expect(first.stats.deferred).toBe(1);

    const second = await engine.detect();
    expect(second.proposals.map((p: Proposal) => p.kind)).toEqual(['reopened']);
  });

  it('fans one answer out to every affected project', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+review' }], b: [{ id: '+review' }] });
    const { engine, store } = engineWith(plugin);
    const result = await engine.run(new ScriptedDecisionSource({ 'fake/+review': createOutcome('review') }));

    expect(result.applied.map((a) => [a.decision.projectId, a.decision.outcome.type])).toEqual([
      ['p1', 'create'],
      ['p2', 'accept'],
    ]);
    expect((await store.readProject('p2')).data.overrides).toEqual([
      { tool: 'fake', rawConceptId: '+review', target: { entityId: 'review' } },
    ]);
  });

  it('maps every project when the created role differs from the hint', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+web' }], b: [{ id: '+web' }] });
    const { engine, store } = engineWith(plugin);
    const result = await engine.run(
      new ScriptedDecisionSource({
        'fake/+web': { type: 'create', entity: { id: 'web', role: 'container', description: '' } },
      }),
    );

    expect(result.proposals.map((p) => p.candidateRole)).toEqual(['label']);
    expect(result.failed).toEqual([]);
    expect(result.applied.map((a) => [a.decision.projectId, a.decision.outcome.type])).toEqual([
      ['p1', 'create'],
      ['p2', 'accept'],
    ]);
    expect((await store.readProject('p2')).data.overrides).toEqual([
      { tool: 'fake', rawConceptId: '+web', target: { entityId: 'web' } },
    ]);
  });

  it('reports a failing binding and carries on with the rest', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+bug' }] });
    const { engine } = engineWith(plugin);
    const result = await engine.run(new NonInteractiveDecisionSource('defer'), { dryRun: true });

    expect(result.discoveryErrors).toEqual([
      { tool: 'fake', projectId: 'p2', message: 'Discovery failed for fake: no such target b' },
    ]);
    expect(result.changeSet.partialProjects).toEqual(['p2']);
    expect(result.proposals.map((p) => p.affectedProjects)).toEqual([['p1']]);
  });

  it('reports tools without a plugin', async () => {
    const store = new MemoryConfigStore();
    const engine = new MediationEngine({
      store,
      plugins: [new FakePlugin({})],
      projects: [{ id: 'p1', sources: [{ tool: 'nope', target: 'x' }] }],
    });
    const detection = await engine.detect();
    expect(detection.errors).toEqual([
      { tool: 'nope', projectId: 'p1', message: 'Discovery failed for nope: no plugin registered (available: fake)' },
    ]);
  });

  it('hands plugins a read-only view of the current mapping', async () => {
    const plugin = new FakePlugin({ a: [], b: [] });
    const { engine } = engineWith(plugin, {
      global: {
        entities: [{ id: 'bug', role: 'label', description: '' }],
        defaultMappings: [{ tool: 'fake', rawConceptId: '+bug', entityId: 'bug' }],
      },
    });
    await engine.detect();
    expect(plugin.contexts.map((c) => [c.projectId, c.mappedRole('+bug'), c.mappedRole('+x')])).toEqual([
      ['p1', 'label', undefined],
      ['p2', 'label', undefined],
    ]);
  });

  it('writes nothing on a dry run', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+bug' }], b: [] });
    const { engine, store } = engineWith(plugin);
    const source = new ScriptedDecisionSource({ 'fake/+bug': { type: 'ignore' } });
    const result = await engine.run(source, { dryRun: true });

    expect(result.proposals).toHaveLength(1);
    expect(result.applied).toEqual([]);
    expect(source.seen).toEqual([]);
    expect(await store.listProjects()).toEqual([]);
  });

  it('defers everything when the decision window closes', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+one' }, { id: '+two' }], b: [] });
    const { engine } = engineWith(plugin);
    const result = await engine.run(new NeverAnswers(), { timeoutMs: 20 });

    expect(result.stats).toMatchObject({ proposals: 2, deferred: 2, accepted: 0 });
  });

  it('stops the batch when the global record cannot be written', async () => {
    const plugin = new FakePlugin({ a: [{ id: '+a' }, { id: '+b' }], b: [] });
    const { engine } = engineWith(plugin, {}, new BrokenGlobalStore());
    const result = await engine.run(
      new ScriptedDecisionSource({ 'fake/+a': createOutcome('a'), 'fake/+b': createOutcome('b') }),
    );

    expect(result.failed).toHaveLength(1);
    expect(result.failed[0]?.error).toBeInstanceOf(PersistenceError);
    expect(result.abortedBy).toBe('Global commit failed: global');
    expect(result.skipped.map((d) => d.rawConceptId)).toEqual(['+b']);
  });

  it('rejects unknown projects', async () => {
    const { engine } = engineWith(new FakePlugin({}));
    await expect(engine.detect({ projects: ['ghost'] })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('normalizes a project through its effective mapping', async () => {
    const plugin = new FakePlugin(
      { a: [{ id: '+bug' }, { id: '+new' }] },
      { a: [{ tool: 'fake', sourceId: '1', title: 'Fix crash', conceptIds: ['+bug', '+new'], attributes: {} }] },
    );
    const { engine } = engineWith(plugin, {
      global: {
        entities: [{ id: 'bug', role: 'label', description: '' }],
        defaultMappings: [{ tool: 'fake', rawConceptId: '+bug', entityId: 'bug' }],
      },
    });

    const { tasks, errors } = await engine.normalizeProject('p1');
    expect(errors).toEqual([]);
    expect(tasks).toEqual([
      { sourceTool: 'fake', sourceId: '1', title: 'Fix crash', fields: { label: ['bug'] }, unmapped: ['+new'] },
    ]);
  });

  it('summarizes store state', async () => {
    const { engine } = engineWith(new FakePlugin({}), {
      global: { entities: [{ id: 'bug', role: 'label', description: '' }], defaultMappings: [] },
    });
    const status = await engine.getStatus();
    expect(status.globalVersion).toBe(1);
    expect(status.entities).toBe(1);
    expect(status.plugins).toEqual(['fake']);
    expect(status.projects.map((p) => [p.id, p.version, p.sources])).toEqual([
      ['p1', 0, ['fake:a']],
      ['p2', 0, ['fake:b']],
    ]);
  });
});

describe('MediationEngine on the file store', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'semsync-engine-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('stops the batch when the global record is locked elsewhere', async () => {
    const store = new FileConfigStore(dir, { lock: { retries: 0 } });
    const plugin = new FakePlugin({ a: [{ id: '+a' }, { id: '+b' }], b: [] });
    const { engine } = engineWith(plugin, {}, store);

    const release = await acquireLock(join(dir, 'global.json'), { retries: 0 });
    try {
      const result = await engine.run(
        new ScriptedDecisionSource({ 'fake/+a': createOutcome('a'), 'fake/+b': { type: 'ignore' } }),
      );

      expect(result.failed.map((f) => f.error.message)).toEqual(['Failed to acquire lock: global']);
      expect(result.abortedBy).toBe('Failed to acquire lock: global');
      expect(result.applied).toEqual([]);
      expect(result.skipped.map((d) => d.rawConceptId)).toEqual(['+b']);
    } finally {
      await release();
    }
  });

  it('keeps an ignored concept quiet across runs', async () => {
    const store = new FileConfigStore(dir);
    const plugin = new FakePlugin({ a: [{ id: '+noise' }], b: [] });
    await engineWith(plugin, {}, store).engine.run(new NonInteractiveDecisionSource('ignore'));

    const reopened = new FileConfigStore(dir);
    expect((await reopened.readProject('p1')).data.overrides).toEqual([
      { tool: 'fake', rawConceptId: '+noise', target: EXPLICIT_NONE },
    ]);
    const again = await engineWith(plugin, {}, reopened).engine.detect();
    expect(again.proposals).toEqual([]);
  });
});
