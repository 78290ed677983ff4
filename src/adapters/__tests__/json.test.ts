import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { JsonAdapter, type JsonSource } from '../json.js';
import type { DiscoveryContext } from '../../core/types.js';

const context: DiscoveryContext = {
  projectId: 'p1',
  mappedRole: (rawConceptId) => (rawConceptId === 'size/l' ? 'label' : undefined),
};

const source: JsonSource = {
  tasks: [
    {
      id: 1,
      title: 'Redesign header',
      concepts: [{ id: 'area/ui', label: 'UI', role: 'container' }, { id: 'misc' }],
    },
    { id: 't2', concepts: [{ id: 'misc', conflict: true }, { id: 'size/l', role: 'priority' }] },
  ],
};

describe('JsonAdapter', () => {
  let root: string;
  let adapter: JsonAdapter;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'semsync-json-'));
    adapter = new JsonAdapter(root);
    await writeFile(join(root, 'tasks.json'), JSON.stringify(source));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('reports declared roles as hints', async () => {
    const report = await adapter.discover('tasks.json', context);
    const ui = report.entities.find((e) => e.entity.rawConceptId === 'area/ui');

    expect(ui).toEqual({
      entity: {
        tool: 'json',
        rawConceptId: 'area/ui',
        rawLabel: 'UI',
        attributes: { occurrences: '1', usage: 'container' },
      },
      roleHint: 'container',
      conflict: false,
    });
  });

  it('leaves concepts without a role untyped', async () => {
    const report = await adapter.discover('tasks.json', context);
    const misc = report.entities.find((e) => e.entity.rawConceptId === 'misc');

    expect(misc?.roleHint).toBeUndefined();
    expect(misc?.entity.rawLabel).toBe('misc');
    expect(misc?.entity.attributes).toEqual({ occurrences: '2' });
  });

  it('raises conflicts that are declared or implied by the mapped role', async () => {
    const report = await adapter.discover('tasks.json', context);
    expect(report.entities.filter((e) => e.conflict).map((e) => e.entity.rawConceptId)).toEqual(['misc', 'size/l']);
  });

  it('reports one record per task with string ids', async () => {
    const report = await adapter.discover('tasks.json', context);
    expect(report.records).toEqual([
      { tool: 'json', sourceId: '1', title: 'Redesign header', conceptIds: ['area/ui', 'misc'], attributes: {} },
      { tool: 'json', sourceId: 't2', title: '', conceptIds: ['misc', 'size/l'], attributes: {} },
    ]);
  });

  it('evaluates the mapped role on every occurrence', async () => {
    await writeFile(
      join(root, 'mixed.json'),
      JSON.stringify({
        tasks: [
          { id: 'a', concepts: [{ id: 'web', role: 'label' }, { id: 'later' }] },
          { id: 'b', concepts: [{ id: 'web', role: 'container' }, { id: 'later', role: 'status' }] },
        ],
      }),
    );
    const report = await adapter.discover('mixed.json', {
      projectId: 'p1',
      mappedRole: (rawConceptId) => (rawConceptId === 'web' ? 'label' : undefined),
    });

    expect(report.entities).toEqual([
      {
        entity: {
          tool: 'json',
          rawConceptId: 'web',
          rawLabel: 'web',
          attributes: { occurrences: '2', usage: 'label', usages: 'label,container' },
        },
        roleHint: 'label',
        conflict: true,
      },
      {
        entity: {
          tool: 'json',
          rawConceptId: 'later',
          rawLabel: 'later',
          attributes: { occurrences: '2', usage: 'status' },
        },
        roleHint: 'status',
        conflict: false,
      },
    ]);
  });

  it('treats a missing file as an empty source', async () => {
    expect(await adapter.discover('nothing-here.json', context)).toEqual({ entities: [], records: [] });
  });

  it('names the offending field of a malformed file', async () => {
    await writeFile(join(root, 'bad.json'), JSON.stringify({ tasks: [{ title: 'no id' }] }));
    await expect(adapter.discover('bad.json', context)).rejects.toThrow(
      `Unexpected task file format in ${join(root, 'bad.json')}: tasks.0.id`,
    );
  });
});
