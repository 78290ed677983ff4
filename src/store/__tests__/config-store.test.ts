/**
 * Tests for versioned configuration records on disk and in memory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile, writeFile, mkdir, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { FileConfigStore, assertAdditive, type ConfigStore } from '../config-store.js';
import { MemoryConfigStore } from '../memory-store.js';
import { acquireLock } from '../lock.js';
import { PersistenceError, StaleRecordError } from '../../core/errors.js';
import { EXPLICIT_NONE, type GlobalConfiguration } from '../../core/types.js';

const base: GlobalConfiguration = {
  entities: [{ id: 'bug', role: 'label', description: '' }],
  defaultMappings: [{ tool: 'taskwarrior', rawConceptId: '+bug', entityId: 'bug' }],
};

function sharedBehaviour(name: string, make: () => Promise<{ store: ConfigStore; cleanup: () => Promise<void> }>) {
  describe(name, () => {
    let store: ConfigStore;
    let cleanup: () => Promise<void>;

    beforeEach(async () => {
      ({ store, cleanup } = await make());
    });

    afterEach(async () => {
      await cleanup();
    });

    it('starts from empty records at version 0', async () => {
      expect(await store.readGlobal()).toMatchObject({
        name: 'global',
        version: 0,
        data: { entities: [], defaultMappings: [] },
      });
      expect(await store.readProject('web')).toMatchObject({
        name: 'project:web',
        version: 0,
        data: { projectId: 'web', overrides: [], decisions: [] },
      });
    });

    it('bumps the version on each commit', async () => {
      const first = await store.commitGlobal(0, base);
      expect(first.version).toBe(1);
      const second = await store.commitGlobal(1, {
        ...base,
        entities: [...base.entities, { id: 'open', role: 'status', description: '' }],
      });
      expect(second.version).toBe(2);
      expect((await store.readGlobal()).data.entities.map((e) => e.id)).toEqual(['bug', 'open']);
    });

    it('rejects a commit against a stale version', async () => {
      await store.commitGlobal(0, base);
      await expect(store.commitGlobal(0, base)).rejects.toBeInstanceOf(StaleRecordError);

      await store.commitProject(0, { projectId: 'web', overrides: [], decisions: [] });
      await expect(
        store.commitProject(0, { projectId: 'web', overrides: [], decisions: [] }),
      ).rejects.toThrow('Record project:web is at version 1, expected 0');
    });

    it('refuses to drop or re-role entities', async () => {
      await store.commitGlobal(0, base);
      await expect(store.commitGlobal(1, { ...base, entities: [] })).rejects.toBeInstanceOf(PersistenceError);
      await expect(
        store.commitGlobal(1, { ...base, entities: [{ id: 'bug', role: 'status', description: '' }] }),
      ).rejects.toBeInstanceOf(PersistenceError);
      expect((await store.readGlobal()).version).toBe(1);
    });

    it('reverts to earlier data under a new version', async () => {
      const first = await store.commitGlobal(0, base);
      await store.commitGlobal(1, {
        ...base,
        entities: [...base.entities, { id: 'open', role: 'status', description: '' }],
      });

      const reverted = await store.revertGlobal(2, first.data);
      expect(reverted.version).toBe(3);
      expect(await store.readGlobal()).toMatchObject({ version: 3, data: first.data });
      await expect(store.revertGlobal(2, first.data)).rejects.toBeInstanceOf(StaleRecordError);
    });

    it('stores project overrides and lists projects', async () => {
      await store.commitProject(0, {
        projectId: 'web',
        overrides: [{ tool: 'taskwarrior', rawConceptId: '+noise', target: EXPLICIT_NONE }],
        decisions: [],
      });
      await store.commitProject(0, { projectId: 'api', overrides: [], decisions: [] });

      expect((await store.readProject('web')).data.overrides).toEqual([
        { tool: 'taskwarrior', rawConceptId: '+noise', target: EXPLICIT_NONE },
      ]);
      expect(await store.listProjects()).toEqual(['api', 'web']);
    });

    it('serializes work under the global lock', async () => {
      const order: string[] = [];
      await Promise.all([
        store.withGlobalLock(async () => {
          order.push('a:start');
          await new Promise((resolve) => setTimeout(resolve, 20));
          order.push('a:end');
        }),
        store.withGlobalLock(async () => {
          order.push('b');
        }),
      ]);
      expect(order).toHaveLength(3);
      expect(order.indexOf('a:end')).toBe(order.indexOf('a:start') + 1);
    });
  });
}

sharedBehaviour('MemoryConfigStore', async () => ({
  store: new MemoryConfigStore(),
  cleanup: async () => undefined,
}));

sharedBehaviour('FileConfigStore', async () => {
  const dir = await mkdtemp(join(tmpdir(), 'semsync-store-'));
  return {
    store: new FileConfigStore(join(dir, '.semsync')),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
});

describe('FileConfigStore files', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'semsync-store-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('writes records as formatted JSON', async () => {
    const store = new FileConfigStore(dir);
    await store.commitProject(0, { projectId: 'web', overrides: [], decisions: [] });

    const raw = await readFile(join(dir, 'projects', 'web.json'), 'utf8');
    expect(raw.endsWith('}\n')).toBe(true);
    expect(JSON.parse(raw)).toMatchObject({
      name: 'project:web',
      version: 1,
      data: { projectId: 'web', overrides: [], decisions: [] },
    });
  });

  it('reports a corrupt record as a persistence error', async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'global.json'), '{"name": "global"}');
    await expect(new FileConfigStore(dir).readGlobal()).rejects.toBeInstanceOf(PersistenceError);
  });

  it('refuses project ids that are not plain names', async () => {
    const store = new FileConfigStore(dir);
    await expect(store.readProject('../outside')).rejects.toThrow();
  });

  it('reports a busy global lock against the global record', async () => {
    const store = new FileConfigStore(dir, { lock: { retries: 0 } });
    const release = await acquireLock(join(dir, 'global.json'), { retries: 0 });
    try {
      const error = await store.withGlobalLock(async () => 'unreachable').catch((e: unknown) => e);
      expect(error).toBeInstanceOf(PersistenceError);
      expect(error instanceof PersistenceError && error.record).toBe('global');
      expect(error instanceof Error && error.message).toBe('Failed to acquire lock: global');
    } finally {
      await release();
    }
  });

  it('reports an unreadable global record against the global record', async () => {
    await mkdir(dir, { recursive: true });
    await writeFile(join(dir, 'global.json'), '{"name": "global"}');
    await expect(new FileConfigStore(dir).readGlobal()).rejects.toMatchObject({
      record: 'global',
      message: 'Invalid configuration record: global',
    });
  });

  it('keeps an explicit none and refuses non-additive commits on disk', async () => {
    const store = new FileConfigStore(dir);
    await store.commitProject(0, {
      projectId: 'web',
      overrides: [{ tool: 'taskwarrior', rawConceptId: '+noise', target: EXPLICIT_NONE }],
      decisions: [],
    });
    expect((await new FileConfigStore(dir).readProject('web')).data.overrides[0]?.target).toBe(EXPLICIT_NONE);

    await store.commitGlobal(0, base);
    await expect(store.commitGlobal(1, { ...base, defaultMappings: [] })).rejects.toMatchObject({ record: 'global' });
    expect(JSON.parse(await readFile(join(dir, 'global.json'), 'utf8'))).toMatchObject({ version: 1, data: base });
  });

  it('releases its lock files', async () => {
    const store = new FileConfigStore(dir);
    await store.withGlobalLock(async () => {
      expect(await readdir(dir)).toContain('global.json.lock');
    });
    expect(await readdir(dir)).not.toContain('global.json.lock');
  });
});

describe('assertAdditive', () => {
  it('allows appending entities and defaults', () => {
    expect(() =>
      assertAdditive(base, {
        entities: [...base.entities, { id: 'web', role: 'container', description: '' }],
        defaultMappings: [...base.defaultMappings, { tool: 'github', rawConceptId: 'label:bug', entityId: 'bug' }],
      }),
    ).not.toThrow();
  });

  it('refuses to retarget a default', () => {
    expect(() =>
      assertAdditive(base, {
        entities: [...base.entities, { id: 'defect', role: 'label', description: '' }],
        defaultMappings: [{ tool: 'taskwarrior', rawConceptId: '+bug', entityId: 'defect' }],
      }),
    ).toThrow('Refusing non-additive commit (default for taskwarrior/+bug changed): global');
  });
});
