/**
 * Versioned configuration records.
 *
 * Two kinds of record live in a store: the single global record and one
 * record per project. Every commit is a compare-and-set against the version
 * the caller read, bumps the version by one, and (for the global record)
 * refuses to drop or re-role any entity or default mapping.
 */

import { join } from 'node:path';
import { readdir } from 'node:fs/promises';
import { PersistenceError, StaleRecordError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { findRoleViolations } from '../core/registry.js';
import { keyOf } from '../core/resolver.js';
import type {
  GlobalConfiguration,
  ProjectConfiguration,
  VersionedRecord,
} from '../core/types.js';
import { atomicWriteJson, safeReadFile } from './atomic.js';
import { acquireLock, withLock, type LockOptions } from './lock.js';
import { GlobalRecordSchema, ProjectIdSchema, ProjectRecordSchema } from './schema.js';

const log = () => getLogger('store');

export const GLOBAL_RECORD = 'global';

/** Failures on global.json are reported against the global record, not the file */
function globalFailure(err: unknown, reason: string): PersistenceError {
  if (err instanceof PersistenceError && err.record === GLOBAL_RECORD) return err;
  return new PersistenceError(GLOBAL_RECORD, err instanceof PersistenceError ? err.reason : reason, { cause: err });
}

export function projectRecordName(projectId: string): string {
  return `project:${projectId}`;
}

export type GlobalRecord = VersionedRecord<GlobalConfiguration>;
export type ProjectRecord = VersionedRecord<ProjectConfiguration>;

export interface ConfigStore {
  readGlobal(): Promise<GlobalRecord>;
  /** Compare-and-append; throws StaleRecordError when the version moved */
  commitGlobal(expectedVersion: number, data: GlobalConfiguration): Promise<GlobalRecord>;
  /**
   * Compensating commit after a failed multi-record apply: writes `data` as
   * a new version, without the additivity check.
   */
  revertGlobal(expectedVersion: number, data: GlobalConfiguration): Promise<GlobalRecord>;

  readProject(projectId: string): Promise<ProjectRecord>;
  commitProject(expectedVersion: number, data: ProjectConfiguration): Promise<ProjectRecord>;

  listProjects(): Promise<string[]>;

  withGlobalLock<T>(fn: () => Promise<T>): Promise<T>;
  withProjectLock<T>(projectId: string, fn: () => Promise<T>): Promise<T>;
}

export function emptyGlobal(): GlobalRecord {
  return {
    name: GLOBAL_RECORD,
    version: 0,
    updatedAt: new Date(0).toISOString(),
    data: { entities: [], defaultMappings: [] },
  };
}

export function emptyProject(projectId: string): ProjectRecord {
  return {
    name: projectRecordName(projectId),
    version: 0,
    updatedAt: new Date(0).toISOString(),
    data: { projectId, overrides: [], decisions: [] },
  };
}

/**
 * Additivity check: the next global record must keep every entity with its
 * role and every default mapping with its target.
 */
export function assertAdditive(previous: GlobalConfiguration, next: GlobalConfiguration): void {
  const { missing, changed } = findRoleViolations(previous.entities, next.entities);
  if (missing.length > 0 || changed.length > 0) {
    throw new PersistenceError(
      GLOBAL_RECORD,
      `Refusing non-additive commit (removed: ${missing.join(', ') || 'none'}; re-roled: ${changed.join(', ') || 'none'})`,
    );
  }

  const nextDefaults = new Map(next.defaultMappings.map((m) => [keyOf(m), m.entityId]));
  for (const mapping of previous.defaultMappings) {
    if (nextDefaults.get(keyOf(mapping)) !== mapping.entityId) {
      throw new PersistenceError(
        GLOBAL_RECORD,
        `Refusing non-additive commit (default for ${mapping.tool}/${mapping.rawConceptId} changed)`,
      );
    }
  }
}

/**
 * Shared compare-and-set logic. Subclasses supply raw record IO and locking.
 */
export abstract class BaseConfigStore implements ConfigStore {
  protected abstract loadGlobal(): Promise<GlobalRecord | null>;
  protected abstract saveGlobal(record: GlobalRecord): Promise<void>;
  protected abstract loadProject(projectId: string): Promise<ProjectRecord | null>;
  protected abstract saveProject(record: ProjectRecord): Promise<void>;
  abstract listProjects(): Promise<string[]>;
  abstract withGlobalLock<T>(fn: () => Promise<T>): Promise<T>;
  abstract withProjectLock<T>(projectId: string, fn: () => Promise<T>): Promise<T>;

  async readGlobal(): Promise<GlobalRecord> {
    return (await this.loadGlobal()) ?? emptyGlobal();
  }

  async commitGlobal(expectedVersion: number, data: GlobalConfiguration): Promise<GlobalRecord> {
    const next = await this.writeGlobal(expectedVersion, data, true);
    log().debug({ version: next.version, entities: data.entities.length }, 'global record committed');
    return next;
  }

  async revertGlobal(expectedVersion: number, data: GlobalConfiguration): Promise<GlobalRecord> {
    const next = await this.writeGlobal(expectedVersion, data, false);
    log().warn({ version: next.version, entities: data.entities.length }, 'global record reverted');
    return next;
  }

  private async writeGlobal(
    expectedVersion: number,
    data: GlobalConfiguration,
    additive: boolean,
  ): Promise<GlobalRecord> {
    const current = await this.readGlobal();
    if (current.version !== expectedVersion) {
      throw new StaleRecordError(GLOBAL_RECORD, expectedVersion, current.version);
    }
    if (additive) assertAdditive(current.data, data);

    const next: GlobalRecord = {
      name: GLOBAL_RECORD,
      version: current.version + 1,
      updatedAt: new Date().toISOString(),
      data: GlobalRecordSchema.shape.data.parse(data),
    };
    await this.saveGlobal(next);
    return next;
  }

  async readProject(projectId: string): Promise<ProjectRecord> {
    ProjectIdSchema.parse(projectId);
    return (await this.loadProject(projectId)) ?? emptyProject(projectId);
  }

  async commitProject(expectedVersion: number, data: ProjectConfiguration): Promise<ProjectRecord> {
    const name = projectRecordName(data.projectId);
    const current = await this.readProject(data.projectId);
    if (current.version !== expectedVersion) {
      throw new StaleRecordError(name, expectedVersion, current.version);
    }

    const next: ProjectRecord = {
      name,
      version: current.version + 1,
      updatedAt: new Date().toISOString(),
      data: ProjectRecordSchema.shape.data.parse(data),
    };
    await this.saveProject(next);
    log().debug({ project: data.projectId, version: next.version }, 'project record committed');
    return next;
  }
}

export interface FileConfigStoreOptions {
  lock?: LockOptions;
}

/**
 * JSON files under a state directory:
 *   <dir>/global.json
 *   <dir>/projects/<projectId>.json
 */
export class FileConfigStore extends BaseConfigStore {
  private globalPath: string;
  private projectsDir: string;

  constructor(
    readonly stateDir: string,
    private options: FileConfigStoreOptions = {},
  ) {
    super();
    this.globalPath = join(stateDir, 'global.json');
    this.projectsDir = join(stateDir, 'projects');
  }

  projectPath(projectId: string): string {
    return join(this.projectsDir, `${ProjectIdSchema.parse(projectId)}.json`);
  }

  protected async loadGlobal(): Promise<GlobalRecord | null> {
    return this.readRecord(this.globalPath, (raw) => GlobalRecordSchema.parse(raw)).catch((err: unknown) => {
      throw globalFailure(err, 'Failed to read');
    });
  }

  protected async saveGlobal(record: GlobalRecord): Promise<void> {
    try {
      await atomicWriteJson(this.globalPath, GlobalRecordSchema.parse(record));
    } catch (err) {
      throw globalFailure(err, 'Atomic write failed');
    }
  }

  protected async loadProject(projectId: string): Promise<ProjectRecord | null> {
    return this.readRecord(this.projectPath(projectId), (raw) => ProjectRecordSchema.parse(raw));
  }

  protected async saveProject(record: ProjectRecord): Promise<void> {
    await atomicWriteJson(this.projectPath(record.data.projectId), ProjectRecordSchema.parse(record));
  }

  async listProjects(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.projectsDir);
    } catch (err: unknown) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
        return [];
      }
      throw new PersistenceError(this.projectsDir, 'Failed to list projects', { cause: err });
    }
    return names
      .filter((n) => n.endsWith('.json'))
      .map((n) => n.slice(0, -'.json'.length))
      .sort();
  }

  async withGlobalLock<T>(fn: () => Promise<T>): Promise<T> {
    const release = await acquireLock(this.globalPath, this.options.lock).catch((err: unknown) => {
      throw globalFailure(err, 'Failed to acquire lock');
    });
    try {
      return await fn();
    } finally {
      await release();
    }
  }

  withProjectLock<T>(projectId: string, fn: () => Promise<T>): Promise<T> {
    return withLock(this.projectPath(projectId), fn, this.options.lock);
  }

  private async readRecord<T>(filePath: string, parse: (raw: unknown) => T): Promise<T | null> {
    const content = await safeReadFile(filePath);
    if (content === null) return null;

    try {
      return parse(JSON.parse(content));
    } catch (err) {
      throw new PersistenceError(filePath, 'Invalid configuration record', { cause: err });
    }
  }
}
