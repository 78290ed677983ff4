/**
 * In-process config store with the same compare-and-set semantics as the
 * file store, for tests and embedding.
 */

import type { GlobalConfiguration, ProjectConfiguration } from '../core/types.js';
import {
  BaseConfigStore,
  GLOBAL_RECORD,
  projectRecordName,
  type GlobalRecord,
  type ProjectRecord,
} from './config-store.js';
import { KeyedLock } from './lock.js';

export interface MemoryConfigStoreSeed {
  global?: GlobalConfiguration;
  projects?: ProjectConfiguration[];
}

export class MemoryConfigStore extends BaseConfigStore {
  private global: GlobalRecord | null = null;
  private projects = new Map<string, ProjectRecord>();
  private locks = new KeyedLock();

  constructor(seed: MemoryConfigStoreSeed = {}) {
    super();
    const updatedAt = new Date().toISOString();
    if (seed.global) {
      this.global = { name: GLOBAL_RECORD, version: 1, updatedAt, data: clone(seed.global) };
    }
    for (const project of seed.projects ?? []) {
      this.projects.set(project.projectId, {
        name: projectRecordName(project.projectId),
        version: 1,
        updatedAt,
        data: clone(project),
      });
    }
  }

  protected async loadGlobal(): Promise<GlobalRecord | null> {
    return this.global ? clone(this.global) : null;
  }

  protected async saveGlobal(record: GlobalRecord): Promise<void> {
    this.global = clone(record);
  }

  protected async loadProject(projectId: string): Promise<ProjectRecord | null> {
    const record = this.projects.get(projectId);
    return record ? clone(record) : null;
  }

  protected async saveProject(record: ProjectRecord): Promise<void> {
    this.projects.set(record.data.projectId, clone(record));
  }

  async listProjects(): Promise<string[]> {
    return [...this.projects.keys()].sort();
  }

  withGlobalLock<T>(fn: () => Promise<T>): Promise<T> {
    return this.locks.run(GLOBAL_RECORD, fn);
  }

  withProjectLock<T>(projectId: string, fn: () => Promise<T>): Promise<T> {
    return this.locks.run(projectRecordName(projectId), fn);
  }
}

function clone<T>(value: T): T {
  return structuredClone(value);
}
