/**
 * Shared helpers for discovery adapters
 */

import { readFile } from 'node:fs/promises';
import { isAbsolute, resolve } from 'node:path';
import type { z } from 'zod';
import type {
  DiscoveredEntity,
  DiscoveryContext,
  DiscoveryReport,
  RawTaskRecord,
  SemanticRole,
} from '../core/types.js';

/**
 * Collects the distinct concepts seen across one discovery call. A concept's
 * conflict flag is raised when any occurrence uses it in a role other than
 * the one it is currently mapped to.
 */
export class ConceptCollector {
  private concepts = new Map<string, DiscoveredEntity>();
  private counts = new Map<string, number>();
  private usages = new Map<string, SemanticRole[]>();
  readonly records: RawTaskRecord[] = [];

  constructor(
    private tool: string,
    private context: DiscoveryContext,
  ) {}

  /** Record one occurrence and return the concept id. `usage` is null when the source gives no role. */
  see(rawConceptId: string, rawLabel: string, usage: SemanticRole | null, attributes: Record<string, string> = {}): string {
    const count = (this.counts.get(rawConceptId) ?? 0) + 1;
    this.counts.set(rawConceptId, count);

    let discovered = this.concepts.get(rawConceptId);
    if (!discovered) {
      discovered = {
        entity: { tool: this.tool, rawConceptId, rawLabel, attributes: { ...attributes } },
        conflict: false,
      };
      this.concepts.set(rawConceptId, discovered);
    }
    discovered.entity.attributes['occurrences'] = String(count);

    if (usage !== null) {
      this.observeUsage(discovered, usage);
    }
    return rawConceptId;
  }

  /**
   * The first role seen becomes the hint; every distinct role seen is listed
   * under `usages` once there is more than one.
   */
  private observeUsage(discovered: DiscoveredEntity, usage: SemanticRole): void {
    const { rawConceptId, attributes } = discovered.entity;
    const seen = this.usages.get(rawConceptId) ?? [];
    if (!seen.includes(usage)) {
      seen.push(usage);
      this.usages.set(rawConceptId, seen);
    }

    if (discovered.roleHint === undefined) {
      discovered.roleHint = usage;
      attributes['usage'] = usage;
    }
    if (seen.length > 1) {
      attributes['usages'] = seen.join(',');
    }

    const mapped = this.context.mappedRole(rawConceptId);
    if (mapped !== undefined && mapped !== usage) {
      discovered.conflict = true;
    }
  }

  addRecord(sourceId: string, title: string, conceptIds: string[], attributes: Record<string, string> = {}): void {
    this.records.push({ tool: this.tool, sourceId, title, conceptIds, attributes });
  }

  report(): DiscoveryReport {
    return { entities: [...this.concepts.values()], records: this.records };
  }
}

export function resolveTarget(projectRoot: string, target: string): string {
  return isAbsolute(target) ? target : resolve(projectRoot, target);
}

/** Read and validate a JSON export file */
export async function readExport<S extends z.ZodTypeAny>(
  path: string,
  schema: S,
  signal?: AbortSignal,
): Promise<z.output<S>> {
  const content = await readFile(path, { encoding: 'utf-8', signal });
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new Error(`Invalid JSON in ${path}`, { cause: error });
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      `Unexpected export format in ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`,
      { cause: parsed.error },
    );
  }
  return parsed.data;
}
