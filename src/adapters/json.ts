/**
 * JSON Adapter
 *
 * Generic file source. Each task lists the concepts it carries; a concept
 * may name its usage role and raise its own conflict flag.
 */

import { z } from 'zod';
import { ConceptCollector, resolveTarget } from './common.js';
import { SemanticRoleSchema } from '../store/schema.js';
import { safeReadFile } from '../store/atomic.js';
import type { DiscoveryContext, DiscoveryPlugin, DiscoveryReport } from '../core/types.js';

export const JSON_TOOL = 'json';

const JsonConceptSchema = z.object({
  id: z.string().min(1),
  label: z.string().optional(),
  role: SemanticRoleSchema.optional(),
  conflict: z.boolean().optional(),
});

const JsonTaskSchema = z.object({
  id: z.union([z.string().min(1), z.number()]).transform(String),
  title: z.string().default(''),
  concepts: z.array(JsonConceptSchema).default([]),
});

export const JsonSourceSchema = z.object({
  tasks: z.array(JsonTaskSchema),
});

export type JsonSource = z.input<typeof JsonSourceSchema>;

export class JsonAdapter implements DiscoveryPlugin {
  readonly tool = JSON_TOOL;
  private projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
  }

  async discover(target: string, context: DiscoveryContext): Promise<DiscoveryReport> {
    const path = resolveTarget(this.projectRoot, target);
    const content = await safeReadFile(path);
    // A source file that does not exist yet has no tasks
    if (content === null) {
      return { entities: [], records: [] };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new Error(`Invalid JSON in ${path}`, { cause: error });
    }
    const parsed = JsonSourceSchema.safeParse(raw);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new Error(`Unexpected task file format in ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'invalid'}`);
    }

    const collector = new ConceptCollector(this.tool, context);
    const explicitConflicts = new Set<string>();

    for (const task of parsed.data.tasks) {
      const ids: string[] = [];
      for (const concept of task.concepts) {
        ids.push(collector.see(concept.id, concept.label ?? concept.id, concept.role ?? null));
        if (concept.conflict) explicitConflicts.add(concept.id);
      }
      collector.addRecord(task.id, task.title, ids);
    }

    const report = collector.report();
    for (const discovered of report.entities) {
      if (explicitConflicts.has(discovered.entity.rawConceptId)) discovered.conflict = true;
    }
    return report;
  }
}
