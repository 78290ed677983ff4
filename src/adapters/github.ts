/**
 * GitHub Adapter
 *
 * Discovers labels, issue states and milestones from a saved issues export:
 * the REST issue list, or ProjectV2 item nodes (bare or inside the full
 * GraphQL response). Pull requests are skipped.
 */

import { z } from 'zod';
import { ConceptCollector, readExport, resolveTarget } from './common.js';
import type { DiscoveryContext, DiscoveryPlugin, DiscoveryReport } from '../core/types.js';

export const GITHUB_TOOL = 'github';

const LabelSchema = z.union([z.string(), z.object({ name: z.string() })]);

const IssueSchema = z.object({
  number: z.number().int().optional(),
  databaseId: z.number().int().optional(),
  id: z.union([z.string(), z.number()]).optional(),
  title: z.string().default('No Title'),
  state: z.string().min(1),
  labels: z
    .union([z.array(LabelSchema), z.object({ nodes: z.array(z.object({ name: z.string() })) })])
    .default([]),
  milestone: z.object({ title: z.string() }).nullish(),
  pull_request: z.unknown().optional(),
});

export type GitHubIssue = z.infer<typeof IssueSchema>;

const ItemListSchema = z.array(z.record(z.unknown()));

const GraphQLResponseSchema = z.object({
  data: z.object({
    organization: z.object({
      projectV2: z.object({
        items: z.object({ nodes: ItemListSchema }),
      }),
    }),
  }),
});

const ExportSchema = z.union([ItemListSchema, GraphQLResponseSchema]);

function labelNames(issue: GitHubIssue): string[] {
  if (Array.isArray(issue.labels)) {
    return issue.labels.map((l) => (typeof l === 'string' ? l : l.name));
  }
  return issue.labels.nodes.map((l) => l.name);
}

function sourceIdOf(issue: GitHubIssue): string | null {
  const id = issue.number ?? issue.databaseId ?? issue.id;
  return id === undefined ? null : String(id);
}

/**
 * Pull issues out of an export. Items that are not issues (pull requests,
 * draft items, empty ProjectV2 content) are dropped.
 */
export function extractIssues(exported: z.infer<typeof ExportSchema>): GitHubIssue[] {
  const items = Array.isArray(exported) ? exported : exported.data.organization.projectV2.items.nodes;
  const issues: GitHubIssue[] = [];

  for (const item of items) {
    const candidate = 'content' in item ? item['content'] : item;
    const parsed = IssueSchema.safeParse(candidate);
    if (!parsed.success || parsed.data.pull_request !== undefined) continue;
    if (sourceIdOf(parsed.data) === null) continue;
    issues.push(parsed.data);
  }

  return issues;
}

export class GitHubAdapter implements DiscoveryPlugin {
  readonly tool = GITHUB_TOOL;
  private projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
  }

  async discover(target: string, context: DiscoveryContext): Promise<DiscoveryReport> {
    const exported = await readExport(resolveTarget(this.projectRoot, target), ExportSchema, context.signal);
    const collector = new ConceptCollector(this.tool, context);

    for (const issue of extractIssues(exported)) {
      const state = issue.state.toLowerCase();
      const concepts = [collector.see(`state:${state}`, state, 'status')];
      if (issue.milestone) {
        concepts.push(collector.see(`milestone:${issue.milestone.title}`, issue.milestone.title, 'container'));
      }
      for (const name of labelNames(issue)) {
        concepts.push(collector.see(`label:${name}`, name, 'label'));
      }
      collector.addRecord(sourceIdOf(issue) ?? '', issue.title, concepts, { state });
    }

    return collector.report();
  }
}
