/**
 * Taskwarrior Adapter
 *
 * Discovers tags, projects, statuses and priorities from `task export`
 * output, either a saved export file or a live `task:<filter>` target.
 */

import { execFile } from 'node:child_process';
import { readFile } from 'node:fs/promises';
import { promisify } from 'node:util';
import { z } from 'zod';
import { ConceptCollector, resolveTarget } from './common.js';
import { toError } from '../core/errors.js';
import type { DiscoveryContext, DiscoveryPlugin, DiscoveryReport } from '../core/types.js';

const execFileAsync = promisify(execFile);

export const TASKWARRIOR_TOOL = 'taskwarrior';
const LIVE_PREFIX = 'task:';

const TaskwarriorTaskSchema = z.object({
  uuid: z.string().min(1),
  description: z.string().default(''),
  status: z.string().min(1),
  project: z.string().optional(),
  priority: z.string().optional(),
  tags: z.array(z.string()).default([]),
});

const TaskwarriorExportSchema = z.array(TaskwarriorTaskSchema);

export type TaskwarriorTask = z.infer<typeof TaskwarriorTaskSchema>;

/** Parse `task export` output: a JSON array, or one object per line */
export function parseTaskwarriorExport(content: string): TaskwarriorTask[] {
  const trimmed = content.trim();
  if (trimmed === '') return [];

  const raw: unknown = trimmed.startsWith('[')
    ? JSON.parse(trimmed)
    : trimmed
        .split('\n')
        .map((line) => line.trim().replace(/,$/, ''))
        .filter(Boolean)
        .map((line): unknown => JSON.parse(line));

  return TaskwarriorExportSchema.parse(raw);
}

export class TaskwarriorAdapter implements DiscoveryPlugin {
  readonly tool = TASKWARRIOR_TOOL;
  private projectRoot: string;

  constructor(projectRoot: string) {
    this.projectRoot = projectRoot;
  }

  async discover(target: string, context: DiscoveryContext): Promise<DiscoveryReport> {
    const tasks = await this.readTasks(target, context.signal);
    const collector = new ConceptCollector(this.tool, context);

    for (const task of tasks) {
      const concepts: string[] = [];
      if (task.project) {
        concepts.push(collector.see(`project:${task.project}`, task.project, 'container'));
      }
      concepts.push(collector.see(`status:${task.status}`, task.status, 'status'));
      if (task.priority) {
        concepts.push(collector.see(`priority:${task.priority}`, task.priority, 'priority'));
      }
      for (const tag of task.tags) {
        concepts.push(collector.see(`+${tag}`, `+${tag}`, 'label'));
      }
      collector.addRecord(task.uuid, task.description, concepts, { status: task.status });
    }

    return collector.report();
  }

  /** Read tasks from an export file, or run `task export` for a live target */
  async readTasks(target: string, signal?: AbortSignal): Promise<TaskwarriorTask[]> {
    if (target.startsWith(LIVE_PREFIX)) {
      const filter = target.slice(LIVE_PREFIX.length).trim();
      const args = ['rc.json.array=on', ...(filter ? filter.split(/\s+/) : []), 'export'];
      const { stdout } = await execFileAsync('task', args, {
        cwd: this.projectRoot,
        encoding: 'utf-8',
        maxBuffer: 64 * 1024 * 1024,
        signal,
      });
      return parseTaskwarriorExport(stdout);
    }

    const path = resolveTarget(this.projectRoot, target);
    const content = await readFile(path, { encoding: 'utf-8', signal });
    try {
      return parseTaskwarriorExport(content);
    } catch (error) {
      throw new Error(`Unreadable Taskwarrior export ${path}: ${toError(error).message}`, { cause: error });
    }
  }
}
