/**
 * Discovery plugin registry
 */

import { NotFoundError } from '../core/errors.js';
import type { DiscoveryPlugin } from '../core/types.js';
import { GitHubAdapter, GITHUB_TOOL } from './github.js';
import { JsonAdapter, JSON_TOOL } from './json.js';
import { TaskwarriorAdapter, TASKWARRIOR_TOOL } from './taskwarrior.js';

export type PluginFactory = (projectRoot: string) => DiscoveryPlugin;

const FACTORIES: ReadonlyMap<string, PluginFactory> = new Map<string, PluginFactory>([
  [GITHUB_TOOL, (root) => new GitHubAdapter(root)],
  [JSON_TOOL, (root) => new JsonAdapter(root)],
  [TASKWARRIOR_TOOL, (root) => new TaskwarriorAdapter(root)],
]);

export function availablePlugins(): string[] {
  return [...FACTORIES.keys()].sort();
}

export function getPlugin(name: string, projectRoot: string): DiscoveryPlugin {
  const factory = FACTORIES.get(name);
  if (!factory) {
    throw new NotFoundError(`Plugin "${name}" not found`, {
      fix: `Available plugins: ${availablePlugins().join(', ')}`,
    });
  }
  return factory(projectRoot);
}

/** Instantiate every plugin named by the given tools */
export function createPlugins(tools: Iterable<string>, projectRoot: string): DiscoveryPlugin[] {
  return [...new Set(tools)].map((tool) => getPlugin(tool, projectRoot));
}

export { ConceptCollector } from './common.js';
export { GitHubAdapter, extractIssues } from './github.js';
export { JsonAdapter } from './json.js';
export { TaskwarriorAdapter, parseTaskwarriorExport } from './taskwarrior.js';
