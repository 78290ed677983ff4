/**
 * Human-readable output for the semsync CLI
 */

import chalk from 'chalk';
import { SemsyncError } from '../core/errors.js';
import { EXPLICIT_NONE, UNMAPPED } from '../core/types.js';
import type { EngineStatus } from '../core/sync.js';
import type {
  ExplainedResolution,
  MappingKey,
  Proposal,
  Resolution,
  RunResult,
  SemanticEntity,
} from '../core/types.js';

const RULE = '─'.repeat(50);

export function formatResolution(resolution: Resolution): string {
  if (resolution === EXPLICIT_NONE) return 'explicitly unmapped';
  if (resolution === UNMAPPED) return 'unmapped';
  return resolution.entityId;
}

export function formatExplained(explained: ExplainedResolution): string {
  const from = explained.source === 'none' ? '' : chalk.dim(` (${explained.source})`);
  return `${formatResolution(explained.resolution)}${from}`;
}

export function formatStatus(status: EngineStatus, stateDir: string): string[] {
  const lines = ['', chalk.bold('semsync status'), RULE];
  lines.push(`  Store: ${stateDir}`);
  lines.push(`  Global record: v${status.globalVersion}`);
  lines.push(`  Entities: ${status.entities}`);
  lines.push(`  Default mappings: ${status.defaultMappings}`);
  lines.push(`  Plugins: ${status.plugins.join(', ')}`);

  if (status.projects.length === 0) {
    lines.push('', chalk.yellow('No projects configured. Add them to .semsync/config.json.'));
    return lines;
  }

  lines.push('', chalk.dim('Projects:'));
  for (const project of status.projects) {
    const sources = project.sources.length > 0 ? project.sources.join(', ') : chalk.dim('no sources');
    lines.push(
      `  ${chalk.cyan(project.id)} v${project.version}  ${project.overrides} overrides, ${project.decisions} decisions`,
    );
    lines.push(chalk.dim(`    ${sources}`));
  }
  return lines;
}

export function formatProposals(proposals: Proposal[]): string[] {
  if (proposals.length === 0) {
    return [chalk.green('✓ No changes detected.')];
  }

  const lines = [chalk.bold(`\nProposals (${proposals.length}):`), RULE];
  for (const p of proposals) {
    const suggestion = p.suggestedEntityId ? ` → ${p.suggestedEntityId}` : '';
    lines.push(`  [${p.kind}] ${p.tool} ${p.rawConceptId} (${p.candidateRole})${suggestion}`);
    lines.push(chalk.dim(`    projects: ${p.affectedProjects.join(', ')}`));
  }
  return lines;
}

export function formatRunResult(result: RunResult, dryRun: boolean): string[] {
  const prefix = dryRun ? chalk.yellow('[DRY RUN] ') : '';
  const lines = ['', prefix + chalk.bold('Sync Results'), RULE];

  lines.push(chalk.dim('Discovery:'));
  lines.push(`  Observations: ${result.stats.observations}`);
  lines.push(`  Proposals: ${result.stats.proposals}`);
  if (result.changeSet.partialProjects.length > 0) {
    lines.push(chalk.yellow(`  Partial: ${result.changeSet.partialProjects.join(', ')}`));
  }

  if (dryRun) {
    lines.push(...formatProposals(result.proposals));
  } else {
    lines.push(chalk.dim('Decisions:'));
    lines.push(`  Accepted: ${result.stats.accepted}`);
    lines.push(`  Created: ${result.stats.created}`);
    lines.push(`  Ignored: ${result.stats.ignored}`);
    lines.push(`  Deferred: ${result.stats.deferred}`);
  }

  if (result.discoveryErrors.length > 0) {
    lines.push('\n' + chalk.red(`⚠ Discovery errors (${result.discoveryErrors.length}):`));
    for (const e of result.discoveryErrors) {
      lines.push(`  ${e.projectId}: ${e.message}`);
    }
  }

  if (result.failed.length > 0) {
    lines.push('\n' + chalk.red(`✗ Failed (${result.failed.length}):`));
    for (const f of result.failed) {
      lines.push(`  ${f.decision.projectId} ${f.decision.tool} ${f.decision.rawConceptId}`);
      lines.push(chalk.dim(`    → ${f.error.message}`));
    }
  }

  if (result.skipped.length > 0) {
    lines.push('\n' + chalk.gray(`⊘ Skipped (${result.skipped.length})`));
  }

  if (result.abortedBy) {
    lines.push(chalk.red(`Batch stopped: ${result.abortedBy}`));
  }

  lines.push('');
  return lines;
}

export function formatEntities(entities: SemanticEntity[]): string[] {
  if (entities.length === 0) {
    return [chalk.dim('No entities registered.')];
  }
  const lines = [chalk.bold(`\nEntities (${entities.length}):`), RULE];
  for (const e of entities) {
    const description = e.description ? chalk.dim(`  ${e.description}`) : '';
    lines.push(`  ${e.id.padEnd(24)} ${e.role.padEnd(10)}${description}`);
  }
  return lines;
}

export function formatMappings(projectId: string, rows: Array<MappingKey & ExplainedResolution>): string[] {
  if (rows.length === 0) {
    return [chalk.dim(`No mappings visible to ${projectId}.`)];
  }
  const lines = [chalk.bold(`\nMappings for ${projectId} (${rows.length}):`), RULE];
  for (const row of rows) {
    lines.push(`  ${row.tool} ${row.rawConceptId} → ${formatExplained(row)}`);
  }
  return lines;
}

/** Message plus fix hint, for stderr */
export function formatError(error: Error): string[] {
  const lines = [chalk.red(`Error: ${error.message}`)];
  if (error instanceof SemsyncError && error.fix) {
    lines.push(chalk.dim(`  Fix: ${error.fix}`));
  }
  return lines;
}
