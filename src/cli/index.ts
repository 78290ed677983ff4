#!/usr/bin/env node
/**
 * semsync CLI
 *
 * Mediate task tool vocabularies into one shared semantic model
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync } from 'node:fs';
import { mkdir } from 'node:fs/promises';
import { join } from 'node:path';
import { availablePlugins, createPlugins } from '../adapters/index.js';
import { defaultSettings, getSettingsPath, getStateDir, loadSettings, saveSettings } from '../core/config.js';
import { NonInteractiveDecisionSource } from '../core/decisions.js';
import { ExitCode, NotFoundError, SemsyncError, UserAbortError, toError } from '../core/errors.js';
import { closeLogger, initLogger } from '../core/logger.js';
import { MediationEngine } from '../core/sync.js';
import { FileConfigStore } from '../store/config-store.js';
import type { Settings } from '../store/schema.js';
import {
  formatEntities,
  formatError,
  formatExplained,
  formatMappings,
  formatProposals,
  formatRunResult,
  formatStatus,
} from './format.js';
import { PromptDecisionSource } from './prompt.js';

const program = new Command();

program
  .name('semsync')
  .description('Map task tool concepts onto a shared semantic vocabulary')
  .version('0.1.0');

// Helper to get project root
function getProjectRoot(): string {
  return process.cwd();
}

function print(lines: string[]): void {
  for (const line of lines) console.log(line);
}

interface Session {
  root: string;
  stateDir: string;
  settings: Settings;
  engine: MediationEngine;
}

async function openSession(): Promise<Session> {
  const root = getProjectRoot();
  const stateDir = getStateDir(root);
  const settings = await loadSettings(root);
  initLogger(join(stateDir, settings.logging.filePath), settings.logging.level);

  const store = new FileConfigStore(stateDir, {
    lock: { stale: settings.store.lockStaleMs, retries: settings.store.lockRetries },
  });
  const engine = new MediationEngine({
    store,
    plugins: createPlugins(availablePlugins(), root),
    projects: settings.projects,
  });
  return { root, stateDir, settings, engine };
}

/** Cancels in-flight work on Ctrl-C */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new UserAbortError()));
  return controller.signal;
}

/** Run a command body, mapping errors to their exit codes */
function command<A extends unknown[]>(fn: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args);
    } catch (err) {
      const error = toError(err);
      for (const line of formatError(error)) console.error(line);
      process.exitCode = error instanceof SemsyncError ? error.code : ExitCode.GENERAL_ERROR;
    } finally {
      closeLogger();
    }
  };
}

async function requireProject(session: Session, projectId: string): Promise<void> {
  if (!(await session.engine.projectIds()).includes(projectId)) {
    throw new NotFoundError(`Unknown project "${projectId}"`, {
      fix: `Add it under "projects" in ${getSettingsPath(session.root)}.`,
    });
  }
}

// ============ Commands ============

program
  .command('init')
  .description('Initialize semsync in the current project')
  .action(
    command(async () => {
      const root = getProjectRoot();
      const stateDir = getStateDir(root);

      console.log('\n' + chalk.bold('Initializing semsync'));
      console.log('─'.repeat(40));

      if (!existsSync(stateDir)) {
        await mkdir(stateDir, { recursive: true });
        console.log(chalk.green('✓ Created .semsync/'));
      } else {
        console.log(chalk.dim('○ .semsync/ already exists'));
      }

      if (!existsSync(getSettingsPath(root))) {
        await saveSettings(root, defaultSettings());
        console.log(chalk.green('✓ Wrote .semsync/config.json'));
      } else {
        console.log(chalk.dim('○ .semsync/config.json already exists'));
      }

      console.log('\n' + chalk.cyan('Next steps:'));
      console.log('  1. Add projects and their sources to .semsync/config.json');
      console.log(`     (plugins: ${availablePlugins().join(', ')})`);
      console.log('  2. semsync discover');
      console.log('  3. semsync sync');
      console.log();
    }),
  );

program
  .command('status')
  .description('Show store location, record versions and projects')
  .action(
    command(async () => {
      const session = await openSession();
      print(formatStatus(await session.engine.getStatus(), session.stateDir));
      console.log();
    }),
  );

program
  .command('discover')
  .description('Detect new and changed concepts without writing anything')
  .option('--json', 'Output as JSON')
  .action(
    command(async (opts: { json?: boolean }) => {
      const session = await openSession();
      const detection = await session.engine.detect({ signal: interruptSignal() });

      if (opts.json) {
        console.log(
          JSON.stringify(
            { changeSet: detection.changeSet, proposals: detection.proposals, errors: detection.errors },
            null,
            2,
          ),
        );
        return;
      }

      print(formatProposals(detection.proposals));
      for (const e of detection.errors) {
        console.log(chalk.red(`  ⚠ ${e.projectId}: ${e.message}`));
      }
      console.log();
    }),
  );

program
  .command('sync')
  .description('Discover, ask for decisions and apply them')
  .option('-n, --dry-run', 'Show proposals without asking or writing')
  .option('--non-interactive', 'Answer every proposal with the configured default outcome')
  .action(
    command(async (opts: { dryRun?: boolean; nonInteractive?: boolean }) => {
      const session = await openSession();
      const interactive = !opts.nonInteractive && process.stdin.isTTY === true;
      const source = interactive
        ? new PromptDecisionSource()
        : new NonInteractiveDecisionSource(session.settings.decisions.nonInteractiveOutcome);

      const signal = interruptSignal();
      const result = await session.engine.run(source, {
        dryRun: opts.dryRun,
        signal,
        timeoutMs: session.settings.decisions.timeoutMs,
      });

      print(formatRunResult(result, opts.dryRun === true));
      const firstFailure = result.failed[0]?.error;
      if (signal.aborted) {
        process.exitCode = ExitCode.USER_ABORT;
      } else if (firstFailure) {
        process.exitCode = firstFailure instanceof SemsyncError ? firstFailure.code : ExitCode.GENERAL_ERROR;
      }
    }),
  );

program
  .command('entities')
  .description('List the global semantic vocabulary')
  .option('--json', 'Output as JSON')
  .action(
    command(async (opts: { json?: boolean }) => {
      const session = await openSession();
      const state = await session.engine.loadState([]);
      const entities = state.registry.snapshot();

      if (opts.json) {
        console.log(JSON.stringify(entities, null, 2));
      } else {
        print(formatEntities(entities));
        console.log();
      }
    }),
  );

program
  .command('mappings <project>')
  .description("Show a project's effective mappings and where each comes from")
  .option('--json', 'Output as JSON')
  .action(
    command(async (projectId: string, opts: { json?: boolean }) => {
      const session = await openSession();
      await requireProject(session, projectId);
      const state = await session.engine.loadState([projectId]);
      const rows = state.resolver.describeProject(projectId);

      if (opts.json) {
        console.log(JSON.stringify(rows, null, 2));
      } else {
        print(formatMappings(projectId, rows));
        console.log();
      }
    }),
  );

program
  .command('resolve <project> <tool> <concept>')
  .description('Resolve one raw concept for a project')
  .action(
    command(async (projectId: string, tool: string, concept: string) => {
      const session = await openSession();
      await requireProject(session, projectId);
      const explained = await session.engine.resolve(projectId, tool, concept);
      console.log(`${tool} ${concept} → ${formatExplained(explained)}`);
    }),
  );

program
  .command('normalize <project>')
  .description("Print the project's tasks in the common intermediate form as JSON")
  .action(
    command(async (projectId: string) => {
      const session = await openSession();
      await requireProject(session, projectId);
      const { tasks, errors } = await session.engine.normalizeProject(projectId, interruptSignal());

      console.log(JSON.stringify(tasks, null, 2));
      for (const e of errors) {
        console.error(chalk.red(`⚠ ${e.tool}: ${e.message}`));
      }
    }),
  );

program
  .command('clear <project> <tool> <concept>')
  .description('Remove a project override, lifting an ignore')
  .action(
    command(async (projectId: string, tool: string, concept: string) => {
      const session = await openSession();
      await requireProject(session, projectId);
      const removed = await session.engine.clearOverride(projectId, tool, concept);

      if (removed) {
        console.log(chalk.green(`✓ Cleared ${tool} ${concept} in ${projectId}`));
      } else {
        throw new NotFoundError(`No override for ${tool} ${concept} in ${projectId}`);
      }
    }),
  );

await program.parseAsync();
