/**
 * Settings for semsync.
 *
 * Resolution priority: environment variables > .semsync/config.json > defaults
 */

import { join } from 'node:path';
import { ExitCode, SemsyncError } from './errors.js';
import { atomicWriteJson, safeReadFile } from '../store/atomic.js';
import {
  LogLevelSchema,
  NonInteractiveOutcomeSchema,
  SettingsSchema,
  type Settings,
} from '../store/schema.js';

export const STATE_DIR = '.semsync';
export const SETTINGS_FILE = 'config.json';

export function getStateDir(projectRoot: string): string {
  return join(projectRoot, STATE_DIR);
}

export function getSettingsPath(projectRoot: string): string {
  return join(getStateDir(projectRoot), SETTINGS_FILE);
}

export function defaultSettings(): Settings {
  return SettingsSchema.parse({});
}

function configError(message: string, cause?: unknown): SemsyncError {
  return new SemsyncError(ExitCode.CONFIG_ERROR, message, {
    fix: `Check ${STATE_DIR}/${SETTINGS_FILE} and the SEMSYNC_* environment variables.`,
    cause,
  });
}

/** Apply SEMSYNC_* environment overrides on top of file settings */
export function applyEnv(settings: Settings, env: NodeJS.ProcessEnv = process.env): Settings {
  const next: Settings = {
    ...settings,
    decisions: { ...settings.decisions },
    logging: { ...settings.logging },
    store: { ...settings.store },
  };

  const level = env['SEMSYNC_LOG_LEVEL'];
  if (level) {
    const parsed = LogLevelSchema.safeParse(level);
    if (!parsed.success) throw configError(`Invalid SEMSYNC_LOG_LEVEL: ${level}`);
    next.logging.level = parsed.data;
  }

  const timeout = env['SEMSYNC_DECISION_TIMEOUT_MS'];
  if (timeout) {
    const ms = Number(timeout);
    if (!Number.isInteger(ms) || ms <= 0) {
      throw configError(`Invalid SEMSYNC_DECISION_TIMEOUT_MS: ${timeout}`);
    }
    next.decisions.timeoutMs = ms;
  }

  const outcome = env['SEMSYNC_NON_INTERACTIVE_OUTCOME'];
  if (outcome) {
    const parsed = NonInteractiveOutcomeSchema.safeParse(outcome);
    if (!parsed.success) {
      throw configError(`Invalid SEMSYNC_NON_INTERACTIVE_OUTCOME: ${outcome} (use defer or ignore)`);
    }
    next.decisions.nonInteractiveOutcome = parsed.data;
  }

  return next;
}

export async function loadSettings(
  projectRoot: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Settings> {
  const path = getSettingsPath(projectRoot);
  const content = await safeReadFile(path);

  let raw: unknown = {};
  if (content !== null) {
    try {
      raw = JSON.parse(content);
    } catch (err) {
      throw configError(`Invalid JSON in ${path}`, err);
    }
  }

  const parsed = SettingsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw configError(
      `Invalid settings in ${path}: ${issue ? `${issue.path.join('.')}: ${issue.message}` : 'unknown error'}`,
      parsed.error,
    );
  }

  return applyEnv(parsed.data, env);
}

export async function saveSettings(projectRoot: string, settings: Settings): Promise<void> {
  await atomicWriteJson(getSettingsPath(projectRoot), SettingsSchema.parse(settings));
}
