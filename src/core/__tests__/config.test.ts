import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, mkdir, writeFile, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { applyEnv, defaultSettings, getSettingsPath, loadSettings, saveSettings } from '../config.js';
import { ExitCode, SemsyncError } from '../errors.js';

describe('settings', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'semsync-config-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  async function writeSettings(content: string): Promise<void> {
    await mkdir(join(root, '.semsync'), { recursive: true });
    await writeFile(getSettingsPath(root), content);
  }

  it('falls back to defaults without a settings file', async () => {
    const settings = await loadSettings(root, {});
    expect(settings).toEqual({
      projects: [],
      decisions: { nonInteractiveOutcome: 'defer', timeoutMs: 300_000 },
      logging: { level: 'info', filePath: 'logs/semsync.log' },
      store: { lockStaleMs: 10_000, lockRetries: 3 },
    });
  });

  it('reads projects and fills in missing sections', async () => {
    await writeSettings(
      JSON.stringify({
        projects: [{ id: 'web', sources: [{ tool: 'taskwarrior', target: 'task:project:web' }] }, { id: 'api' }],
        logging: { level: 'debug' },
      }),
    );
    const settings = await loadSettings(root, {});
    expect(settings.projects).toEqual([
      { id: 'web', sources: [{ tool: 'taskwarrior', target: 'task:project:web' }] },
      { id: 'api', sources: [] },
    ]);
    expect(settings.logging).toEqual({ level: 'debug', filePath: 'logs/semsync.log' });
  });

  it('lets the environment win over the file', async () => {
    await writeSettings(JSON.stringify({ decisions: { timeoutMs: 1000 } }));
    const settings = await loadSettings(root, {
      SEMSYNC_LOG_LEVEL: 'warn',
      SEMSYNC_DECISION_TIMEOUT_MS: '2500',
      SEMSYNC_NON_INTERACTIVE_OUTCOME: 'ignore',
    });
    expect(settings.logging.level).toBe('warn');
    expect(settings.decisions).toEqual({ nonInteractiveOutcome: 'ignore', timeoutMs: 2500 });
  });

  it('rejects invalid JSON with a config error', async () => {
    await writeSettings('{ not json');
    await expect(loadSettings(root, {})).rejects.toMatchObject({ code: ExitCode.CONFIG_ERROR });
  });

  it('rejects invalid project ids', async () => {
    await writeSettings(JSON.stringify({ projects: [{ id: '../escape' }] }));
    const error = await loadSettings(root, {}).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(SemsyncError);
    expect(error instanceof Error ? error.message : '').toContain('projects.0.id');
  });

  it('round-trips through saveSettings', async () => {
    const settings = defaultSettings();
    settings.projects.push({ id: 'web', sources: [] });
    await saveSettings(root, settings);

    expect(JSON.parse(await readFile(getSettingsPath(root), 'utf8'))).toEqual(settings);
    expect(await loadSettings(root, {})).toEqual(settings);
  });
});

describe('applyEnv', () => {
  it('does not modify its input', () => {
    const settings = defaultSettings();
    const next = applyEnv(settings, { SEMSYNC_LOG_LEVEL: 'error' });
    expect(next.logging.level).toBe('error');
    expect(settings.logging.level).toBe('info');
  });

  it.each([
    ['SEMSYNC_LOG_LEVEL', 'loud'],
    ['SEMSYNC_DECISION_TIMEOUT_MS', '-5'],
    ['SEMSYNC_DECISION_TIMEOUT_MS', 'soon'],
    ['SEMSYNC_NON_INTERACTIVE_OUTCOME', 'accept'],
  ])('rejects %s=%s', (name, value) => {
    expect(() => applyEnv(defaultSettings(), { [name]: value })).toThrow(SemsyncError);
  });
});
