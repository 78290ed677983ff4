/**
 * semsync
 *
 * Semantic mediation between task tools: a shared vocabulary, layered
 * mappings and human-approved change decisions
 */

export { MediationEngine } from './core/sync.js';
export type { MediationEngineOptions, EngineState, EngineStatus, DetectionOutcome } from './core/sync.js';
export { SemanticRegistry, findRoleViolations } from './core/registry.js';
export { MergeResolver, mappingKey } from './core/resolver.js';
export type { EffectiveMapping } from './core/resolver.js';
export { normalize, normalizeAll } from './core/normalizer.js';
export { detect, latestDecisions } from './core/detector.js';
export { generate, proposalId, slugify, stateAfter } from './core/proposals.js';
export { DecisionApplicator } from './core/applicator.js';
export type { ApplyError } from './core/applicator.js';
export {
  NonInteractiveDecisionSource,
  ScriptedDecisionSource,
  collectDecisions,
  fanOut,
} from './core/decisions.js';
export { loadSettings, saveSettings, applyEnv, defaultSettings, getStateDir } from './core/config.js';
export { initLogger, getLogger, closeLogger } from './core/logger.js';
export * from './core/errors.js';
export * from './core/types.js';
export { FileConfigStore } from './store/config-store.js';
export type { ConfigStore, GlobalRecord, ProjectRecord } from './store/config-store.js';
export { MemoryConfigStore } from './store/memory-store.js';
export type { Settings, ProjectBinding, SourceBinding } from './store/schema.js';
export {
  availablePlugins,
  createPlugins,
  getPlugin,
  GitHubAdapter,
  JsonAdapter,
  TaskwarriorAdapter,
} from './adapters/index.js';
export type { PluginFactory } from './adapters/index.js';
