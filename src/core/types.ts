/**
 * semsync - Core Types
 *
 * Semantic vocabulary, configuration records and the Common Intermediate Form
 * shared by every stage of a mediation run
 */

// ============ Semantic Vocabulary ============

export const ALL_ROLES = ['label', 'container', 'status', 'priority'] as const;

export type SemanticRole = (typeof ALL_ROLES)[number];

export interface SemanticEntity {
  id: string;
  role: SemanticRole;
  description: string;
}

export function isSemanticRole(value: string): value is SemanticRole {
  return ALL_ROLES.some((role) => role === value);
}

/** Code-unit order, independent of the host locale */
export function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

// ============ Resolution ============

/** Recorded "do not map" marker, distinct from an absent override */
export const EXPLICIT_NONE = 'explicit-none' as const;
export type ExplicitNone = typeof EXPLICIT_NONE;

/** No override and no global default */
export const UNMAPPED = 'unmapped' as const;
export type Unmapped = typeof UNMAPPED;

export type OverrideTarget = { entityId: string } | ExplicitNone;

export type Resolution = { entityId: string } | ExplicitNone | Unmapped;

export type ResolutionSource = 'project' | 'global' | 'none';

export interface ExplainedResolution {
  resolution: Resolution;
  source: ResolutionSource;
}

// ============ Configuration Records ============

export interface MappingKey {
  tool: string;
  rawConceptId: string;
}

export interface DefaultMapping extends MappingKey {
  entityId: string;
}

export interface OverrideEntry extends MappingKey {
  target: OverrideTarget;
}

export interface GlobalConfiguration {
  entities: SemanticEntity[];
  defaultMappings: DefaultMapping[];
}

export interface ProjectConfiguration {
  projectId: string;
  overrides: OverrideEntry[];
  decisions: Decision[];
}

/** Named record with a monotonic version, bumped on every write */
export interface VersionedRecord<T> {
  name: string;
  version: number;
  updatedAt: string;
  data: T;
}

// ============ Raw Tool Data ============

export interface RawToolEntity {
  tool: string;
  rawConceptId: string;
  rawLabel: string;
  attributes: Record<string, string>;
}

/** One task instance as reported by a plugin */
export interface RawTaskRecord {
  tool: string;
  sourceId: string;
  title: string;
  conceptIds: string[];
  attributes: Record<string, string>;
}

// ============ Common Intermediate Form ============

export type CIFFields = Partial<Record<SemanticRole, string[]>>;

export interface CIFTask {
  sourceTool: string;
  sourceId: string;
  title: string;
  fields: CIFFields;
  unmapped: string[];
}

// ============ Discovery ============

export interface DiscoveredEntity {
  entity: RawToolEntity;
  /** Plugin-supplied: observed usage conflicts with the mapped role */
  conflict?: boolean;
  /** Plugin-supplied role suggestion, never applied automatically */
  roleHint?: SemanticRole;
}

export interface DiscoveryReport {
  entities: DiscoveredEntity[];
  records: RawTaskRecord[];
}

/** Read-only view a plugin gets of the current mapping */
export interface DiscoveryContext {
  projectId: string;
  mappedRole(rawConceptId: string): SemanticRole | undefined;
  signal?: AbortSignal;
}

export interface DiscoveryPlugin {
  readonly tool: string;
  discover(target: string, context: DiscoveryContext): Promise<DiscoveryReport>;
}

export interface Observation extends DiscoveredEntity {
  projectId: string;
}

export interface DiscoverySnapshot {
  observations: Observation[];
  /** Projects whose discovery failed for at least one tool */
  partialProjects: string[];
}

// ============ Change Detection ============

export type ChangeKind = 'new' | 'changed' | 'reopened';

export interface DetectedChange {
  kind: ChangeKind;
  tool: string;
  rawConceptId: string;
  entity: RawToolEntity;
  affectedProjects: string[];
  currentEntityId: string | null;
  roleHint: SemanticRole | null;
  reason: string;
}

export interface ChangeSet {
  newEntities: RawToolEntity[];
  affectedProjects: string[];
  changes: DetectedChange[];
  partialProjects: string[];
}

// ============ Proposals & Decisions ============

export type CandidateRole = SemanticRole | 'unknown';

export interface Proposal {
  id: string;
  kind: ChangeKind;
  tool: string;
  rawConceptId: string;
  rawLabel: string;
  candidateRole: CandidateRole;
  suggestedEntityId: string | null;
  affectedProjects: string[];
}

export type DecisionOutcome =
  /** `expectedRole` overrides the proposal's candidate role in the role check */
  | { type: 'accept'; entityId: string; expectedRole?: SemanticRole }
  | { type: 'create'; entity: SemanticEntity; promoteDefault?: boolean }
  | { type: 'ignore' }
  | { type: 'defer' };

export interface Decision {
  proposalId: string;
  projectId: string;
  tool: string;
  rawConceptId: string;
  outcome: DecisionOutcome;
  decidedAt: string;
}

/** An answer from the interaction boundary, before fan-out to projects */
export interface DecisionInput {
  proposalId: string;
  outcome: DecisionOutcome;
  /** Restrict the answer to one affected project */
  projectId?: string;
}

export interface DecisionSource {
  collect(proposals: Proposal[], signal: AbortSignal): Promise<DecisionInput[]>;
}

export type ProposalState = 'open' | 'accepted' | 'ignored' | 'deferred';

// ============ Results ============

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): Result<T, never> {
  return { ok: true, value };
}

export function err<E>(error: E): Result<never, E> {
  return { ok: false, error };
}

export interface AppliedDecision {
  decision: Decision;
  state: ProposalState;
  globalVersion: number;
  projectVersion: number;
}

export interface FailedDecision {
  decision: Decision;
  error: Error;
}

export interface DiscoveryFailure {
  tool: string;
  projectId: string;
  message: string;
}

export interface RunResult {
  changeSet: ChangeSet;
  proposals: Proposal[];
  applied: AppliedDecision[];
  failed: FailedDecision[];
  skipped: Decision[];
  discoveryErrors: DiscoveryFailure[];
  /** Set when a global persistence failure stopped the batch */
  abortedBy: string | null;
  stats: {
    observations: number;
    proposals: number;
    accepted: number;
    created: number;
    ignored: number;
    deferred: number;
    failed: number;
  };
}

export interface RunOptions {
  dryRun?: boolean;
  signal?: AbortSignal;
  timeoutMs?: number;
  projects?: string[];
}
