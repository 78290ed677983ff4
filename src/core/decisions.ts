/**
 * Decision collection boundary.
 *
 * The engine hands a batch of proposals to a DecisionSource and waits for a
 * batch of answers. Unanswered proposals, timeouts and cancellation all
 * resolve to `defer`.
 */

import { ValidationError } from './errors.js';
import { getLogger } from './logger.js';
import { DecisionInputSchema, type NonInteractiveOutcome } from '../store/schema.js';
import type {
  Decision,
  DecisionInput,
  DecisionOutcome,
  DecisionSource,
  Proposal,
} from './types.js';

const log = () => getLogger('decisions');

/** Answers every proposal with a configured outcome, never accept/create */
export class NonInteractiveDecisionSource implements DecisionSource {
  constructor(private outcome: NonInteractiveOutcome = 'defer') {}

  async collect(proposals: Proposal[]): Promise<DecisionInput[]> {
    return proposals.map((p) => ({ proposalId: p.id, outcome: { type: this.outcome } }));
  }
}

/**
 * Pre-recorded answers keyed by `tool/rawConceptId` or by proposal id.
 * Proposals without an answer are left out (and so deferred).
 */
export class ScriptedDecisionSource implements DecisionSource {
  readonly seen: Proposal[][] = [];

  constructor(private answers: Record<string, DecisionOutcome | Omit<DecisionInput, 'proposalId'>>) {}

  async collect(proposals: Proposal[]): Promise<DecisionInput[]> {
    this.seen.push(proposals);
    const inputs: DecisionInput[] = [];
    for (const proposal of proposals) {
      const answer =
        this.answers[proposal.id] ?? this.answers[`${proposal.tool}/${proposal.rawConceptId}`];
      if (!answer) continue;
      if ('outcome' in answer) {
        inputs.push({ proposalId: proposal.id, ...answer });
      } else {
        inputs.push({ proposalId: proposal.id, outcome: answer });
      }
    }
    return inputs;
  }
}

/**
 * Run a source with a timeout and an optional outer signal. On timeout or
 * abort the source's pending answers are discarded and every proposal
 * defers.
 */
export async function collectDecisions(
  source: DecisionSource,
  proposals: Proposal[],
  options: { timeoutMs?: number; signal?: AbortSignal } = {},
): Promise<DecisionInput[]> {
  if (proposals.length === 0) return [];

  const signals: AbortSignal[] = [];
  if (options.signal) signals.push(options.signal);
  if (options.timeoutMs !== undefined) signals.push(AbortSignal.timeout(options.timeoutMs));
  const signal = signals.length > 0 ? AbortSignal.any(signals) : new AbortController().signal;

  if (signal.aborted) {
    log().info({ proposals: proposals.length }, 'decision collection skipped, already aborted');
    return [];
  }

  let resolveAborted: (inputs: DecisionInput[]) => void = () => undefined;
  const aborted = new Promise<DecisionInput[]>((resolve) => {
    resolveAborted = resolve;
  });
  const onAbort = () => resolveAborted([]);
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    const inputs = await Promise.race([source.collect(proposals, signal), aborted]);
    if (signal.aborted) {
      log().info({ proposals: proposals.length }, 'decision collection timed out or was cancelled');
      return [];
    }
    return inputs;
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
}

/**
 * Expand answers into per-project decisions. An answer without a project
 * scope covers every affected project; a create registers the entity once
 * and becomes an accept for the remaining projects. Proposals without an
 * answer produce a defer for each affected project.
 */
export function fanOut(
  proposals: Proposal[],
  inputs: DecisionInput[],
  decidedAt: string = new Date().toISOString(),
): Decision[] {
  const byProposal = new Map<string, DecisionInput[]>();
  for (const raw of inputs) {
    const parsed = DecisionInputSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ValidationError(`Malformed decision: ${parsed.error.issues[0]?.message ?? 'invalid'}`, {
        cause: parsed.error,
      });
    }
    const list = byProposal.get(raw.proposalId) ?? [];
    list.push(raw);
    byProposal.set(raw.proposalId, list);
  }

  const known = new Set(proposals.map((p) => p.id));
  for (const id of byProposal.keys()) {
    if (!known.has(id)) {
      throw new ValidationError(`Decision refers to unknown proposal ${id}`);
    }
  }

  const decisions: Decision[] = [];
  for (const proposal of proposals) {
    const answers = byProposal.get(proposal.id) ?? [];
    const scoped = new Map<string, DecisionOutcome>();
    let unscoped: DecisionOutcome | null = null;

    for (const answer of answers) {
      if (answer.projectId !== undefined) {
        if (!proposal.affectedProjects.includes(answer.projectId)) {
          throw new ValidationError(
            `Project "${answer.projectId}" is not affected by proposal ${proposal.id}`,
          );
        }
        scoped.set(answer.projectId, answer.outcome);
      } else {
        unscoped = answer.outcome;
      }
    }

    let createdEntityId: string | null = null;
    for (const projectId of proposal.affectedProjects) {
      let outcome: DecisionOutcome = scoped.get(projectId) ?? unscoped ?? { type: 'defer' };

      if (outcome.type === 'create') {
        if (createdEntityId === outcome.entity.id) {
          outcome = { type: 'accept', entityId: outcome.entity.id, expectedRole: outcome.entity.role };
        } else {
          createdEntityId = outcome.entity.id;
        }
      }

      decisions.push({
        proposalId: proposal.id,
        projectId,
        tool: proposal.tool,
        rawConceptId: proposal.rawConceptId,
        outcome,
        decidedAt,
      });
    }
  }

  return decisions;
}
