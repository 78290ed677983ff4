/**
 * Interactive decision source for the terminal.
 *
 * Walks the user through each proposal in order. An empty answer defers.
 */

import * as readline from 'node:readline';
import chalk from 'chalk';
import { slugify } from '../core/proposals.js';
import { isSemanticRole } from '../core/types.js';
import type { DecisionInput, DecisionOutcome, DecisionSource, Proposal, SemanticRole } from '../core/types.js';

export type Choice = 'accept' | 'create' | 'ignore' | 'defer';

/** Map a typed answer to a choice; null for anything unrecognised */
export function parseChoice(answer: string): Choice | null {
  const value = answer.trim().toLowerCase();
  if (value === '' || value === 'd' || value === 'defer') return 'defer';
  if (value === 'a' || value === 'accept') return 'accept';
  if (value === 'c' || value === 'create') return 'create';
  if (value === 'i' || value === 'ignore') return 'ignore';
  return null;
}

export function describeProposal(proposal: Proposal): string[] {
  const lines = [
    `${chalk.bold(proposal.tool)} ${chalk.cyan(proposal.rawConceptId)} ${chalk.dim(`(${proposal.kind})`)}`,
    `  label: ${proposal.rawLabel}`,
    `  role: ${proposal.candidateRole}`,
    `  projects: ${proposal.affectedProjects.join(', ')}`,
  ];
  if (proposal.suggestedEntityId) {
    lines.push(`  suggested: ${chalk.green(proposal.suggestedEntityId)}`);
  }
  return lines;
}

type Ask = (prompt: string) => Promise<string>;

export class PromptDecisionSource implements DecisionSource {
  constructor(
    private input: NodeJS.ReadableStream = process.stdin,
    private output: NodeJS.WritableStream = process.stderr,
  ) {}

  async collect(proposals: Proposal[], signal: AbortSignal): Promise<DecisionInput[]> {
    const rl = readline.createInterface({ input: this.input, output: this.output });
    const ask: Ask = (prompt) =>
      new Promise((resolve, reject) => {
        const onAbort = () => reject(signal.reason);
        signal.addEventListener('abort', onAbort, { once: true });
        rl.question(prompt, { signal }, (answer) => {
          signal.removeEventListener('abort', onAbort);
          resolve(answer);
        });
      });

    try {
      const inputs: DecisionInput[] = [];
      for (const [index, proposal] of proposals.entries()) {
        this.output.write(`\n[${index + 1}/${proposals.length}] ${describeProposal(proposal).join('\n')}\n`);
        const outcome = await this.askOutcome(proposal, ask);
        if (outcome.type === 'defer') continue;

        const scope = await this.askScope(proposal, ask);
        inputs.push(scope ? { proposalId: proposal.id, outcome, projectId: scope } : { proposalId: proposal.id, outcome });
      }
      return inputs;
    } finally {
      rl.close();
    }
  }

  private async askOutcome(proposal: Proposal, ask: Ask): Promise<DecisionOutcome> {
    for (;;) {
      const choice = parseChoice(await ask('[a]ccept, [c]reate, [i]gnore, [d]efer? '));
      switch (choice) {
        case 'defer':
          return { type: 'defer' };
        case 'ignore':
          return { type: 'ignore' };
        case 'accept': {
          const fallback = proposal.suggestedEntityId ?? '';
          const entityId = (await ask(`Entity id${fallback ? ` [${fallback}]` : ''}: `)).trim() || fallback;
          if (entityId) return { type: 'accept', entityId };
          break;
        }
        case 'create':
          return this.askCreate(proposal, ask);
        case null:
          break;
      }
      this.output.write(chalk.yellow('Please answer a, c, i or d.\n'));
    }
  }

  private async askCreate(proposal: Proposal, ask: Ask): Promise<DecisionOutcome> {
    const suggestedId = slugify(proposal.rawLabel) || proposal.rawConceptId;
    const id = (await ask(`New entity id [${suggestedId}]: `)).trim() || suggestedId;

    const role = await this.askRole(proposal.candidateRole === 'unknown' ? null : proposal.candidateRole, ask);
    const description = (await ask('Description: ')).trim();
    const promote = (await ask('Make this the default for all projects? [y/N] ')).trim().toLowerCase();

    return {
      type: 'create',
      entity: { id, role, description },
      promoteDefault: promote === 'y' || promote === 'yes',
    };
  }

  private async askRole(fallback: SemanticRole | null, ask: Ask): Promise<SemanticRole> {
    for (;;) {
      const answer = (await ask(`Role${fallback ? ` [${fallback}]` : ''} (label, container, status, priority): `)).trim();
      if (answer === '' && fallback) return fallback;
      if (isSemanticRole(answer)) return answer;
      this.output.write(chalk.yellow(`Unknown role "${answer}".\n`));
    }
  }

  private async askScope(proposal: Proposal, ask: Ask): Promise<string | null> {
    if (proposal.affectedProjects.length < 2) return null;
    for (;;) {
      const answer = (await ask(`Apply to [all] or one of ${proposal.affectedProjects.join(', ')}: `)).trim();
      if (answer === '' || answer === 'all') return null;
      if (proposal.affectedProjects.includes(answer)) return answer;
      this.output.write(chalk.yellow(`"${answer}" is not an affected project.\n`));
    }
  }
}
