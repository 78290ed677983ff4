import { describe, it, expect, beforeAll } from 'vitest';
import { PassThrough } from 'node:stream';
import chalk from 'chalk';
import { PromptDecisionSource, describeProposal, parseChoice } from '../prompt.js';
import type { Proposal } from '../../core/types.js';

beforeAll(() => {
  chalk.level = 0;
});

function proposal(overrides: Partial<Proposal> = {}): Proposal {
  return {
    id: 'p-1',
    kind: 'new',
    tool: 'taskwarrior',
    rawConceptId: '+bug',
    rawLabel: '+bug',
    candidateRole: 'label',
    suggestedEntityId: null,
    affectedProjects: ['p1'],
    ...overrides,
  };
}

/** Answers each prompt from the script; informational lines end in a newline */
function scripted(answers: string[]): PromptDecisionSource {
  const input = new PassThrough();
  const output = new PassThrough();
  output.on('data', (chunk: Buffer) => {
    if (!chunk.toString().endsWith('\n')) input.write(`${answers.shift() ?? ''}\n`);
  });
  return new PromptDecisionSource(input, output);
}

describe('parseChoice', () => {
  it.each([
    ['', 'defer'],
    ['d', 'defer'],
    ['A', 'accept'],
    [' create ', 'create'],
    ['i', 'ignore'],
    ['x', null],
  ])('maps %j to %s', (answer, expected) => {
    expect(parseChoice(answer)).toBe(expected);
  });
});

describe('describeProposal', () => {
  it('shows the suggestion only when there is one', () => {
    expect(describeProposal(proposal())).toHaveLength(4);
    const lines = describeProposal(proposal({ suggestedEntityId: 'bug' }));
    expect(lines).toHaveLength(5);
    expect(lines[4]).toContain('bug');
  });
});

describe('PromptDecisionSource', () => {
  it('accepts the suggested entity after an unrecognised answer', async () => {
    const source = scripted(['x', 'a', '']);
    const inputs = await source.collect([proposal({ suggestedEntityId: 'bug' })], new AbortController().signal);
    expect(inputs).toEqual([{ proposalId: 'p-1', outcome: { type: 'accept', entityId: 'bug' } }]);
  });

  it('creates an entity scoped to one project', async () => {
    const source = scripted(['c', '', '', 'Waiting on review', 'y', 'p2']);
    const inputs = await source.collect(
      [proposal({ rawConceptId: '+needs_review', rawLabel: '+Needs Review', affectedProjects: ['p1', 'p2'] })],
      new AbortController().signal,
    );
    expect(inputs).toEqual([
      {
        proposalId: 'p-1',
        outcome: {
          type: 'create',
          entity: { id: 'needs-review', role: 'label', description: 'Waiting on review' },
          promoteDefault: true,
        },
        projectId: 'p2',
      },
    ]);
  });

  it('leaves deferred proposals out', async () => {
    const source = scripted(['d']);
    expect(await source.collect([proposal()], new AbortController().signal)).toEqual([]);
  });
});
