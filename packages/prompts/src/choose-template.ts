/**
 * Template selection negotiation
 *
 * Builds the messages that ask the LLM to pick the single template repository
 * needing the fewest changes. Ranking is left entirely to the LLM.
 */

import { logger } from '@task-transformer/logger';
import { message } from './template-substitution.js';
import type { PromptMessage, TemplateCandidate } from './types.js';

const log = logger.prompts;

/** Verdict the LLM gives when no candidate is reasonably close */
export const NO_TEMPLATE_VERDICT = 'NONE';

/** Rendered in place of the candidate list when there are no candidates */
export const NO_TEMPLATES_PLACEHOLDER = '(no templates found)';

/** Selection criteria, highest priority first */
export const SELECTION_CRITERIA = [
  'Prefer tasks with the same **response mapping paradigm** (e.g. 2-choice left/right, go/no-go, continuous RT).',
  "Prefer tasks whose **trial/block flow** most closely matches the requested task's flow.",
  'If several are equally close, choose the repo that appears to need the **fewest code edits** (smaller conceptual jump).',
] as const;

export function selectionInstructions(): string {
  const criteria = SELECTION_CRITERIA.map(c => `- ${c}`).join('\n');
  return [
    'You are given a desired task description plus candidate PsyFlow template repositories.',
    '',
    'Select the **one** template that will require the LEAST effort to transform into the desired task, using these tie-breakers:',
    criteria,
    '',
    'Respond with **only** the repo name on a single line.',
    `If NONE of the templates are reasonably close, respond with \`${NO_TEMPLATE_VERDICT}\`.`,
  ].join('\n');
}

export function formatCandidates(candidates: readonly TemplateCandidate[]): string {
  if (candidates.length === 0) {
    return NO_TEMPLATES_PLACEHOLDER;
  }
  return candidates.map(c => `- **${c.repo}**: ${c.readmeSnippet}`).join('\n');
}

/**
 * @param description Free-form description of the wanted task
 * @param candidates Candidate repositories with their README excerpts
 */
export function chooseTemplatePrompt(
  description: string,
  candidates: readonly TemplateCandidate[]
): PromptMessage[] {
  log.debug(`Rendering template selection over ${candidates.length} candidates`);

  return [
    message(selectionInstructions()),
    message(`Desired task:\n${description}`),
    message(`Candidate templates:\n${formatCandidates(candidates)}`),
  ];
}
