/**
 * Shared prompt types
 */

/** Prompts only ever speak as the user */
export type MessageRole = 'user';

/**
 * Role-tagged message handed to the host's LLM invocation layer
 */
export interface PromptMessage {
  role: MessageRole;
  content: string;
}

/**
 * One entry of a template selection round
 */
export interface TemplateCandidate {
  repo: string;
  readmeSnippet: string;
}

/**
 * Values available to `{{key}}` placeholders
 */
export type TemplateContext = Record<string, string | undefined>;
