/**
 * Placeholder substitution
 * Replaces {{variable}} placeholders with values from a context object
 */

import type { PromptMessage, TemplateContext } from './types.js';

const PLACEHOLDER_PATTERN = /\{\{\s*([\w.-]+)\s*\}\}/g;

/**
 * Substitute every `{{key}}` in the template.
 * Missing keys render as an empty string; values are inserted verbatim,
 * so a value containing `{{...}}` is not expanded again.
 *
 * @param template Template string with {{variable}} placeholders
 * @param context Values keyed by placeholder name
 */
export function substituteTemplate(template: string, context: TemplateContext): string {
  return template.replace(PLACEHOLDER_PATTERN, (_match, key: string) => context[key] ?? '');
}

export function message(content: string): PromptMessage {
  return { role: 'user', content };
}
