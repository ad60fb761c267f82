import { message, substituteTemplate } from './template-substitution.js';
import type { PromptMessage } from './types.js';

export const TRANSLATE_CONFIG_INSTRUCTIONS = `Translate selected fields of this PsyFlow config into {{target_language}}. Translate ONLY:
  • subinfo_mapping values
  • stimuli entries of type 'text' or 'textbox' (the \`text\` field)

Return the COMPLETE YAML with translated values and nothing else changed. No commentary.`;

/**
 * Two messages: the translation scope, then the document exactly as given.
 */
export function translateConfigPrompt(documentText: string, targetLanguage: string): PromptMessage[] {
  return [
    message(substituteTemplate(TRANSLATE_CONFIG_INSTRUCTIONS, { target_language: targetLanguage })),
    message(documentText),
  ];
}
