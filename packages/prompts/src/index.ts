// Main exports for the prompts package
export { transformPrompt, TRANSFORM_PROMPT_TEMPLATE } from './transform.js';
export { translateConfigPrompt, TRANSLATE_CONFIG_INSTRUCTIONS } from './translate-config.js';
export {
  chooseTemplatePrompt,
  formatCandidates,
  selectionInstructions,
  NO_TEMPLATE_VERDICT,
  NO_TEMPLATES_PLACEHOLDER,
  SELECTION_CRITERIA
} from './choose-template.js';
export { substituteTemplate, message } from './template-substitution.js';
export type { MessageRole, PromptMessage, TemplateCandidate, TemplateContext } from './types.js';
