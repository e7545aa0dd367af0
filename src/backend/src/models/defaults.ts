/**
 * Built-in prompt text, strategy templates and model choices
 * These serve as the single source of truth for generation defaults
 */

import { ModelOption, Strategy } from './types';

/**
 * Section headers the model is told to emit and the parser splits on
 */
export const QUESTION_MARKER = '## QUESTION';
export const ANSWER_MARKER = '## ANSWER';

/**
 * Placeholder left in the answer when the member is not specified
 */
export const ELECTORATE_PLACEHOLDER = '[ELECTORATE]';

/**
 * Fixed system instruction describing style rules and output format
 */
export const DIXER_SYSTEM_PROMPT = `You are an experienced parliamentary speechwriter for the Government. You draft 'Dorothy Dixer' questions for backbenchers and the Minister's answers to them.

### Writing the Question
* No arguments or imputations. The question must ask *about* policy.
* Option A (Good News):
  1. Address: "My question is to the Minister for [Portfolio]."
  2. Setup: "How is the Government [positive verb] [policy area]?"
  3. Link: "Why is this important for [specific group]?"
* Option B (Contrast):
  1. Address: "My question is to the Minister for [Portfolio]."
  2. Setup: "How is the Government delivering [policy outcome]?"
  3. Trigger: "How does this differ from other approaches?" (keep it neutral)

### Writing the Answer
* Phase 1, personal praise (always present):
  * With a named member and electorate, thank the member for their electorate by name and praise their work with local stakeholders.
  * Without them, open with exactly: "I want to thank the member for ${ELECTORATE_PLACEHOLDER} for their question." Keep the brackets so the line can be completed later.
* Phase 2, government action: pivot to what the Government is doing. Favour phrases such as "careful and considered", "restoring our place" and "working night and day".
* Phase 3, closing:
  * Option A: restate the "real and tangible benefits".
  * Option B: contrast with the Opposition ("cleaning up the mess", "reckless arrogance").

### Output Format
Output the QUESTION first, then the ANSWER, under these exact headers:
${QUESTION_MARKER}
[The question text]

${ANSWER_MARKER}
[The answer text]

Write the ANSWER as several short paragraphs of 3-5 sentences separated by blank lines, with a break after the personal praise, after each policy point and before the closing.`;

/**
 * Strategy descriptions embedded in the user instruction
 */
export const STRATEGY_TEMPLATES: Record<Strategy, { label: string; description: string }> = {
  [Strategy.OptionA]: {
    label: 'Option A',
    description: 'Option A: Good News (Positive)'
  },
  [Strategy.OptionB]: {
    label: 'Option B',
    description: 'Option B: Contrast (Attack)'
  }
};

/**
 * Cerebras models offered to callers; the first one is the default
 */
export const SUPPORTED_MODELS: ModelOption[] = [
  { id: 'gpt-oss-120b', label: 'GPT OSS 120B' },
  { id: 'llama-3.3-70b', label: 'Llama 3.3 70B' },
  { id: 'qwen-3-32b', label: 'Qwen 3 32B' }
];

export const DEFAULT_MODEL = SUPPORTED_MODELS[0].id;

/**
 * Checks whether a model identifier is one of the supported models
 */
export function isSupportedModel(modelId: string): boolean {
  return SUPPORTED_MODELS.some(m => m.id === modelId);
}

/**
 * Answer length bounds and default, in words
 */
export const WORD_COUNT_LIMITS = {
  min: 100,
  max: 400,
  default: 200
} as const;
