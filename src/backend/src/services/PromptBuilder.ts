/**
 * PromptBuilder Service
 * Creates the system and user instructions for a Dixer generation
 */

import { GenerationRequest, PromptPair, Strategy } from '../models/types';
import {
  ANSWER_MARKER,
  DIXER_SYSTEM_PROMPT,
  ELECTORATE_PLACEHOLDER,
  QUESTION_MARKER,
  STRATEGY_TEMPLATES
} from '../models/defaults';

/**
 * Chat message structure for Cerebras SDK
 */
export interface ChatMessage {
  role: 'system' | 'user';
  content: string;
}

/**
 * Interface for PromptBuilder
 */
export interface IPromptBuilder {
  /**
   * Builds the prompt pair for a generation request
   * @param request - The validated generation request
   */
  buildPrompt(request: GenerationRequest): PromptPair;

  /**
   * Converts a prompt pair into chat messages (system + user)
   */
  toMessages(prompt: PromptPair): ChatMessage[];
}

/**
 * Maps a raw strategy value to a Strategy.
 * Unrecognised values use the contrast template.
 */
export function resolveStrategy(value: string): Strategy {
  switch (value) {
    case Strategy.OptionA:
      return Strategy.OptionA;
    case Strategy.OptionB:
      return Strategy.OptionB;
    default:
      return Strategy.OptionB;
  }
}

/**
 * PromptBuilder implementation
 * Pure: the same request always yields the same prompt pair
 */
export class PromptBuilder implements IPromptBuilder {
  buildPrompt(request: GenerationRequest): PromptPair {
    const template = STRATEGY_TEMPLATES[resolveStrategy(request.strategy)];
    const wordCount = request.targetWordCount;

    const userInstruction = [
      'Please draft a Dorothy Dixer question and ministerial answer with the following details:',
      `**Topic/Announcement:** ${request.topic}`,
      this.buildMemberSection(request.memberName, request.electorate),
      `**Strategy:** ${template.description}`,
      `**Target Answer Length:** Approximately ${wordCount} words for the answer (the question can be shorter, but aim for around ${wordCount} words in the Minister's answer).`,
      `Generate a parliamentary question following the ${template.label} structure, and a matching ministerial answer. Put the question under "${QUESTION_MARKER}" and the answer under "${ANSWER_MARKER}".`
    ].join('\n\n');

    return Object.freeze({
      systemInstruction: DIXER_SYSTEM_PROMPT,
      userInstruction
    });
  }

  toMessages(prompt: PromptPair): ChatMessage[] {
    return [
      { role: 'system', content: prompt.systemInstruction },
      { role: 'user', content: prompt.userInstruction }
    ];
  }

  /**
   * Personalises only when both member name and electorate are given
   */
  private buildMemberSection(memberName?: string, electorate?: string): string {
    const name = memberName?.trim();
    const seat = electorate?.trim();

    if (name && seat) {
      return [
        `**Member Asking:** ${name}`,
        `**Member's Electorate:** ${seat}`,
        'Please personalise the answer with specific praise for this member and their electorate.'
      ].join('\n\n');
    }

    return [
      '**Member Asking:** Not specified',
      "**Member's Electorate:** Not specified",
      `Since the member is not specified, open the answer with the placeholder text: "I want to thank the member for ${ELECTORATE_PLACEHOLDER} for their question." Keep the brackets so it can be filled in later.`
    ].join('\n\n');
  }
}

// Export singleton instance
export const promptBuilder = new PromptBuilder();
