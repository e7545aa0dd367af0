/**
 * ResponseParser Service
 * Splits a completed model response into question and answer sections
 */

import { ParsedResult } from '../models/types';
import { ANSWER_MARKER, QUESTION_MARKER } from '../models/defaults';

/**
 * Interface for ResponseParser
 */
export interface IResponseParser {
  /**
   * Parses accumulated response text. Never throws.
   * @param text - The full response text
   */
  parse(text: string): ParsedResult;
}

const QUESTION_LABEL = /question:/i;
const ANSWER_LABEL = /answer:/i;

/**
 * ResponseParser implementation
 * Tries the markdown headers first, then "Question:"/"Answer:" labels,
 * and otherwise returns the whole text as the answer
 */
export class ResponseParser implements IResponseParser {
  parse(text: string): ParsedResult {
    return (
      this.parseMarkers(text) ??
      this.parseLabels(text) ?? {
        question: '',
        answer: text,
        raw: text
      }
    );
  }

  private parseMarkers(text: string): ParsedResult | null {
    if (!text.includes(QUESTION_MARKER) || !text.includes(ANSWER_MARKER)) {
      return null;
    }

    const splitAt = text.indexOf(ANSWER_MARKER);
    const questionPart = text.slice(0, splitAt);
    const answerPart = text.slice(splitAt + ANSWER_MARKER.length);

    return {
      question: questionPart.replaceAll(QUESTION_MARKER, '').trim(),
      answer: answerPart.trim(),
      raw: text
    };
  }

  private parseLabels(text: string): ParsedResult | null {
    const questionMatch = QUESTION_LABEL.exec(text);
    const answerMatch = ANSWER_LABEL.exec(text);

    if (!questionMatch || !answerMatch || questionMatch.index >= answerMatch.index) {
      return null;
    }

    return {
      question: text.slice(questionMatch.index + questionMatch[0].length, answerMatch.index).trim(),
      answer: text.slice(answerMatch.index + answerMatch[0].length).trim(),
      raw: text
    };
  }
}

// Export singleton instance
export const responseParser = new ResponseParser();
