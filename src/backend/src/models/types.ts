/**
 * Shared types for the Dixer generation pipeline and its HTTP surface
 */

/**
 * Rhetorical template controlling how the answer closes
 */
export enum Strategy {
  /** Good news: the answer closes by reiterating benefits */
  OptionA = 'option_a',
  /** Contrast: the answer closes by attacking the Opposition */
  OptionB = 'option_b'
}

/**
 * Validated input for a single generation
 */
export interface GenerationRequest {
  topic: string;
  /** Expected to be within [100, 400]; the caller clamps it */
  targetWordCount: number;
  /** Normally a Strategy value; anything else is treated as Strategy.OptionB */
  strategy: string;
  memberName?: string;
  electorate?: string;
  /** Upstream model identifier */
  model: string;
}

/**
 * System and user instructions sent to the upstream model
 */
export interface PromptPair {
  readonly systemInstruction: string;
  readonly userInstruction: string;
}

/**
 * Events produced by the stream relay.
 * Exactly one 'done' or 'error' event ends a stream.
 */
export type StreamEvent =
  | { type: 'chunk'; text: string }
  | { type: 'done'; question: string; answer: string }
  | { type: 'error'; message: string };

/**
 * Question/answer split of a completed response
 */
export interface ParsedResult {
  readonly question: string;
  readonly answer: string;
  readonly raw: string;
}

/**
 * Result of a non-streaming generation
 */
export interface GenerationResult {
  success: boolean;
  question?: string;
  answer?: string;
  raw?: string;
  error?: string;
}

/**
 * Upstream model offered to callers
 */
export interface ModelOption {
  id: string;
  label: string;
}

/**
 * Health check status
 */
export interface HealthStatus {
  healthy: boolean;
  apiKeyConfigured: boolean;
  uptime: number;
}

/**
 * Process-wide configuration, loaded once at startup
 */
export interface AppConfig {
  readonly apiKey: string | null;
  readonly baseURL: string | null;
  readonly defaultModel: string;
  readonly streamIdleTimeoutMs: number;
  readonly port: number;
  readonly host: string;
}
