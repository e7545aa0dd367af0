/**
 * Services index
 * Exports all backend services
 */

export * from './AppConfig';
export * from './PromptBuilder';
export * from './ResponseParser';
export * from './CerebrasClient';
export * from './DixerStreamService';
export * from './HTTPServer';
