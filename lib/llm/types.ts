/**
 * LLM Abstraction Layer - Core Types
 *
 * Shared types and interfaces for all summary providers
 */

export type LLMProviderType = 'openai' | 'claude' | 'gemini';

export const LLM_PROVIDER_TYPES: readonly LLMProviderType[] = ['openai', 'claude', 'gemini'];

export interface SummaryRequest {
  symbol: string;
  text: string; // concatenated headlines and descriptions
  maxWords: number;
}

export interface SummaryResult {
  content: string;
  modelUsed: string; // e.g., "gpt-4o-mini"
  tokensUsed: {
    input: number;
    output: number;
  };
  latencyMs: number;
  cost: number;
}

export interface LLMConfig {
  temperature?: number;
  maxTokens?: number;
}
