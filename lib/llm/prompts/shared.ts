/**
 * Unified Summary Prompt (Single Source of Truth)
 *
 * All LLM providers use this shared prompt template so summaries read the
 * same whichever provider is configured.
 */

import { SummaryRequest } from '../types';

export const SUMMARY_SYSTEM_PROMPT =
  'You write concise, factual summaries of financial news for equity investors.';

/**
 * Build the summary prompt for any LLM provider
 *
 * @example
 * buildSummaryPrompt({ symbol: 'AAPL', text: 'Apple beats estimates.', maxWords: 100 })
 * // "Summarize this financial news about AAPL in under 100 words:\n\nApple beats estimates."
 */
export function buildSummaryPrompt(request: SummaryRequest): string {
  return `Summarize this financial news about ${request.symbol} in under ${request.maxWords} words:\n\n${request.text}`;
}
