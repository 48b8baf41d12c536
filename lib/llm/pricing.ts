/**
 * LLM Pricing Table
 *
 * Prices are USD per 1M tokens (input/output) for the models a summary
 * provider is likely to run on.
 */

import { warn } from '../logger';

export const MODEL_PRICING = {
  // OpenAI models
  'gpt-4o-mini': { input: 0.15, output: 0.60 },
  'gpt-4o': { input: 2.50, output: 10.00 },
  'gpt-4.1-nano': { input: 0.10, output: 0.40 },
  'gpt-4.1-mini': { input: 0.40, output: 1.60 },

  // Anthropic Claude models
  'claude-3-5-haiku-latest': { input: 0.80, output: 4.00 },
  'claude-3-5-sonnet-latest': { input: 3.00, output: 15.00 },

  // Google Gemini models
  'gemini-2.0-flash': { input: 0.10, output: 0.40 },
  'gemini-2.0-flash-lite': { input: 0.07, output: 0.30 },
  'gemini-2.5-flash': { input: 0.25, output: 1.00 },
} as const;

export type ModelName = keyof typeof MODEL_PRICING;

function isPricedModel(modelName: string): modelName is ModelName {
  return modelName in MODEL_PRICING;
}

/**
 * Calculate cost for any model based on token usage
 * @returns Cost in USD
 */
export function calculateModelCost(
  modelName: string,
  inputTokens: number,
  outputTokens: number
): number {
  if (!isPricedModel(modelName)) {
    warn('Unknown model pricing, using default rates', { modelName });
    return (inputTokens / 1_000_000) * 1.00 + (outputTokens / 1_000_000) * 5.00;
  }

  const pricing = MODEL_PRICING[modelName];

  return (
    (inputTokens / 1_000_000) * pricing.input +
    (outputTokens / 1_000_000) * pricing.output
  );
}
