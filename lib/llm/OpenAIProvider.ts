/**
 * OpenAI Provider Implementation
 *
 * Default: gpt-4o-mini
 */

import OpenAI from 'openai';
import { ContextConfig } from '../../config/context-config';
import { LLMError } from '../errors';
import { LLMProvider } from './LLMProvider';
import { LLMConfig, SummaryRequest, SummaryResult } from './types';
import { SUMMARY_SYSTEM_PROMPT } from './prompts/shared';

export class OpenAIProvider extends LLMProvider {
  private client: OpenAI;

  constructor(apiKey: string, modelName: string = 'gpt-4o-mini', config?: LLMConfig) {
    super(apiKey, modelName, config);
    this.client = new OpenAI({ apiKey });
  }

  async generateSummary(request: SummaryRequest): Promise<SummaryResult> {
    const startTime = Date.now();

    try {
      const completion = await this.client.chat.completions.create({
        model: this.modelName,
        messages: [
          { role: 'system', content: SUMMARY_SYSTEM_PROMPT },
          { role: 'user', content: this.buildPrompt(request) },
        ],
        max_tokens: this.config.maxTokens ?? ContextConfig.SUMMARY_MAX_OUTPUT_TOKENS,
        temperature: this.config.temperature ?? 0.2,
      });

      const text = completion.choices[0]?.message.content || '';
      const inputTokens = completion.usage?.prompt_tokens || 0;
      const outputTokens = completion.usage?.completion_tokens || 0;

      return {
        content: text.trim(),
        modelUsed: this.modelName,
        tokensUsed: {
          input: inputTokens,
          output: outputTokens,
        },
        latencyMs: Date.now() - startTime,
        cost: this.calculateCost(inputTokens, outputTokens),
      };
    } catch (error) {
      throw new LLMError('OpenAI', error instanceof Error ? error.message : String(error));
    }
  }
}
