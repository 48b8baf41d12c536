/**
 * Anthropic Claude Provider Implementation
 *
 * Default: claude-3-5-haiku-latest
 */

import Anthropic from '@anthropic-ai/sdk';
import { ContextConfig } from '../../config/context-config';
import { LLMError } from '../errors';
import { LLMProvider } from './LLMProvider';
import { LLMConfig, SummaryRequest, SummaryResult } from './types';
import { SUMMARY_SYSTEM_PROMPT } from './prompts/shared';

export class ClaudeProvider extends LLMProvider {
  private client: Anthropic;

  constructor(apiKey: string, modelName: string = 'claude-3-5-haiku-latest', config?: LLMConfig) {
    super(apiKey, modelName, config);
    this.client = new Anthropic({ apiKey });
  }

  async generateSummary(request: SummaryRequest): Promise<SummaryResult> {
    const startTime = Date.now();

    try {
      const message = await this.client.messages.create({
        model: this.modelName,
        max_tokens: this.config.maxTokens ?? ContextConfig.SUMMARY_MAX_OUTPUT_TOKENS,
        temperature: this.config.temperature ?? 0.2,
        system: SUMMARY_SYSTEM_PROMPT,
        messages: [{ role: 'user', content: this.buildPrompt(request) }],
      });

      const text = message.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('');

      const inputTokens = message.usage.input_tokens;
      const outputTokens = message.usage.output_tokens;

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
      throw new LLMError('Claude', error instanceof Error ? error.message : String(error));
    }
  }
}
