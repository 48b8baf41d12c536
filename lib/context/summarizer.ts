/**
 * News Summarizer
 *
 * Generated summary when a text-generation provider is configured,
 * otherwise (or when that provider fails) the first few sentences of the
 * news text itself.
 */

import { ContextConfig } from '../../config/context-config';
import { getErrorCode } from '../errors';
import { LLMProvider } from '../llm/LLMProvider';
import { info, toError, warn } from '../logger';
import { firstSentences } from '../utils';
import { NewsSummarizerLike, SummaryOutcome } from './types';

export function extractiveSummary(text: string): SummaryOutcome {
  const summary = firstSentences(text, ContextConfig.EXTRACTIVE_SENTENCES);

  return summary
    ? { text: summary, source: 'extractive' }
    : { text: ContextConfig.UNAVAILABLE_SUMMARY, source: 'none' };
}

export class NewsSummarizer implements NewsSummarizerLike {
  constructor(private provider: LLMProvider | null) {}

  async summarize(text: string, symbol: string): Promise<SummaryOutcome> {
    if (!text.trim()) {
      return { text: ContextConfig.NO_TEXT_SUMMARY, source: 'none' };
    }

    if (!this.provider) {
      return extractiveSummary(text);
    }

    try {
      const result = await this.provider.generateSummary({
        symbol,
        text,
        maxWords: ContextConfig.SUMMARY_MAX_WORDS,
      });

      info('Summary generated', {
        symbol,
        provider: this.provider.getProviderName(),
        model: result.modelUsed,
        latencyMs: result.latencyMs,
        cost: result.cost,
      });

      return result.content
        ? { text: result.content, source: 'llm' }
        : extractiveSummary(text);
    } catch (err) {
      warn('Summary generation failed, using extractive summary', {
        symbol,
        provider: this.provider.getProviderName(),
        errorCode: getErrorCode(err),
      }, toError(err));

      return extractiveSummary(text);
    }
  }
}
