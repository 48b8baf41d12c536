/**
 * Sentiment Classification
 *
 * Wraps the `sentiment` package (AFINN-165 word list). The comparative
 * score is the summed word valence divided by the token count, so it stays
 * comparable between a single headline and a page of them.
 */

import Sentiment from 'sentiment';
import { ContextConfig } from '../../config/context-config';
import { SentimentAnalysis, SentimentAnalyzer, SentimentLabel } from './types';

/**
 * Map a comparative score to a label
 *
 * Strictly above `threshold` is positive, strictly below `-threshold` negative.
 */
export function labelForScore(score: number, threshold: number): SentimentLabel {
  if (score > threshold) return 'positive';
  if (score < -threshold) return 'negative';
  return 'neutral';
}

export class SentimentClassifier implements SentimentAnalyzer {
  private analyzer = new Sentiment();

  constructor(private threshold: number = ContextConfig.DEFAULT_SENTIMENT_THRESHOLD) {}

  analyze(text: string): SentimentAnalysis {
    if (!text.trim()) {
      return { label: 'neutral', score: 0 };
    }

    const { comparative } = this.analyzer.analyze(text);
    const score = Number.isFinite(comparative) ? comparative : 0;

    return { label: labelForScore(score, this.threshold), score };
  }

  classify(text: string): SentimentLabel {
    return this.analyze(text).label;
  }
}
