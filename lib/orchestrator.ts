/**
 * Stock Briefing Orchestrator
 *
 * Runs the context lookup and the news feed lookup side by side and
 * returns once both are done. The two are independent; neither waits on
 * the other's result.
 */

import { AxiosAdapter } from 'axios';
import { ContextConfig } from '../config/context-config';
import { AppConfig } from './config';
import { ContextService, createContextService } from './context/context';
import { ContextResult } from './context/types';
import { getErrorCode } from './errors';
import { createTimer, toError } from './logger';
import { NewsFeed, createNewsFeed } from './news/feed';
import { NewsItem } from './news/types';
import { validateLimit, validateTicker } from './validators';

export interface StockBriefing {
  symbol: string;
  context: ContextResult;
  news: NewsItem[];
  generatedAt: string;
}

export interface BriefingOptions {
  newsLimit?: number;
}

export class BriefingOrchestrator {
  constructor(
    private context: ContextService,
    private feed: NewsFeed
  ) {}

  /**
   * Build a briefing for one ticker
   *
   * @throws InvalidTickerError for input that is not a ticker
   * @throws ValidationError for a news limit outside 1..100
   * @throws whatever the news feed throws (ConfigurationError, API errors)
   */
  async getBriefing(symbol: string, options: BriefingOptions = {}): Promise<StockBriefing> {
    const ticker = validateTicker(symbol);
    const newsLimit = validateLimit(options.newsLimit ?? ContextConfig.DEFAULT_NEWS_LIMIT);
    const timer = createTimer('Stock briefing', { symbol: ticker, newsLimit });

    try {
      const [context, news] = await Promise.all([
        this.context.analyze(ticker),
        this.feed.getCompanyNews(ticker, newsLimit),
      ]);

      timer.end(true, { sentiment: context.sentiment, news: news.length });

      return {
        symbol: ticker,
        context,
        news,
        generatedAt: new Date().toISOString(),
      };
    } catch (err) {
      timer.endWithError(toError(err), { errorCode: getErrorCode(err) });
      throw err;
    }
  }
}

export function createBriefingOrchestrator(config: AppConfig, adapter?: AxiosAdapter): BriefingOrchestrator {
  return new BriefingOrchestrator(
    createContextService(config, adapter),
    createNewsFeed(config, adapter)
  );
}
