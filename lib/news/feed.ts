/**
 * News Feed
 *
 * Latest company headlines for one ticker, straight from StockData.org.
 * Unlike the context lookup, provider errors reach the caller.
 */

import { AxiosAdapter } from 'axios';
import { ContextConfig } from '../../config/context-config';
import { AppConfig } from '../config';
import { ConfigurationError, getErrorCode } from '../errors';
import { warn, toError } from '../logger';
import { validateLimit, validateTicker } from '../validators';
import { normalizeStockDataArticles } from './normalize';
import { StockDataClient } from './stockdata-client';
import { NewsItem } from './types';

export class NewsFeed {
  constructor(private client: StockDataClient | null) {}

  /**
   * Get at most `limit` news items for a ticker
   *
   * @throws InvalidTickerError / ValidationError on bad input
   * @throws ConfigurationError if STOCKDATA_API_KEY is not set
   * @throws APITimeoutError, APIRateLimitError, APIResponseError, APINetworkError from the provider
   */
  async getCompanyNews(
    symbol: string,
    limit: number = ContextConfig.DEFAULT_NEWS_LIMIT
  ): Promise<NewsItem[]> {
    const ticker = validateTicker(symbol);
    const count = validateLimit(limit);

    if (!this.client) {
      throw new ConfigurationError('STOCKDATA_API_KEY', 'News feed');
    }

    const articles = await this.client.getNews(ticker, { limit: count });

    // The provider may ignore `limit` on some plans
    return normalizeStockDataArticles(articles).slice(0, count);
  }

  /**
   * Headline strings ("<headline> <summary>") for quick display
   *
   * Never throws; any failure is logged and yields an empty list.
   */
  async getHeadlines(
    symbol: string,
    limit: number = ContextConfig.DEFAULT_NEWS_LIMIT
  ): Promise<string[]> {
    try {
      const items = await this.getCompanyNews(symbol, limit);
      return items.map((item) => `${item.headline} ${item.summary ?? ''}`.trim());
    } catch (err) {
      warn('News feed headlines unavailable', { symbol, limit, errorCode: getErrorCode(err) }, toError(err));
      return [];
    }
  }
}

/**
 * Create a news feed from the application config
 *
 * A missing StockData key is not an error here; it surfaces as
 * ConfigurationError on the first lookup.
 */
export function createNewsFeed(config: AppConfig, adapter?: AxiosAdapter): NewsFeed {
  const { apiKey, baseUrl, timeoutMs } = config.stockData;

  return new NewsFeed(
    apiKey ? new StockDataClient({ apiKey, baseUrl, timeout: timeoutMs, adapter }) : null
  );
}
