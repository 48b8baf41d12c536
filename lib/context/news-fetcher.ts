/**
 * Company News Fetcher
 *
 * StockData.org first; NewsAPI when StockData is unconfigured, fails or
 * has nothing for the symbol.
 */

import { getErrorCode } from '../errors';
import { info, toError, warn } from '../logger';
import { NewsApiClient } from '../news/newsapi-client';
import { normalizeNewsApiArticles, normalizeStockDataArticles } from '../news/normalize';
import { StockDataClient } from '../news/stockdata-client';
import { NewsItem, NewsProviderName } from '../news/types';

export interface NewsFetchOutcome {
  provider: NewsProviderName | null;
  items: NewsItem[];
}

export class CompanyNewsFetcher {
  constructor(
    private primary: StockDataClient | null,
    private fallback: NewsApiClient | null
  ) {}

  async fetch(symbol: string): Promise<NewsFetchOutcome> {
    if (!this.primary) {
      warn('STOCKDATA_API_KEY not set, skipping StockData.org', { symbol });
    } else {
      try {
        const items = normalizeStockDataArticles(await this.primary.getNews(symbol));
        if (items.length > 0) {
          return { provider: 'stockdata', items };
        }
        info('StockData.org returned no articles', { symbol });
      } catch (err) {
        warn('StockData.org request failed', { symbol, errorCode: getErrorCode(err) }, toError(err));
      }
    }

    if (this.fallback) {
      info('Falling back to NewsAPI', { symbol });
      try {
        const items = normalizeNewsApiArticles(await this.fallback.searchEverything(symbol));
        return { provider: items.length > 0 ? 'newsapi' : null, items };
      } catch (err) {
        warn('NewsAPI fallback failed', { symbol, errorCode: getErrorCode(err) }, toError(err));
      }
    }

    warn('No news returned from any source', { symbol });
    return { provider: null, items: [] };
  }
}
