/**
 * StockData.org API Client
 *
 * Market news and entity search. Primary news provider for the context
 * lookup and the only provider behind the news feed.
 *
 * Features:
 * - Per-request timeout (HTTP_TIMEOUT_MS)
 * - Structured logging for all operations
 * - Custom error types for every failure mode
 *
 * Documentation: https://www.stockdata.org/documentation
 */

import { AxiosAdapter, AxiosInstance } from 'axios';
import { ContextConfig } from '../../config/context-config';
import { createTimer, logAPICall, toError } from '../logger';
import { createHttpClient, readList, toApiError } from '../http';
import {
  StockDataArticle,
  StockDataEntitySearchResponse,
  StockDataEntitySearchResult,
  StockDataNewsResponse,
} from './types';

const SERVICE = 'StockData.org';

export interface StockDataConfig {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

export interface StockDataNewsOptions {
  limit?: number;
  language?: string;
}

export class StockDataClient {
  private client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(config: StockDataConfig) {
    this.timeoutMs = config.timeout || ContextConfig.DEFAULT_TIMEOUT_MS;

    this.client = createHttpClient({
      baseUrl: config.baseUrl || ContextConfig.STOCKDATA_BASE_URL,
      timeoutMs: this.timeoutMs,
      params: {
        api_token: config.apiKey,
      },
      adapter: config.adapter,
    });
  }

  /**
   * Get latest news mentioning a symbol
   *
   * @throws APITimeoutError if request times out
   * @throws APIRateLimitError if the plan's request quota is spent
   * @throws APIResponseError if API returns error or a malformed body
   */
  async getNews(symbol: string, options: StockDataNewsOptions = {}): Promise<StockDataArticle[]> {
    const timer = createTimer('StockData getNews', { symbol });

    try {
      const response = await this.client.get<StockDataNewsResponse>('/news/all', {
        params: {
          symbols: symbol,
          language: options.language || ContextConfig.NEWS_LANGUAGE,
          ...(options.limit !== undefined ? { limit: options.limit } : {}),
        },
      });

      const articles = readList(response.data?.data, SERVICE, 'data');
      const duration = timer.end(true, { articles: articles.length });
      logAPICall('StockData', 'getNews', duration, true, { symbol });

      return articles;
    } catch (error) {
      timer.endWithError(toError(error));
      logAPICall('StockData', 'getNews', 0, false, { symbol });
      throw toApiError(error, SERVICE, 'getNews', this.timeoutMs);
    }
  }

  /**
   * Search entities by company name or symbol
   *
   * @example
   * await client.searchEntities('apple') // [{ symbol: 'AAPL', name: 'Apple Inc.', ... }, ...]
   */
  async searchEntities(search: string): Promise<StockDataEntitySearchResult[]> {
    const timer = createTimer('StockData searchEntities', { search });

    try {
      const response = await this.client.get<StockDataEntitySearchResponse>('/entity/search', {
        params: { search },
      });

      const results = readList(response.data?.data, SERVICE, 'data');
      const duration = timer.end(true, { results: results.length });
      logAPICall('StockData', 'searchEntities', duration, true, { search });

      return results;
    } catch (error) {
      timer.endWithError(toError(error));
      logAPICall('StockData', 'searchEntities', 0, false, { search });
      throw toApiError(error, SERVICE, 'searchEntities', this.timeoutMs);
    }
  }
}
