/**
 * NewsAPI Client
 *
 * Fallback news provider for the context lookup. Free-text search over
 * the /everything endpoint, newest first.
 *
 * Documentation: https://newsapi.org/docs/endpoints/everything
 */

import { AxiosAdapter, AxiosInstance } from 'axios';
import { ContextConfig } from '../../config/context-config';
import { APIResponseError } from '../errors';
import { createTimer, logAPICall, toError } from '../logger';
import { createHttpClient, readList, toApiError } from '../http';
import { NewsApiArticle, NewsApiResponse } from './types';

const SERVICE = 'NewsAPI';

export interface NewsApiConfig {
  apiKey: string;
  baseUrl?: string;
  timeout?: number;
  adapter?: AxiosAdapter;
}

export interface NewsApiSearchOptions {
  language?: string;
  sortBy?: 'relevancy' | 'popularity' | 'publishedAt';
  pageSize?: number;
}

export class NewsApiClient {
  private client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(config: NewsApiConfig) {
    this.timeoutMs = config.timeout || ContextConfig.DEFAULT_TIMEOUT_MS;

    this.client = createHttpClient({
      baseUrl: config.baseUrl || ContextConfig.NEWSAPI_BASE_URL,
      timeoutMs: this.timeoutMs,
      params: {
        apiKey: config.apiKey,
      },
      adapter: config.adapter,
    });
  }

  /**
   * Search all articles for a query
   *
   * NewsAPI can answer 200 with `status: "error"`; that, and a body whose
   * `articles` is not a list, is raised as a 502 APIResponseError.
   */
  async searchEverything(query: string, options: NewsApiSearchOptions = {}): Promise<NewsApiArticle[]> {
    const timer = createTimer('NewsAPI searchEverything', { query });

    try {
      const response = await this.client.get<NewsApiResponse>('/everything', {
        params: {
          q: query,
          language: options.language || ContextConfig.NEWS_LANGUAGE,
          sortBy: options.sortBy || 'publishedAt',
          ...(options.pageSize !== undefined ? { pageSize: options.pageSize } : {}),
        },
      });

      const body = response.data;
      if (body?.status === 'error') {
        throw new APIResponseError(SERVICE, 502, body.message || body.code || 'unknown error');
      }

      const articles = readList(body?.articles, SERVICE, 'articles');
      const duration = timer.end(true, { articles: articles.length });
      logAPICall('NewsAPI', 'searchEverything', duration, true, { query });

      return articles;
    } catch (error) {
      timer.endWithError(toError(error));
      logAPICall('NewsAPI', 'searchEverything', 0, false, { query });
      throw toApiError(error, SERVICE, 'searchEverything', this.timeoutMs);
    }
  }
}
