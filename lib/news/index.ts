/**
 * News Module - Public API
 */

export { NewsFeed, createNewsFeed } from './feed';
export { StockDataClient } from './stockdata-client';
export type { StockDataConfig, StockDataNewsOptions } from './stockdata-client';
export { NewsApiClient } from './newsapi-client';
export type { NewsApiConfig, NewsApiSearchOptions } from './newsapi-client';
export {
  fromNewsApiArticle,
  fromStockDataArticle,
  normalizeNewsApiArticles,
  normalizeStockDataArticles,
} from './normalize';

export type {
  NewsItem,
  NewsProviderName,
  NewsApiArticle,
  NewsApiResponse,
  StockDataArticle,
  StockDataEntity,
  StockDataEntitySearchResult,
  StockDataNewsResponse,
} from './types';
