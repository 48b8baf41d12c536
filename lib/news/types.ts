/**
 * News Types
 *
 * Raw provider payloads and the normalized NewsItem every consumer sees.
 */

export type NewsProviderName = 'stockdata' | 'newsapi';

/**
 * One headline/article, normalized across providers
 */
export interface NewsItem {
  id: string;
  headline: string;
  source: string;
  publishedAt: string | null; // ISO-8601
  summary: string | null;
  url: string;
}

// ---------------------------------------------------------------------------
// StockData.org
// ---------------------------------------------------------------------------

export interface StockDataEntity {
  symbol: string;
  name?: string;
  exchange?: string | null;
  country?: string;
  type?: string;
  industry?: string;
  sentiment_score?: number | null;
}

export interface StockDataArticle {
  uuid?: string;
  title?: string | null;
  description?: string | null;
  snippet?: string | null;
  url?: string | null;
  source?: string | null;
  published_at?: string | null;
  language?: string;
  entities?: StockDataEntity[];
}

export interface StockDataNewsResponse {
  meta?: {
    found?: number;
    returned?: number;
    limit?: number;
    page?: number;
  };
  data?: StockDataArticle[];
}

export interface StockDataEntitySearchResult {
  symbol: string;
  name?: string;
  type?: string;
  industry?: string;
  exchange?: string | null;
  exchange_long?: string | null;
  country?: string;
}

export interface StockDataEntitySearchResponse {
  data?: StockDataEntitySearchResult[];
}

// ---------------------------------------------------------------------------
// NewsAPI
// ---------------------------------------------------------------------------

export interface NewsApiArticle {
  source?: {
    id?: string | null;
    name?: string | null;
  };
  author?: string | null;
  title?: string | null;
  description?: string | null;
  url?: string | null;
  publishedAt?: string | null;
  content?: string | null;
}

export interface NewsApiResponse {
  status?: 'ok' | 'error';
  totalResults?: number;
  articles?: NewsApiArticle[];
  code?: string;
  message?: string;
}
