import { toIsoTimestamp } from '../utils';
import { NewsApiArticle, NewsItem, StockDataArticle } from './types';

function clean(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}

function fallbackId(publishedAt: string | null, url: string): string {
  return `${publishedAt ?? 'undated'}::${url}`;
}

/**
 * StockData article → NewsItem
 *
 * Returns null for rows that are not objects or lack a string headline or
 * URL. Optional fields of the wrong type count as missing.
 */
export function fromStockDataArticle(article: StockDataArticle | null | undefined): NewsItem | null {
  if (typeof article !== 'object' || article === null) return null;

  const headline = clean(article.title);
  const url = clean(article.url);
  if (!headline || !url) return null;

  const publishedAt = toIsoTimestamp(article.published_at);

  return {
    id: clean(article.uuid) ?? fallbackId(publishedAt, url),
    headline,
    source: clean(article.source) ?? 'StockData',
    publishedAt,
    summary: clean(article.description) ?? clean(article.snippet),
    url,
  };
}

/**
 * NewsAPI article → NewsItem
 *
 * NewsAPI marks deleted articles with the title "[Removed]"; those are dropped,
 * as are malformed rows.
 */
export function fromNewsApiArticle(article: NewsApiArticle | null | undefined): NewsItem | null {
  if (typeof article !== 'object' || article === null) return null;

  const headline = clean(article.title);
  const url = clean(article.url);
  if (!headline || !url || headline === '[Removed]') return null;

  const publishedAt = toIsoTimestamp(article.publishedAt);

  return {
    id: fallbackId(publishedAt, url),
    headline,
    source: (typeof article.source === 'object' ? clean(article.source?.name) : null) ?? 'NewsAPI',
    publishedAt,
    summary: clean(article.description),
    url,
  };
}

export function normalizeStockDataArticles(articles: StockDataArticle[]): NewsItem[] {
  return articles
    .map(fromStockDataArticle)
    .filter((item): item is NewsItem => item !== null);
}

export function normalizeNewsApiArticles(articles: NewsApiArticle[]): NewsItem[] {
  return articles
    .map(fromNewsApiArticle)
    .filter((item): item is NewsItem => item !== null);
}
