/**
 * Provider payload fixtures
 *
 * Shapes follow the StockData.org and NewsAPI responses; the content is made up.
 */

import { NewsApiResponse, StockDataEntitySearchResponse, StockDataNewsResponse } from '../news/types';

export const STOCKDATA_NEWS: StockDataNewsResponse = {
  meta: { found: 3, returned: 3, limit: 3, page: 1 },
  data: [
    {
      uuid: 'sd-001',
      title: 'Acme Corp posts good quarter',
      description: 'Revenue came in ahead of guidance.',
      snippet: 'Acme Corp said on Tuesday...',
      url: 'https://news.example.com/acme-quarter',
      source: 'news.example.com',
      published_at: '2026-10-14T13:30:00Z',
      language: 'en',
      entities: [{ symbol: 'ACME', name: 'Acme Corp', sentiment_score: 0.4 }],
    },
    {
      uuid: 'sd-002',
      title: 'Acme Corp opens new plant',
      description: null,
      snippet: 'The plant employs 300 people.',
      url: 'https://wire.example.org/acme-plant',
      source: 'wire.example.org',
      published_at: '2026-10-13T09:00:00Z',
      language: 'en',
    },
    {
      uuid: 'sd-003',
      title: 'Acme Corp names new CFO',
      description: 'The company appointed a new finance chief.',
      url: 'https://news.example.com/acme-cfo',
      source: 'news.example.com',
      published_at: 'not a date',
      language: 'en',
    },
  ],
};

export const STOCKDATA_EMPTY: StockDataNewsResponse = {
  meta: { found: 0, returned: 0, limit: 3, page: 1 },
  data: [],
};

export const STOCKDATA_ENTITY_SEARCH: StockDataEntitySearchResponse = {
  data: [
    { symbol: 'ACME', name: 'Acme Corp', type: 'equity', exchange: 'NASDAQ', country: 'us' },
    { symbol: 'ACME.L', name: 'Acme Corp PLC', type: 'equity', exchange: 'LSE', country: 'gb' },
  ],
};

export const NEWSAPI_EVERYTHING: NewsApiResponse = {
  status: 'ok',
  totalResults: 3,
  articles: [
    {
      source: { id: null, name: 'Example Times' },
      author: 'Staff',
      title: 'Acme shares slip after recall',
      description: 'A product recall weighed on the stock.',
      url: 'https://times.example.com/acme-recall',
      publishedAt: '2026-10-15T18:45:00Z',
      content: 'Full text...',
    },
    {
      source: { id: null, name: 'Example Times' },
      title: '[Removed]',
      description: '[Removed]',
      url: 'https://removed.com',
      publishedAt: '1970-01-01T00:00:00Z',
    },
    {
      source: { id: 'example-daily', name: 'Example Daily' },
      title: 'What to watch at Acme this week',
      description: null,
      url: 'https://daily.example.com/acme-week',
      publishedAt: '2026-10-12T07:00:00Z',
    },
  ],
};

export const NEWSAPI_ERROR_BODY = {
  status: 'error',
  code: 'apiKeyInvalid',
  message: 'Your API key is invalid or incorrect.',
};
