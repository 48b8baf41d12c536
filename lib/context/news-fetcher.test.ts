import { NewsApiClient } from '../news/newsapi-client';
import { StockDataClient } from '../news/stockdata-client';
import { NEWSAPI_EVERYTHING, STOCKDATA_EMPTY, STOCKDATA_NEWS } from '../test/fixtures';
import { FakeHandler, createRoutedServer, json } from '../test/http';
import { CompanyNewsFetcher } from './news-fetcher';

const NEWS_ROUTE = 'api.stockdata.org/v1/news/all';
const FALLBACK_ROUTE = 'newsapi.org/v2/everything';

function setup(routes: Record<string, FakeHandler>, options: { primary?: boolean; fallback?: boolean } = {}) {
  const server = createRoutedServer(routes);
  const primary = options.primary === false
    ? null
    : new StockDataClient({ apiKey: 'test-token', adapter: server.adapter });
  const fallback = options.fallback === false
    ? null
    : new NewsApiClient({ apiKey: 'test-key', adapter: server.adapter });

  return {
    fetcher: new CompanyNewsFetcher(primary, fallback),
    urls: () => server.requests.map((r) => r.url),
  };
}

describe('CompanyNewsFetcher', () => {
  it('uses StockData when it has articles', async () => {
    const { fetcher, urls } = setup({
      [NEWS_ROUTE]: () => json(STOCKDATA_NEWS),
      [FALLBACK_ROUTE]: () => json(NEWSAPI_EVERYTHING),
    });

    const outcome = await fetcher.fetch('ACME');

    expect(outcome.provider).toBe('stockdata');
    expect(outcome.items.map((i) => i.id)).toEqual(['sd-001', 'sd-002', 'sd-003']);
    expect(urls()).toEqual(['/news/all']);
  });

  it('falls back to NewsAPI when StockData has nothing', async () => {
    const { fetcher, urls } = setup({
      [NEWS_ROUTE]: () => json(STOCKDATA_EMPTY),
      [FALLBACK_ROUTE]: () => json(NEWSAPI_EVERYTHING),
    });

    const outcome = await fetcher.fetch('ACME');

    expect(outcome.provider).toBe('newsapi');
    expect(outcome.items.map((i) => i.headline)).toEqual([
      'Acme shares slip after recall',
      'What to watch at Acme this week',
    ]);
    expect(urls()).toEqual(['/news/all', '/everything']);
  });

  it('falls back to NewsAPI when StockData fails', async () => {
    const { fetcher } = setup({
      [NEWS_ROUTE]: () => json({ error: { message: 'Down' } }, 500),
      [FALLBACK_ROUTE]: () => json(NEWSAPI_EVERYTHING),
    });

    await expect(fetcher.fetch('ACME')).resolves.toMatchObject({ provider: 'newsapi' });
  });

  it('goes straight to NewsAPI without a StockData key', async () => {
    const { fetcher, urls } = setup({ [FALLBACK_ROUTE]: () => json(NEWSAPI_EVERYTHING) }, { primary: false });

    await expect(fetcher.fetch('ACME')).resolves.toMatchObject({ provider: 'newsapi' });
    expect(urls()).toEqual(['/everything']);
  });

  it('returns nothing when every source fails', async () => {
    const { fetcher } = setup({
      [NEWS_ROUTE]: () => json({}, 500),
      [FALLBACK_ROUTE]: () => json({}, 500),
    });

    await expect(fetcher.fetch('ACME')).resolves.toEqual({ provider: null, items: [] });
  });

  it('reports no provider when the fallback is empty too', async () => {
    const { fetcher } = setup({
      [NEWS_ROUTE]: () => json(STOCKDATA_EMPTY),
      [FALLBACK_ROUTE]: () => json({ status: 'ok', totalResults: 0, articles: [] }),
    });

    await expect(fetcher.fetch('ACME')).resolves.toEqual({ provider: null, items: [] });
  });

  it('stops after StockData when no fallback is configured', async () => {
    const { fetcher, urls } = setup({ [NEWS_ROUTE]: () => json({}, 503) }, { fallback: false });

    await expect(fetcher.fetch('ACME')).resolves.toEqual({ provider: null, items: [] });
    expect(urls()).toEqual(['/news/all']);
  });

  it('returns nothing with no providers at all', async () => {
    const fetcher = new CompanyNewsFetcher(null, null);

    await expect(fetcher.fetch('ACME')).resolves.toEqual({ provider: null, items: [] });
  });
});
