import { StockDataClient } from '../news/stockdata-client';
import { STOCKDATA_ENTITY_SEARCH } from '../test/fixtures';
import { FakeHandler, createFakeServer, json } from '../test/http';
import { SymbolResolver } from './symbol-resolver';

function setup(handler: FakeHandler) {
  const server = createFakeServer(handler);
  const resolver = new SymbolResolver(new StockDataClient({ apiKey: 'test-token', adapter: server.adapter }));
  return { resolver, requests: server.requests };
}

describe('SymbolResolver', () => {
  it('passes tickers through without a lookup', async () => {
    const { resolver, requests } = setup(() => json(STOCKDATA_ENTITY_SEARCH));

    await expect(resolver.resolve(' AAPL ')).resolves.toBe('AAPL');
    await expect(resolver.resolve('BRK.B')).resolves.toBe('BRK.B');
    expect(requests).toHaveLength(0);
  });

  it('resolves company names to the first matching symbol', async () => {
    const { resolver, requests } = setup(() => json(STOCKDATA_ENTITY_SEARCH));

    await expect(resolver.resolve('acme corp')).resolves.toBe('ACME');
    expect(requests[0].url).toBe('/entity/search');
    expect(requests[0].params).toMatchObject({ search: 'acme corp' });
  });

  it('skips blank symbols in the results', async () => {
    const { resolver } = setup(() => json({ data: [{ symbol: ' ' }, { symbol: ' acme.l ' }] }));

    await expect(resolver.resolve('acme')).resolves.toBe('ACME.L');
  });

  it('falls back to the upper-cased input when nothing matches', async () => {
    const { resolver } = setup(() => json({ data: [] }));

    await expect(resolver.resolve('acme corp')).resolves.toBe('ACME CORP');
  });

  it('falls back to the upper-cased input when the search fails', async () => {
    const warnSpy = jest.spyOn(console, 'warn');
    const { resolver } = setup(() => json({ error: { message: 'Down' } }, 500));

    await expect(resolver.resolve('acme')).resolves.toBe('ACME');
    expect(warnSpy.mock.calls.some((call) => String(call[0]).includes('Symbol resolution failed'))).toBe(true);
  });

  it('works without a client', async () => {
    await expect(new SymbolResolver(null).resolve('apple')).resolves.toBe('APPLE');
    await expect(new SymbolResolver(null).resolve('   ')).resolves.toBe('');
  });
});
