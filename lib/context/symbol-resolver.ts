/**
 * Symbol Resolution
 *
 * Turns "Apple" into "AAPL" through the StockData entity search. Input
 * that is already written as a ticker skips the lookup.
 */

import { getErrorCode } from '../errors';
import { toError, warn } from '../logger';
import { StockDataClient } from '../news/stockdata-client';
import { looksLikeTicker } from '../validators';

export class SymbolResolver {
  constructor(private client: StockDataClient | null) {}

  /**
   * Resolve a company name or ticker to a ticker
   *
   * Never throws: without a client, on a failed search or on an empty one,
   * the trimmed input is returned upper-cased.
   */
  async resolve(query: string): Promise<string> {
    const trimmed = query.trim();
    const fallback = trimmed.toUpperCase();

    if (!trimmed || looksLikeTicker(trimmed) || !this.client) {
      return fallback;
    }

    try {
      const results = await this.client.searchEntities(trimmed);
      const symbol = results.find((r) => typeof r?.symbol === 'string' && r.symbol.trim())?.symbol;

      return symbol ? symbol.trim().toUpperCase() : fallback;
    } catch (err) {
      warn('Symbol resolution failed, using input as ticker', {
        query: trimmed,
        errorCode: getErrorCode(err),
      }, toError(err));

      return fallback;
    }
  }
}
