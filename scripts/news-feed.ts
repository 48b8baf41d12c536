/**
 * News Feed Script
 *
 * Prints the latest news items for a ticker.
 *
 * Usage:
 *   npm run news -- AAPL
 *   npm run news -- AAPL 10
 */

import { loadConfig, loadEnvFile } from '../lib/config';
import { getUserMessage } from '../lib/errors';
import { configureLogger } from '../lib/logger';
import { createNewsFeed } from '../lib/news';

async function main() {
  const [symbol, limitArg] = process.argv.slice(2);

  if (!symbol) {
    console.error('Usage: npm run news -- <symbol> [limit]');
    process.exitCode = 1;
    return;
  }

  loadEnvFile();
  const config = loadConfig();
  configureLogger({ minLevel: config.logLevel });

  const limit = limitArg ? Number(limitArg) : undefined;

  try {
    const items = await createNewsFeed(config).getCompanyNews(symbol, limit);
    console.log(JSON.stringify(items, null, 2));
  } catch (error) {
    console.error(`❌ ${getUserMessage(error)}`);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('❌ News feed failed:', error);
  process.exitCode = 1;
});
