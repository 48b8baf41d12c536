/**
 * Stock Briefing Script
 *
 * Context lookup and news feed for one ticker, fetched concurrently.
 *
 * Usage:
 *   npm run briefing -- NVDA
 *   npm run briefing -- NVDA 3
 */

import { loadConfig, loadEnvFile } from '../lib/config';
import { formatErrorResponse } from '../lib/utils';
import { configureLogger } from '../lib/logger';
import { createBriefingOrchestrator } from '../lib/orchestrator';

async function main() {
  const [symbol, limitArg] = process.argv.slice(2);

  if (!symbol) {
    console.error('Usage: npm run briefing -- <symbol> [newsLimit]');
    process.exitCode = 1;
    return;
  }

  loadEnvFile();
  const config = loadConfig();
  configureLogger({ minLevel: config.logLevel });

  const newsLimit = limitArg ? Number(limitArg) : undefined;

  try {
    const briefing = await createBriefingOrchestrator(config).getBriefing(symbol, { newsLimit });
    console.log(JSON.stringify(briefing, null, 2));
  } catch (error) {
    console.error(JSON.stringify(formatErrorResponse(error, symbol), null, 2));
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error('❌ Briefing failed:', error);
  process.exitCode = 1;
});
