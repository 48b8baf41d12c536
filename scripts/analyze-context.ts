/**
 * Context Lookup Script
 *
 * Runs the context lookup for one ticker or company name and prints the
 * result as JSON.
 *
 * Usage:
 *   npm run context -- AAPL
 *   npm run context -- "Apple Inc"
 */

import { loadConfig, loadEnvFile } from '../lib/config';
import { createContextService } from '../lib/context';
import { configureLogger } from '../lib/logger';

async function main() {
  const query = process.argv.slice(2).join(' ').trim();

  if (!query) {
    console.error('Usage: npm run context -- <symbol-or-company-name>');
    process.exitCode = 1;
    return;
  }

  const envFile = loadEnvFile();
  const config = loadConfig();
  configureLogger({ minLevel: config.logLevel });

  if (!envFile) {
    console.warn('⚠️  No .env file found, using process environment only');
  }

  console.log(`🧠 Running context analysis for ${query} ...\n`);

  const result = await createContextService(config).analyze(query);
  console.log(JSON.stringify(result, null, 2));
}

main().catch((error) => {
  console.error('❌ Context lookup failed:', error);
  process.exitCode = 1;
});
