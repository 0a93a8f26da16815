#!/usr/bin/env node
import dotenv from 'dotenv';
import { loadConfig, loadCredentials, loadRoutes } from '../config';
import { createUberScraper, scrapeRoutes } from '../runner';
import { createLogger, setDefaultLogLevel } from '../utils/logger';

dotenv.config();

const logger = createLogger('Scrape');

async function main(): Promise<void> {
  const config = loadConfig();
  setDefaultLogLevel(config.logLevel);
  const routes = loadRoutes(config.routesPath);

  logger.info(`Scraping ${routes.length} routes`, { outputDir: config.outputDir, mode: config.csvWriteMode });

  const { scraper, uber } = createUberScraper(config);
  try {
    await scraper.start();
    const summary = await scrapeRoutes(uber, routes, () => loadCredentials());
    if (summary.failedRoutes.length > 0) {
      logger.warn('Some routes were skipped', { failedRoutes: summary.failedRoutes });
    }
  } finally {
    await scraper.close();
  }
}

main().catch(error => {
  logger.error('Scrape run failed', error);
  process.exitCode = 1;
});
