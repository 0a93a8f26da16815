import type { AppConfig } from './config';
import type { Credentials, PlatformAdapter, RideQuote, Route } from './interfaces/types';
import { UberAdapter } from './adapters/uber.adapter';
import { CsvWriter } from './services/csv.service';
import { OtpPrompt } from './services/otp.service';
import { ScraperService } from './services/scraper.service';
import { NotLoggedInError } from './utils/errors';
import { createLogger } from './utils/logger';

const logger = createLogger('Runner');

export function createUberScraper(config: AppConfig): { scraper: ScraperService; uber: UberAdapter } {
  const scraper = new ScraperService(config.scraper);
  const otpPrompt = new OtpPrompt();
  const uber = new UberAdapter(scraper, {
    writer: new CsvWriter(config.outputDir, config.csvWriteMode),
    otp: () => otpPrompt.read(),
    elementTimeoutMs: config.elementTimeoutMs,
    rideTypes: config.rideTypes,
  });
  return { scraper, uber };
}

export interface RunSummary {
  routes: number;
  quotes: number;
  failedRoutes: string[];
}

/**
 * Scrape every route in order. Saved cookies are tried first; the first route that
 * finds the session logged out triggers one login and is scraped again. A login
 * failure ends the run, any other failure only skips its route.
 */
export async function scrapeRoutes(
  adapter: PlatformAdapter,
  routes: Route[],
  getCredentials: () => Credentials,
): Promise<RunSummary> {
  const summary: RunSummary = { routes: routes.length, quotes: 0, failedRoutes: [] };
  let authenticated = false;

  for (const route of routes) {
    let quotes: RideQuote[];
    try {
      quotes = await adapter.getPrices(route);
    } catch (error) {
      if (!(error instanceof NotLoggedInError) || authenticated) {
        logger.error(`Skipping route ${route.name}`, error);
        summary.failedRoutes.push(route.name);
        continue;
      }

      logger.warn(`Not logged in to ${adapter.platformName} while scraping ${route.name}. Authenticating and retrying.`);
      await adapter.authenticate(getCredentials());
      authenticated = true;

      try {
        quotes = await adapter.getPrices(route);
      } catch (retryError) {
        logger.error(`Skipping route ${route.name}`, retryError);
        summary.failedRoutes.push(route.name);
        continue;
      }
    }

    summary.quotes += quotes.length;
  }

  logger.info(`Done. quotes=${summary.quotes}, failed routes=${summary.failedRoutes.length}, routes=${summary.routes}`);
  return summary;
}
