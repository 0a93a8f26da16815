// Log in once (typing the OTP if asked) and save the session cookies for later scrape runs.
import dotenv from 'dotenv';
import { loadConfig, loadCredentials } from '../config';
import { createUberScraper } from '../runner';
import { createLogger, setDefaultLogLevel } from '../utils/logger';

dotenv.config();

const logger = createLogger('Login');

async function main(): Promise<void> {
  const config = loadConfig();
  setDefaultLogLevel(config.logLevel);
  const credentials = loadCredentials();

  const { scraper, uber } = createUberScraper(config);
  try {
    await scraper.start();
    await uber.authenticate(credentials);
    logger.info(`Cookies saved to ${config.scraper.cookiesPath}`);
  } finally {
    await scraper.close();
  }
}

main().catch(error => {
  logger.error('Login failed', error);
  process.exitCode = 1;
});
