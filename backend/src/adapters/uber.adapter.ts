import type { Credentials, GeoLocation, PageDriver, PlatformAdapter, RideQuote, Route } from '../interfaces/types';
import type { ScraperService } from '../services/scraper.service';
import type { CsvWriter } from '../services/csv.service';
import type { OtpProvider } from '../services/otp.service';
import { AuthenticationError, ExtractionError, NotLoggedInError, describeError } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger('Uber');

export const LOGIN_URL = 'https://auth.uber.com/v2/';
export const SEARCH_URL = 'https://m.uber.com/looking';

const LOGIN_ATTEMPTS = 3;
const LOGGED_IN_TIMEOUT_MS = 10000;
const RIDE_SETTLE_MS = 1000;
const NOT_AVAILABLE = 'N/A';

// Generated class names from the archived markup; the site has moved on since.
export const SELECTORS = {
  loggedInMarker: '._css-ipKQbc',
  phoneInput: '#PHONE_NUMBER_or_EMAIL_ADDRESS',
  forwardButton: '#forward-button',
  usePasswordOption: '#alt-PASSWORD',
  passwordInput: '#PASSWORD',
  otpFirstDigit: '#PHONE_SMS_OTP-0',
  rideTypeItems: 'ul[class*="css-"] li',
  rideName: 'h6._css-eMXiub:nth-child(1)',
  rideEstimate: 'h6._css-eMXiub:nth-child(2)',
  baseFare: 'div._css-kROmvp:nth-child(2) > p:nth-child(2)',
  minimumFare: 'div._css-kROmvp:nth-child(3) > p:nth-child(2)',
  perMinute: 'div._css-kROmvp:nth-child(4) > p:nth-child(2)',
  perKilometer: 'div._css-kROmvp:nth-child(5) > p:nth-child(2)',
  waitCharge: '._css-lcvSVT',
} as const;

export function buildFareLink(pickup: GeoLocation, drop: GeoLocation): string {
  const dropStr = JSON.stringify({ latitude: drop.lat, longitude: drop.lng });
  const pickupStr = JSON.stringify({ latitude: pickup.lat, longitude: pickup.lng });
  return `${SEARCH_URL}?drop[0]=${dropStr}&pickup=${pickupStr}`;
}

// "Wait time charges: EGP 1.25 per min" -> "EGP 1.25"
export function parseWaitCharge(text: string): string {
  const match = text.match(/\b[A-Z]{3} \d+(?:\.\d+)?/);
  return match ? match[0] : NOT_AVAILABLE;
}

export function matchesRideTypes(rideType: string, wanted: string[]): boolean {
  if (wanted.length === 0) return true;
  const name = rideType.trim().toLowerCase();
  return wanted.some(w => w.trim().toLowerCase() === name);
}

export interface UberAdapterOptions {
  writer: CsvWriter;
  otp: OtpProvider;
  elementTimeoutMs: number;
  rideTypes?: string[];
  clock?: () => Date;
}

export class UberAdapter implements PlatformAdapter {
  platformName = 'uber';

  private readonly rideTypes: string[];
  private readonly clock: () => Date;

  constructor(private readonly scraper: ScraperService, private readonly options: UberAdapterOptions) {
    this.rideTypes = options.rideTypes ?? [];
    this.clock = options.clock ?? (() => new Date());
  }

  private get page(): PageDriver {
    return this.scraper.page();
  }

  async authenticate(credentials: Credentials): Promise<void> {
    logger.info('Authentication called');
    await this.scraper.attempt('open login page', () => this.scraper.navigate(LOGIN_URL));

    let lastError: unknown;
    for (let attempt = 1; attempt <= LOGIN_ATTEMPTS; attempt++) {
      if (await this.isLoggedIn()) {
        logger.info('Already logged in');
        return;
      }

      try {
        await this.enterPhoneNumber(credentials.phoneNumber);

        if (await this.choosePasswordOption()) {
          await this.enterPassword(credentials.password);
        } else {
          await this.enterOtp();
          await this.enterPassword(credentials.password);
        }

        await this.page.locator(SELECTORS.forwardButton).click({ timeout: this.options.elementTimeoutMs });
        // The search page may be opened on a relaunched browser, which only has what is on disk
        await this.scraper.saveCookies();
        await this.scraper.attempt('open search page', () => this.scraper.navigate(SEARCH_URL));

        if (!(await this.isLoggedIn())) {
          throw new Error('Login was not accepted');
        }

        await this.scraper.saveCookies();
        logger.info('Logged in, cookies saved');
        return;
      } catch (error) {
        // Console input gone: no point asking again
        if (error instanceof AuthenticationError) throw error;
        lastError = error;
        logger.warn(`Authentication attempt ${attempt} failed`, { reason: describeError(error) });
      }
    }

    throw new AuthenticationError('Authentication failed after multiple attempts', lastError);
  }

  async getPrices(route: Route): Promise<RideQuote[]> {
    logger.info(`Getting prices for ${route.name}`);
    const link = buildFareLink(route.pickup, route.drop);

    const rideCount = await this.scraper.attempt(`prices for ${route.name}`, async () => {
      await this.scraper.navigate(link);
      if (!(await this.isLoggedIn())) {
        throw new NotLoggedInError();
      }
      return this.countRideTypes();
    });

    const quotes: RideQuote[] = [];
    for (let i = 0; i < rideCount; i++) {
      try {
        const quote = await this.extractRideData(i, route);
        if (!matchesRideTypes(quote.rideType, this.rideTypes)) {
          logger.debug(`Skipping ${quote.rideType}: not in configured ride types`);
          continue;
        }
        this.options.writer.write(quote);
        quotes.push(quote);
      } catch (error) {
        logger.error(`Skipping ride type #${i + 1} on ${route.name}`, error);
      }
    }

    await this.scraper.saveCookies();
    logger.info(`Extracted ${quotes.length} quotes for ${route.name}`);
    return quotes;
  }

  private async isLoggedIn(): Promise<boolean> {
    try {
      await this.page.locator(SELECTORS.loggedInMarker).first().waitFor({ state: 'attached', timeout: LOGGED_IN_TIMEOUT_MS });
      return true;
    } catch {
      return false;
    }
  }

  private async enterPhoneNumber(phoneNumber: string): Promise<void> {
    const box = this.page.locator(SELECTORS.phoneInput);
    await box.click({ timeout: this.options.elementTimeoutMs });
    await box.fill(phoneNumber);
    await this.page.locator(SELECTORS.forwardButton).click({ timeout: this.options.elementTimeoutMs });
  }

  private async choosePasswordOption(): Promise<boolean> {
    const option = this.page.locator(SELECTORS.usePasswordOption);
    try {
      await option.waitFor({ state: 'attached', timeout: this.options.elementTimeoutMs });
    } catch {
      logger.info('OTP Required!');
      return false;
    }
    logger.info('Using Password Instead of OTP!');
    await option.click({ timeout: this.options.elementTimeoutMs });
    return true;
  }

  private async enterPassword(password: string): Promise<void> {
    const box = this.page.locator(SELECTORS.passwordInput);
    await box.waitFor({ state: 'attached', timeout: this.options.elementTimeoutMs });
    await box.click();
    await box.fill(password);
  }

  private async enterOtp(): Promise<void> {
    const firstDigit = this.page.locator(SELECTORS.otpFirstDigit);
    await firstDigit.waitFor({ state: 'attached', timeout: this.options.elementTimeoutMs });
    const code = await this.options.otp();
    await firstDigit.click();
    // The digit boxes advance focus on their own
    await firstDigit.pressSequentially(code);
  }

  private async countRideTypes(): Promise<number> {
    const items = this.page.locator(SELECTORS.rideTypeItems);
    try {
      await items.first().waitFor({ state: 'attached', timeout: this.options.elementTimeoutMs });
    } catch (error) {
      throw new ExtractionError('No ride types found', error);
    }
    const count = await items.count();
    if (count === 0) {
      throw new ExtractionError('No ride types found');
    }
    logger.debug(`Found ${count} ride types`);
    return count;
  }

  private async extractRideData(index: number, route: Route): Promise<RideQuote> {
    await this.page.locator(SELECTORS.rideTypeItems).nth(index).click({ timeout: this.options.elementTimeoutMs });
    await this.page.waitForTimeout(RIDE_SETTLE_MS);

    const rideType = await this.textOrNotAvailable(SELECTORS.rideName);
    const price = await this.textOrNotAvailable(SELECTORS.rideEstimate);
    if (rideType === NOT_AVAILABLE || price === NOT_AVAILABLE) {
      throw new ExtractionError('Ride type or trip estimate missing');
    }

    const waitChargeText = await this.textOrNotAvailable(SELECTORS.waitCharge);

    return {
      route: route.name,
      rideType,
      price,
      baseFare: await this.textOrNotAvailable(SELECTORS.baseFare),
      minimumFare: await this.textOrNotAvailable(SELECTORS.minimumFare),
      perMinute: await this.textOrNotAvailable(SELECTORS.perMinute),
      perKilometer: await this.textOrNotAvailable(SELECTORS.perKilometer),
      waitCharge: parseWaitCharge(waitChargeText),
      scrapedAt: this.clock(),
    };
  }

  private async textOrNotAvailable(selector: string): Promise<string> {
    try {
      const text = await this.page.locator(selector).first().innerText({ timeout: this.options.elementTimeoutMs });
      return text.trim() || NOT_AVAILABLE;
    } catch (error) {
      logger.debug(`Could not read ${selector}`, { reason: describeError(error) });
      return NOT_AVAILABLE;
    }
  }
}
