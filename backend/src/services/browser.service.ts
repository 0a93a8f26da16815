import fs from 'fs';
import path from 'path';
import { chromium } from 'playwright';
import type { Browser, BrowserContext, Page } from 'playwright';
import { z } from 'zod';
import type { BrowserSession, ProxyEndpoint } from '../interfaces/types';
import { ProxyRotator } from './proxy.service';
import { createLogger } from '../utils/logger';

const logger = createLogger('Browser');

type Cookie = Awaited<ReturnType<BrowserContext['cookies']>>[number];

const USER_AGENT =
  'Mozilla/5.0 (iPhone; CPU iPhone OS 16_0 like Mac OS X) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/16.0 Mobile/15E148 Safari/604.1';

// Cookie files may come from a browser extension export, which spells sameSite differently
const storedCookieSchema = z.object({
  name: z.string(),
  value: z.string(),
  domain: z.string(),
  path: z.string().default('/'),
  expires: z.number().optional(),
  httpOnly: z.boolean().optional(),
  secure: z.boolean().optional(),
  sameSite: z.string().optional(),
});

export function normalizeSameSite(value: string | undefined): Cookie['sameSite'] {
  switch ((value || '').toLowerCase()) {
    case 'strict':
      return 'Strict';
    case 'lax':
      return 'Lax';
    default:
      // 'none', 'no_restriction', 'unspecified' and missing
      return 'None';
  }
}

export function toPlaywrightCookies(raw: unknown): Cookie[] {
  const parsed = z.array(storedCookieSchema).parse(raw);
  return parsed.map(c => ({
    name: c.name,
    value: c.value,
    domain: c.domain,
    path: c.path,
    expires: c.expires ?? -1,
    httpOnly: c.httpOnly ?? false,
    secure: c.secure ?? false,
    sameSite: normalizeSameSite(c.sameSite),
  }));
}

export class BrowserService implements BrowserSession {
  private browser: Browser | null = null;
  private context: BrowserContext | null = null;
  private currentPage: Page | null = null;

  constructor(private readonly headless: boolean = true) {}

  public async launch(proxy: ProxyEndpoint | null): Promise<void> {
    await this.close();

    logger.info(proxy ? `Launching browser via proxy [${ProxyRotator.describe(proxy)}]` : 'Launching browser...');
    this.browser = await chromium.launch({
      headless: this.headless,
      proxy: proxy ? ProxyRotator.toPlaywright(proxy) : undefined,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-blink-features=AutomationControlled',
      ],
    });

    this.context = await this.browser.newContext({
      viewport: { width: 390, height: 844 }, // Mobile viewport
      userAgent: USER_AGENT,
      locale: 'en-US',
    });
    this.currentPage = await this.context.newPage();
  }

  public isOpen(): boolean {
    return this.browser !== null && this.browser.isConnected();
  }

  public page(): Page {
    if (!this.currentPage) {
      throw new Error('Browser session is not open');
    }
    return this.currentPage;
  }

  public async goto(url: string, timeoutMs: number): Promise<void> {
    await this.page().goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  public currentUrl(): string {
    return this.currentPage ? this.currentPage.url() : '';
  }

  public async readText(selector: string, timeoutMs: number): Promise<string> {
    const text = await this.page().locator(selector).first().textContent({ timeout: timeoutMs });
    return (text || '').trim();
  }

  public async loadCookies(cookiePath: string): Promise<number> {
    if (!this.context) {
      throw new Error('Browser session is not open');
    }
    if (!fs.existsSync(cookiePath)) {
      logger.info(`No cookies file found at ${cookiePath}. Proceeding without cookies.`);
      return 0;
    }

    let cookies: Cookie[];
    try {
      cookies = toPlaywrightCookies(JSON.parse(fs.readFileSync(cookiePath, 'utf-8')));
    } catch (error) {
      logger.error(`Error loading cookies from ${cookiePath}. Proceeding without cookies.`, error);
      return 0;
    }
    if (cookies.length > 0) {
      await this.context.addCookies(cookies);
    }
    logger.debug(`Injected ${cookies.length} cookies`, { cookiePath });
    return cookies.length;
  }

  public async saveCookies(cookiePath: string): Promise<void> {
    if (!this.context) {
      throw new Error('Browser session is not open');
    }
    const cookies = await this.context.cookies();
    fs.mkdirSync(path.dirname(cookiePath), { recursive: true });
    fs.writeFileSync(cookiePath, JSON.stringify(cookies, null, 2));
    logger.debug(`Saved ${cookies.length} cookies`, { cookiePath });
  }

  public async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
    }
    this.browser = null;
    this.context = null;
    this.currentPage = null;
  }
}
