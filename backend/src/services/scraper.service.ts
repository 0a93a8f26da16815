/**
 * Base scraper
 *
 * Owns one browser session and the proxy it runs through:
 * - relaunches on the next proxy once a session has served `proxyRotationThreshold` navigations
 * - retries a step up to `maxAttempts` times, relaunching on the next proxy in between
 * - refuses a proxy whose exit IP is our own (leak)
 * - persists login cookies between launches
 */

import axios from 'axios';
import type { BrowserSession, PageDriver, ProxyEndpoint, ScraperOptions } from '../interfaces/types';
import { BrowserService } from './browser.service';
import { ProxyRotator } from './proxy.service';
import { NavigationError, ProxyError, describeError } from '../utils/errors';
import { withRetry } from '../utils/retry';
import type { RetryOptions } from '../utils/retry';
import { createLogger } from '../utils/logger';

const logger = createLogger('Scraper');

export const IP_ECHO_URL = 'http://api64.ipify.org';
const CAPTCHA_MARKERS = ['google.com/sorry', 'google.com/recaptcha'];

export type IpLookup = () => Promise<string>;

export const lookupPublicIp: IpLookup = async () => {
  const response = await axios.get<string>(IP_ECHO_URL, { timeout: 10000, responseType: 'text' });
  return String(response.data).trim();
};

export interface ScraperDeps {
  session?: BrowserSession;
  ipLookup?: IpLookup;
  sleep?: RetryOptions['sleep'];
}

export class ScraperService {
  protected readonly session: BrowserSession;
  protected readonly options: ScraperOptions;
  private readonly rotator: ProxyRotator;
  private readonly ipLookup: IpLookup;
  private readonly sleep?: RetryOptions['sleep'];
  private realIp = 'unknown';
  private ipLeaks = 0;
  private numCalls = 0;
  private navigationsSinceLaunch = 0;

  constructor(options: ScraperOptions, deps: ScraperDeps = {}) {
    this.options = options;
    this.rotator = new ProxyRotator(options.proxies);
    this.session = deps.session ?? new BrowserService(options.headless);
    this.ipLookup = deps.ipLookup ?? lookupPublicIp;
    this.sleep = deps.sleep;
  }

  get currentProxy(): ProxyEndpoint | null {
    return this.rotator.getCurrent();
  }

  get navigationCount(): number {
    return this.numCalls;
  }

  async start(): Promise<void> {
    if (this.rotator.hasProxies() && this.options.verifyProxyIp) {
      this.realIp = await this.resolveRealIp();
      logger.info(`Real IP: ${this.realIp}`);
    }
    await this.launchSession();
  }

  /**
   * Close the current browser and open a new one on the next proxy.
   */
  async launchSession(): Promise<void> {
    await this.retry('launch browser', async () => {
      const proxy = this.rotator.next();
      await this.session.launch(proxy);
      this.navigationsSinceLaunch = 0;
      await this.session.loadCookies(this.options.cookiesPath);
      if (proxy && this.options.verifyProxyIp) {
        await this.checkProxyIp(proxy);
      }
    });
  }

  /**
   * Load `url` in the current session. A CAPTCHA interstitial counts as a failed load.
   */
  async navigate(url: string): Promise<void> {
    this.numCalls++;
    this.navigationsSinceLaunch++;
    if (this.navigationsSinceLaunch >= this.options.proxyRotationThreshold && this.rotator.hasProxies()) {
      logger.info(`Rotating proxy after ${this.navigationsSinceLaunch} navigations on this session`);
      try {
        await this.launchSession();
      } catch (error) {
        if (error instanceof ProxyError) throw error;
        throw new NavigationError(url, `Proxy rotation failed: ${describeError(error)}`, error);
      }
    }

    try {
      await this.session.goto(url, this.options.navigationTimeoutMs);
    } catch (error) {
      throw new NavigationError(url, `Failed to load page: ${describeError(error)}`, error);
    }

    const landed = this.session.currentUrl();
    if (CAPTCHA_MARKERS.some(marker => landed.includes(marker))) {
      throw new NavigationError(url, 'Google CAPTCHA encountered');
    }
  }

  /**
   * Run a navigation/extraction step with the retry bound, moving to the next proxy
   * before each retry.
   */
  async attempt<T>(label: string, step: () => Promise<T>): Promise<T> {
    return this.retry(label, step, async (attempt, error) => {
      logger.warn(`${label}: attempt ${attempt - 1} failed, retrying`, { reason: describeError(error) });
      if (this.rotator.hasProxies() || !this.session.isOpen()) {
        await this.launchSession();
      }
    });
  }

  page(): PageDriver {
    return this.session.page();
  }

  async saveCookies(): Promise<void> {
    await this.session.saveCookies(this.options.cookiesPath);
  }

  async close(): Promise<void> {
    await this.session.close();
  }

  private retry<T>(label: string, fn: () => Promise<T>, onRetry?: RetryOptions['onRetry']): Promise<T> {
    return withRetry(fn, {
      label,
      maxAttempts: this.options.maxAttempts,
      delayMs: this.options.retryDelayMs,
      onRetry,
      sleep: this.sleep,
    });
  }

  private async resolveRealIp(): Promise<string> {
    try {
      return await this.retry('real IP lookup', () => this.ipLookup());
    } catch (error) {
      logger.warn('Error getting real IP', { reason: describeError(error) });
      return 'unknown';
    }
  }

  private async checkProxyIp(proxy: ProxyEndpoint): Promise<void> {
    let proxyIp: string;
    try {
      await this.session.goto(IP_ECHO_URL, this.options.navigationTimeoutMs);
      proxyIp = await this.session.readText('body', this.options.navigationTimeoutMs);
    } catch (error) {
      logger.warn("Couldn't resolve proxy IP", { proxy: ProxyRotator.describe(proxy), reason: describeError(error) });
      proxyIp = this.realIp;
    }

    if (proxyIp !== this.realIp) {
      this.ipLeaks = 0;
      logger.info(`Current proxy [${ProxyRotator.describe(proxy)}] exits as ${proxyIp}`);
      return;
    }

    this.ipLeaks++;
    if (this.ipLeaks > this.rotator.size) {
      throw new ProxyError('All proxies are down');
    }
    logger.warn('Forced a proxy rotate due to an IP leak', { proxy: ProxyRotator.describe(proxy) });
    throw new NavigationError(IP_ECHO_URL, 'IP leak detected');
  }
}
