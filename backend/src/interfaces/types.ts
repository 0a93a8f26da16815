export interface GeoLocation {
  lat: number;
  lng: number;
}

export interface Route {
  name: string;
  pickup: GeoLocation;
  drop: GeoLocation;
}

export interface RideQuote {
  route: string;
  rideType: string;
  price: string; // Trip estimate as displayed, e.g. "EGP 85.00"
  baseFare: string;
  minimumFare: string;
  perMinute: string;
  perKilometer: string;
  waitCharge: string;
  scrapedAt: Date;
}

export interface ProxyEndpoint {
  protocol: 'http' | 'https' | 'socks4' | 'socks5';
  host: string;
  port: number;
  username?: string;
  password?: string;
}

export interface Credentials {
  phoneNumber: string;
  password: string;
}

export type CsvWriteMode = 'append' | 'overwrite';

export interface ScraperOptions {
  proxies: ProxyEndpoint[];
  proxyRotationThreshold: number; // Relaunch on the next proxy every N navigations
  maxAttempts: number;
  retryDelayMs: number;
  navigationTimeoutMs: number;
  cookiesPath: string;
  headless: boolean;
  verifyProxyIp: boolean;
}

// The slice of a Playwright Locator the site scrapers drive
export interface ElementLocator {
  click(options?: { timeout?: number }): Promise<void>;
  fill(value: string): Promise<void>;
  waitFor(options?: { state?: 'attached' | 'detached' | 'visible' | 'hidden'; timeout?: number }): Promise<void>;
  pressSequentially(text: string): Promise<void>;
  innerText(options?: { timeout?: number }): Promise<string>;
  count(): Promise<number>;
  first(): ElementLocator;
  nth(index: number): ElementLocator;
}

// A Playwright Page satisfies this
export interface PageDriver {
  locator(selector: string): ElementLocator;
  waitForTimeout(timeout: number): Promise<void>;
}

// Everything the base scraper needs from a browser. BrowserService is the Playwright one.
export interface BrowserSession {
  launch(proxy: ProxyEndpoint | null): Promise<void>;
  isOpen(): boolean;
  goto(url: string, timeoutMs: number): Promise<void>;
  currentUrl(): string;
  readText(selector: string, timeoutMs: number): Promise<string>;
  loadCookies(cookiePath: string): Promise<number>;
  saveCookies(cookiePath: string): Promise<void>;
  page(): PageDriver;
  close(): Promise<void>;
}

export interface PlatformAdapter {
  platformName: string;
  authenticate(credentials: Credentials): Promise<void>;
  getPrices(route: Route): Promise<RideQuote[]>;
}
