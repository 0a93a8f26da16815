import { describe, it, expect, vi } from 'vitest';
import type { Credentials, PlatformAdapter, RideQuote, Route } from '../src/interfaces/types';
import { scrapeRoutes } from '../src/runner';
import { AuthenticationError, NotLoggedInError, RetryExhaustedError } from '../src/utils/errors';

const credentials: Credentials = { phoneNumber: '+201000000000', password: 'test-secret' };

const routes: Route[] = [
  { name: 'A to B', pickup: { lat: 30.0, lng: 31.0 }, drop: { lat: 30.1, lng: 31.1 } },
  { name: 'C to D', pickup: { lat: 30.2, lng: 31.2 }, drop: { lat: 30.3, lng: 31.3 } },
];

function quotesFor(route: Route, count: number): RideQuote[] {
  return Array.from({ length: count }, (_, i) => ({
    route: route.name,
    rideType: `Ride ${i}`,
    price: 'EGP 50.00',
    baseFare: 'N/A',
    minimumFare: 'N/A',
    perMinute: 'N/A',
    perKilometer: 'N/A',
    waitCharge: 'N/A',
    scrapedAt: new Date('2024-03-01T10:00:00.000Z'),
  }));
}

function fakeAdapter(getPrices: (route: Route) => Promise<RideQuote[]>) {
  const adapter = {
    platformName: 'fake',
    authenticate: vi.fn(async (_credentials: Credentials): Promise<void> => {}),
    getPrices: vi.fn(getPrices),
  };
  const typed: PlatformAdapter = adapter;
  return { adapter, typed };
}

describe('scrapeRoutes', () => {
  it('should scrape every route without logging in when the session is valid', async () => {
    const { adapter, typed } = fakeAdapter(async route => quotesFor(route, 2));
    const getCredentials = vi.fn(() => credentials);

    const summary = await scrapeRoutes(typed, routes, getCredentials);

    expect(summary).toEqual({ routes: 2, quotes: 4, failedRoutes: [] });
    expect(adapter.authenticate).not.toHaveBeenCalled();
    expect(getCredentials).not.toHaveBeenCalled();
  });

  it('should log in once and retry the route when logged out', async () => {
    let loggedIn = false;
    const { adapter, typed } = fakeAdapter(async route => {
      if (!loggedIn) throw new NotLoggedInError();
      return quotesFor(route, 1);
    });
    adapter.authenticate.mockImplementation(async () => {
      loggedIn = true;
    });

    const summary = await scrapeRoutes(typed, routes, () => credentials);

    expect(adapter.authenticate).toHaveBeenCalledTimes(1);
    expect(adapter.authenticate).toHaveBeenCalledWith(credentials);
    expect(adapter.getPrices).toHaveBeenCalledTimes(3);
    expect(summary).toEqual({ routes: 2, quotes: 2, failedRoutes: [] });
  });

  it('should skip a route whose retries ran out and carry on', async () => {
    const { typed } = fakeAdapter(async route => {
      if (route.name === 'A to B') throw new RetryExhaustedError('prices for A to B', 3, new Error('timeout'));
      return quotesFor(route, 3);
    });

    const summary = await scrapeRoutes(typed, routes, () => credentials);

    expect(summary).toEqual({ routes: 2, quotes: 3, failedRoutes: ['A to B'] });
  });

  it('should end the run when login fails', async () => {
    const { adapter, typed } = fakeAdapter(async () => {
      throw new NotLoggedInError();
    });
    adapter.authenticate.mockRejectedValue(new AuthenticationError('Authentication failed after multiple attempts'));

    await expect(scrapeRoutes(typed, routes, () => credentials)).rejects.toBeInstanceOf(AuthenticationError);
    expect(adapter.getPrices).toHaveBeenCalledTimes(1);
  });

  it('should not log in twice in one run', async () => {
    const { adapter, typed } = fakeAdapter(async () => {
      throw new NotLoggedInError();
    });

    const summary = await scrapeRoutes(typed, routes, () => credentials);

    expect(adapter.authenticate).toHaveBeenCalledTimes(1);
    expect(summary.failedRoutes).toEqual(['A to B', 'C to D']);
  });
});
