import { describe, it, expect } from 'vitest';
import { normalizeSameSite, toPlaywrightCookies } from '../src/services/browser.service';

describe('cookie loading', () => {
  describe('normalizeSameSite', () => {
    it('should map extension exports to Playwright values', () => {
      expect(normalizeSameSite('lax')).toBe('Lax');
      expect(normalizeSameSite('strict')).toBe('Strict');
      expect(normalizeSameSite('no_restriction')).toBe('None');
      expect(normalizeSameSite('unspecified')).toBe('None');
      expect(normalizeSameSite(undefined)).toBe('None');
    });

    it('should keep values that are already correct', () => {
      expect(normalizeSameSite('Lax')).toBe('Lax');
      expect(normalizeSameSite('None')).toBe('None');
    });
  });

  describe('toPlaywrightCookies', () => {
    it('should fill defaults for missing fields', () => {
      const cookies = toPlaywrightCookies([{ name: 'sid', value: 'test-session', domain: '.uber.com', sameSite: 'lax' }]);

      expect(cookies).toEqual([
        {
          name: 'sid',
          value: 'test-session',
          domain: '.uber.com',
          path: '/',
          expires: -1,
          httpOnly: false,
          secure: false,
          sameSite: 'Lax',
        },
      ]);
    });

    it('should keep the expiry of saved cookies', () => {
      const [cookie] = toPlaywrightCookies([
        { name: 'jwt-session', value: 'x', domain: 'm.uber.com', path: '/', expires: 1767225600, secure: true },
      ]);
      expect(cookie.expires).toBe(1767225600);
      expect(cookie.secure).toBe(true);
    });

    it('should reject files that are not a cookie list', () => {
      expect(() => toPlaywrightCookies({ cookies: [] })).toThrow();
      expect(() => toPlaywrightCookies([{ name: 'sid' }])).toThrow();
    });
  });
});
