import { describe, it, expect } from 'vitest';
import { buildFareLink, matchesRideTypes, parseWaitCharge, SEARCH_URL } from '../src/adapters/uber.adapter';

describe('Uber adapter helpers', () => {
  describe('buildFareLink', () => {
    it('should encode pickup and drop as JSON coordinates', () => {
      const link = buildFareLink({ lat: 30.0272027, lng: 31.1384884 }, { lat: 30.0249469, lng: 30.8969389 });

      expect(link).toBe(
        'https://m.uber.com/looking?drop[0]={"latitude":30.0249469,"longitude":30.8969389}' +
          '&pickup={"latitude":30.0272027,"longitude":31.1384884}',
      );
      expect(link.startsWith(SEARCH_URL)).toBe(true);
    });
  });

  describe('parseWaitCharge', () => {
    it('should pull the currency amount out of the wait charge text', () => {
      expect(parseWaitCharge('Wait time charges: EGP 1.25 per min after 3 min')).toBe('EGP 1.25');
    });

    it('should accept whole amounts', () => {
      expect(parseWaitCharge('USD 2 / min')).toBe('USD 2');
    });

    it('should return N/A when no amount is shown', () => {
      expect(parseWaitCharge('No wait charges')).toBe('N/A');
      expect(parseWaitCharge('N/A')).toBe('N/A');
    });
  });

  describe('matchesRideTypes', () => {
    it('should match everything when no ride types are configured', () => {
      expect(matchesRideTypes('UberX', [])).toBe(true);
    });

    it('should compare labels case-insensitively', () => {
      expect(matchesRideTypes(' uberx ', ['UberX', 'Comfort'])).toBe(true);
      expect(matchesRideTypes('Scooter', ['UberX', 'Comfort'])).toBe(false);
    });
  });
});
