import {
  parseRate,
  parseZoneSize,
  resolveIdleTtlMs,
  resolveMaxTrackedClients,
  resolvePolicy,
} from '../policy';

describe('policy', () => {
  describe('parseRate', () => {
    it('should accept numbers and nginx rate notation', () => {
      expect(parseRate(5)).toBe(5);
      expect(parseRate('5r/s')).toBe(5);
      expect(parseRate('30r/m')).toBe(0.5);
      expect(parseRate('2.5')).toBe(2.5);
      expect(parseRate(' 10 r/s ')).toBe(10);
    });

    it('should reject malformed or non-positive rates', () => {
      expect(() => parseRate('fast')).toThrow(
        "RequestAdmission config has an invalid rate 'fast', expected a number or a value like '5r/s'",
      );
      expect(() => parseRate('0r/s')).toThrow(
        'RequestAdmission config rate must be a positive number, got 0r/s',
      );
      expect(() => parseRate(-1)).toThrow(
        'RequestAdmission config rate must be a positive number, got -1',
      );
    });
  });

  describe('parseZoneSize', () => {
    it('should convert size notation to bytes', () => {
      expect(parseZoneSize(4096)).toBe(4096);
      expect(parseZoneSize('512k')).toBe(524_288);
      expect(parseZoneSize('10m')).toBe(10_485_760);
      expect(parseZoneSize('1G')).toBe(1_073_741_824);
    });

    it('should reject invalid sizes', () => {
      expect(() => parseZoneSize('ten')).toThrow(
        "RequestAdmission config has an invalid zoneSize 'ten', expected a value like '10m'",
      );
      expect(() => parseZoneSize(0)).toThrow(
        'RequestAdmission config zoneSize must be a positive integer, got 0',
      );
    });
  });

  describe('resolvePolicy', () => {
    it('should apply defaults', () => {
      expect(resolvePolicy({ rate: '5r/s', burst: 15 })).toEqual({
        rate: 5,
        burst: 15,
        delayMode: false,
        maxDelayMs: 3000,
        maxQueuedPerClient: 15,
        fullRefillMs: 3000,
      });
    });

    it('should keep explicit delay settings', () => {
      expect(
        resolvePolicy({
          rate: 10,
          burst: 5,
          delayMode: true,
          maxDelayMs: 250,
          maxQueuedPerClient: 0,
        }),
      ).toEqual({
        rate: 10,
        burst: 5,
        delayMode: true,
        maxDelayMs: 250,
        maxQueuedPerClient: 0,
        fullRefillMs: 500,
      });
    });

    it('should require a whole burst of at least one', () => {
      expect(() => resolvePolicy({ rate: 5, burst: 0 })).toThrow(
        'RequestAdmission config burst must be an integer of at least 1, got 0',
      );
      expect(() => resolvePolicy({ rate: 5, burst: 1.5 })).toThrow(
        'RequestAdmission config burst must be an integer of at least 1, got 1.5',
      );
    });

    it('should reject negative delay limits', () => {
      expect(() =>
        resolvePolicy({ rate: 5, burst: 1, maxDelayMs: -1 }),
      ).toThrow(
        'RequestAdmission config maxDelayMs must be zero or positive, got -1',
      );
      expect(() =>
        resolvePolicy({ rate: 5, burst: 1, maxQueuedPerClient: -1 }),
      ).toThrow(
        'RequestAdmission config maxQueuedPerClient must be a non-negative integer, got -1',
      );
    });
  });

  describe('resolveMaxTrackedClients', () => {
    it('should derive the client count from the zone size', () => {
      expect(resolveMaxTrackedClients({ zoneSize: '1m' })).toBe(16_384);
      expect(resolveMaxTrackedClients({ zoneSize: '10m' })).toBe(163_840);
    });

    it('should prefer an explicit client count', () => {
      expect(
        resolveMaxTrackedClients({ maxTrackedClients: 100, zoneSize: '10m' }),
      ).toBe(100);
    });

    it('should fall back to the default', () => {
      expect(resolveMaxTrackedClients(undefined)).toBe(16_384);
    });

    it('should reject a zone too small for one client', () => {
      expect(() => resolveMaxTrackedClients({ zoneSize: 32 })).toThrow(
        "RequestAdmission config zoneSize '32' is too small to track a single client",
      );
    });
  });

  describe('resolveIdleTtlMs', () => {
    it('should never be shorter than the full refill time', () => {
      const policy = resolvePolicy({ rate: '30r/m', burst: 1 });

      expect(resolveIdleTtlMs({}, policy)).toBe(2000);
      expect(resolveIdleTtlMs({ idleTtlMs: 500 }, policy)).toBe(2000);
      expect(resolveIdleTtlMs({ idleTtlMs: 60_000 }, policy)).toBe(60_000);
    });
  });
});
