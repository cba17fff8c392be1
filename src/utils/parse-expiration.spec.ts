import { parseExpiration, requirePositiveDuration } from './parse-expiration';

describe('parseExpiration', () => {
  it('should convert each supported unit to milliseconds', () => {
    expect(parseExpiration('15s')).toBe(15_000);
    expect(parseExpiration('30m')).toBe(1_800_000);
    expect(parseExpiration('1h')).toBe(3_600_000);
    expect(parseExpiration('7d')).toBe(604_800_000);
  });

  it('should return 0 for an unknown unit', () => {
    expect(parseExpiration('10w')).toBe(0);
  });

  it('should return 0 when the numeric part is missing', () => {
    expect(parseExpiration('m')).toBe(0);
  });
});

describe('requirePositiveDuration', () => {
  it('should return the parsed duration', () => {
    expect(requirePositiveDuration('resetToken.ttl', '30m')).toBe(1_800_000);
  });

  it('should throw with the setting name for an unusable duration', () => {
    expect(() => requirePositiveDuration('resetToken.ttl', '0m')).toThrow(
      "resetToken.ttl must be a positive duration like '30s', '30m' or '1h', got '0m'",
    );
  });
});
