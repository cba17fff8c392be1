/**
 * Parse a duration string to milliseconds
 * @param expiration Time string (e.g., '15s', '30m', '1h', '7d')
 * @returns Duration in milliseconds, 0 for an unknown unit
 */
export function parseExpiration(expiration: string): number {
  const unit = expiration.slice(-1);
  const value = parseInt(expiration.slice(0, -1), 10);

  const multipliers: Record<string, number> = {
    s: 1000,
    m: 60 * 1000,
    h: 60 * 60 * 1000,
    d: 24 * 60 * 60 * 1000,
  };

  if (Number.isNaN(value)) {
    return 0;
  }

  return value * (multipliers[unit] || 0);
}

/**
 * Same as parseExpiration, but refuses durations that would disable a
 * timer or make every token expire on issue.
 */
export function requirePositiveDuration(name: string, expiration: string): number {
  const ms = parseExpiration(expiration);
  if (ms <= 0) {
    throw new Error(`${name} must be a positive duration like '30s', '30m' or '1h', got '${expiration}'`);
  }
  return ms;
}
