import { buildResetUrl, minutesUntil } from './reset-link';

describe('buildResetUrl', () => {
  it('should join base url, path and token', () => {
    expect(buildResetUrl('https://app.example.com', '/reset-password', 'abc_-1')).toBe(
      'https://app.example.com/reset-password?token=abc_-1',
    );
  });

  it('should not double the slash between base and path', () => {
    expect(buildResetUrl('https://app.example.com/', 'reset', 'abc')).toBe(
      'https://app.example.com/reset?token=abc',
    );
  });

  it('should keep a path prefix on the base url', () => {
    expect(buildResetUrl('https://example.com/app', '/reset', 'abc')).toBe(
      'https://example.com/app/reset?token=abc',
    );
  });
});

describe('minutesUntil', () => {
  const now = new Date('2024-05-01T12:00:00.000Z');

  it('should round partial minutes up', () => {
    expect(minutesUntil('2024-05-01T12:29:30.000Z', now)).toBe(30);
  });

  it('should never report less than one minute', () => {
    expect(minutesUntil('2024-05-01T11:59:00.000Z', now)).toBe(1);
  });
});
