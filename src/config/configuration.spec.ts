import configuration from './configuration';

describe('configuration', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    delete process.env.DELIVERY_BATCH_SIZE;
    delete process.env.DELIVERY_MAX_ATTEMPTS;
    delete process.env.PASSWORD_RESET_MIN_RESPONSE_MS;
    delete process.env.TELEGRAM_POLL_TIMEOUT;
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('should fall back to the defaults when integers are unset', () => {
    const config = configuration();

    expect(config.delivery.batchSize).toBe(20);
    expect(config.delivery.maxAttempts).toBe(5);
    expect(config.passwordReset.minResponseMs).toBe(300);
    expect(config.telegram.pollTimeoutSeconds).toBe(25);
  });

  it('should read integers from the environment', () => {
    process.env.DELIVERY_BATCH_SIZE = '50';
    process.env.PASSWORD_RESET_MIN_RESPONSE_MS = '0';

    const config = configuration();

    expect(config.delivery.batchSize).toBe(50);
    expect(config.passwordReset.minResponseMs).toBe(0);
  });

  it('should refuse a max attempts value that is not a number', () => {
    process.env.DELIVERY_MAX_ATTEMPTS = 'abc';

    expect(() => configuration()).toThrow(
      "DELIVERY_MAX_ATTEMPTS must be an integer of at least 1, got 'abc'",
    );
  });

  it('should refuse a batch size of zero', () => {
    process.env.DELIVERY_BATCH_SIZE = '0';

    expect(() => configuration()).toThrow(
      "DELIVERY_BATCH_SIZE must be an integer of at least 1, got '0'",
    );
  });

  it('should refuse fractional and negative values', () => {
    process.env.DELIVERY_BATCH_SIZE = '2.5';
    expect(() => configuration()).toThrow('DELIVERY_BATCH_SIZE');

    process.env.DELIVERY_BATCH_SIZE = '10';
    process.env.PASSWORD_RESET_MIN_RESPONSE_MS = '-1';
    expect(() => configuration()).toThrow(
      "PASSWORD_RESET_MIN_RESPONSE_MS must be an integer of at least 0, got '-1'",
    );
  });
});
