import { HealthIndicatorService } from '@nestjs/terminus';
import { ResetTokensRepository } from '../reset-tokens/reset-tokens.repository';
import { StoreUnavailableError } from '../database/store-unavailable.error';
import { TokenStoreHealthIndicator } from './token-store.health';

describe('TokenStoreHealthIndicator', () => {
  let ping: jest.Mock;
  let indicator: TokenStoreHealthIndicator;

  beforeEach(() => {
    ping = jest.fn();
    const repository = { ping } as unknown as ResetTokensRepository;
    indicator = new TokenStoreHealthIndicator(new HealthIndicatorService(), repository);
  });

  it('should report up when the store answers', async () => {
    ping.mockResolvedValue(undefined);

    await expect(indicator.isHealthy('database')).resolves.toEqual({
      database: { status: 'up' },
    });
  });

  it('should report down with the store error', async () => {
    ping.mockRejectedValue(new StoreUnavailableError('ping'));

    await expect(indicator.isHealthy('database')).resolves.toEqual({
      database: { status: 'down', message: 'Token store unavailable during ping' },
    });
  });
});
