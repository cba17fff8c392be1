import { Controller, Get } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { HealthCheck, HealthCheckService } from '@nestjs/terminus';
import { TokenStoreHealthIndicator } from './token-store.health';

@ApiTags('health')
@Controller('health')
export class HealthController {
  constructor(
    private health: HealthCheckService,
    private tokenStore: TokenStoreHealthIndicator,
  ) { }

  // 503 when the token store cannot be reached within the query timeout
  @Get()
  @HealthCheck()
  check() {
    return this.health.check([
      () => this.tokenStore.isHealthy('database'),
    ]);
  }
}
