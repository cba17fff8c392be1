import {
  Injectable,
  Logger,
  BeforeApplicationShutdown,
  OnApplicationBootstrap,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { StoreUnavailableError } from '../database/store-unavailable.error';
import { requirePositiveDuration } from '../utils/parse-expiration';
import {
  DeliveryDispatcherService,
  DispatchSummary,
} from './delivery-dispatcher.service';

export const DELIVERY_CYCLE_TIMEOUT = 'reset-token-delivery';

/**
 * Sequential poll loop: run a delivery cycle, wait the poll interval, repeat.
 * The next cycle is only scheduled once the current one has finished.
 */
@Injectable()
export class NotificationWorkerService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(NotificationWorkerService.name);
  private readonly pollIntervalMs: number;
  private stopped = false;
  private currentCycle: Promise<void> | null = null;

  constructor(
    private readonly dispatcher: DeliveryDispatcherService,
    private readonly schedulerRegistry: SchedulerRegistry,
    configService: ConfigService,
  ) {
    this.pollIntervalMs = requirePositiveDuration(
      'delivery.pollInterval',
      configService.getOrThrow<string>('delivery.pollInterval'),
    );
  }

  onApplicationBootstrap() {
    this.logger.log(`Polling for pending reset links every ${this.pollIntervalMs}ms`);
    this.scheduleNext(0);
  }

  async beforeApplicationShutdown() {
    this.stopped = true;
    if (this.schedulerRegistry.doesExist('timeout', DELIVERY_CYCLE_TIMEOUT)) {
      this.schedulerRegistry.deleteTimeout(DELIVERY_CYCLE_TIMEOUT);
    }
    // let an in-flight cycle finish its claims before the store closes
    await this.currentCycle;
  }

  /** Run one cycle; failures are logged and the loop carries on. */
  async runCycle(): Promise<DispatchSummary | null> {
    try {
      return await this.dispatcher.dispatchPending();
    } catch (error) {
      if (error instanceof StoreUnavailableError) {
        this.logger.warn(`${error.message}; retrying next cycle`);
      } else {
        this.logger.error(
          'Delivery cycle failed',
          error instanceof Error ? error.stack : String(error),
        );
      }
      return null;
    }
  }

  private scheduleNext(delayMs: number) {
    if (this.stopped) {
      return;
    }

    const timeout = setTimeout(() => {
      this.schedulerRegistry.deleteTimeout(DELIVERY_CYCLE_TIMEOUT);
      this.currentCycle = this.runCycle().then(() => {
        this.currentCycle = null;
        this.scheduleNext(this.pollIntervalMs);
      });
    }, delayMs);

    this.schedulerRegistry.addTimeout(DELIVERY_CYCLE_TIMEOUT, timeout);
  }
}
