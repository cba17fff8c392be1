import { Module } from '@nestjs/common';
import { ResetTokensModule } from '../reset-tokens/reset-tokens.module';
import { NotificationsModule } from '../notifications/notifications.module';
import { DeliveryDispatcherService } from './delivery-dispatcher.service';
import { NotificationWorkerService } from './notification-worker.service';

@Module({
  imports: [ResetTokensModule, NotificationsModule],
  providers: [DeliveryDispatcherService, NotificationWorkerService],
  exports: [DeliveryDispatcherService],
})
export class DeliveryModule { }
