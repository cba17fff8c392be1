import { Module } from '@nestjs/common';
import { TasksService } from './tasks.service';
import { ResetTokensModule } from '../reset-tokens/reset-tokens.module';

@Module({
  imports: [ResetTokensModule],
  providers: [TasksService],
})
export class TasksModule { }
