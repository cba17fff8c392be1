import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { WorkerModule } from './worker.module';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(WorkerModule);
  // SIGTERM stops the poll loops and waits for the in-flight delivery cycle
  app.enableShutdownHooks();
  new Logger('Worker').log('Notification worker started');
}

bootstrap().catch((error: unknown) => {
  new Logger('Bootstrap').error(
    'Worker process failed to start',
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
