import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { AppModule } from './app.module';
import { ConfigValidationService } from './common/config/config-validation.service';
import { StandingsService } from './standings/standings.service';

/**
 * Standings job entry point
 * Orders every stored group with the configured preset and logs the standings
 */
async function bootstrap() {
  const logger = new Logger('Standings');

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: ['log', 'error', 'warn', 'debug'],
  });

  try {
    app.get(ConfigValidationService).validate();

    const orders = await app.get(StandingsService).orderAllStoredGroups();
    for (const [name, order] of orders) {
      logger.log(`Group ${name}: ${order.toArray().join(' > ')}`);
    }
  } finally {
    await app.close();
  }
}

bootstrap().catch((error) => {
  console.error('Standings job failed:', error);
  process.exit(1);
});
