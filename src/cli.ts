#!/usr/bin/env node
import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { CliModule } from './cli.module';
import { OptimizerCliService } from './optimizer/infrastructure/console/optimizer-cli.service';
import { LoggerService } from './optimizer/infrastructure/logging/logger.service';

async function bootstrap() {
  const app = await NestFactory.createApplicationContext(CliModule, {
    logger: false,
  });
  const cli = app.get(OptimizerCliService);
  const logger = app.get(LoggerService);

  try {
    await cli.run(process.argv.slice(2), {
      input: process.stdin,
      output: process.stdout,
    });
  } catch (error) {
    logger.error('Interval optimization failed', error);
    process.stderr.write(
      `${error instanceof Error ? error.message : String(error)}\n`,
    );
    process.exitCode = 1;
  } finally {
    await app.close();
  }
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start interval optimizer:', error);
  process.exit(1);
});
