import 'dotenv/config';
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import { AppModule } from './app.module';
import { AllConfigType } from './config/config.type';
import { LoggerService } from './optimizer/infrastructure/logging/logger.service';

async function bootstrap() {
  const app = await NestFactory.create(AppModule, { cors: true });
  const configService = app.get(ConfigService<AllConfigType>);
  const logger = app.get(LoggerService);

  app.enableShutdownHooks();
  app.setGlobalPrefix(
    configService.getOrThrow('app.apiPrefix', { infer: true }),
    {
      exclude: ['/'],
    },
  );

  // Swagger documentation
  const options = new DocumentBuilder()
    .setTitle('Interval Optimizer API')
    .setDescription(
      'Selects non-overlapping intervals under a count/cost trade-off',
    )
    .setVersion('1.0')
    .build();

  const document = SwaggerModule.createDocument(app, options);
  SwaggerModule.setup('docs', app, document);

  const port = configService.getOrThrow('app.port', { infer: true });
  await app.listen(port);
  logger.log({ op: 'bootstrap', outcome: 'success', port });
}

bootstrap().catch((error: unknown) => {
  console.error('Failed to start Interval Optimizer API:', error);
  process.exit(1);
});
