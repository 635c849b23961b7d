import { Inject, Injectable } from '@nestjs/common';
import { ConfigType } from '@nestjs/config';
import pino from 'pino';
import appConfig from '../../../config/app.config';

@Injectable()
export class LoggerService {
  private logger: pino.Logger;

  constructor(
    @Inject(appConfig.KEY)
    config: ConfigType<typeof appConfig>,
  ) {
    // stderr keeps stdout free for the command line report
    this.logger =
      config.nodeEnv === 'development'
        ? pino({
            level: config.logLevel,
            transport: {
              target: 'pino-pretty',
              options: {
                colorize: true,
                destination: 2,
              },
            },
          })
        : pino({ level: config.logLevel }, pino.destination(2));
  }

  log(context: {
    requestId?: string;
    runId?: string;
    intervalCount?: number;
    tradeOff?: number;
    op: string;
    durationMs?: number;
    outcome: string;
    [key: string]: unknown;
  }): void {
    this.logger.info(context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.logger.error({ err: error, ...context }, message);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.logger.warn(context, message);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.logger.debug(context, message);
  }
}
