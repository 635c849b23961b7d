import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus } from '@nestjs/common';
import { HttpAdapterHost } from '@nestjs/core';
import { ThrottlerException } from '@nestjs/throttler';

@Catch(ThrottlerException)
export class ThrottlerExceptionFilter implements ExceptionFilter {
  constructor(private readonly httpAdapterHost: HttpAdapterHost) {}

  catch(_exception: ThrottlerException, host: ArgumentsHost): void {
    const { httpAdapter } = this.httpAdapterHost;
    const ctx = host.switchToHttp();

    httpAdapter.reply(
      ctx.getResponse(),
      {
        error: 'rate_limited',
        detail: 'Too many requests, retry later',
      },
      HttpStatus.TOO_MANY_REQUESTS,
    );
  }
}
