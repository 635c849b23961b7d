import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModuleOptions, TypeOrmOptionsFactory } from '@nestjs/typeorm';
import { AllConfigType } from '../config/config.type';
import { OptimizationRun } from '../optimizer/domain/entities/optimization-run.entity';

@Injectable()
export class TypeOrmConfigService implements TypeOrmOptionsFactory {
  constructor(private configService: ConfigService<AllConfigType>) {}

  createTypeOrmOptions(): TypeOrmModuleOptions {
    return {
      type: 'better-sqlite3',
      database: this.configService.getOrThrow('database.path', { infer: true }),
      synchronize: true,
      dropSchema: this.configService.getOrThrow('database.dropSchema', {
        infer: true,
      }),
      logging:
        this.configService.get('app.nodeEnv', { infer: true }) ===
        'development',
      entities: [OptimizationRun],
    };
  }
}
