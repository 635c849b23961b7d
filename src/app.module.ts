import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import appConfig from './config/app.config';
import databaseConfig from './database/config/database.config';
import optimizerConfig from './optimizer/config/optimizer.config';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { OptimizerModule } from './optimizer/optimizer.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, databaseConfig, optimizerConfig],
    }),
    TypeOrmModule.forRootAsync({
      useClass: TypeOrmConfigService,
    }),
    OptimizerModule,
  ],
})
export class AppModule {}
