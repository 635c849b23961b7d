import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import appConfig from './config/app.config';
import optimizerConfig from './optimizer/config/optimizer.config';
import { OptimizerCoreModule } from './optimizer/optimizer-core.module';
import { OptimizerCliService } from './optimizer/infrastructure/console/optimizer-cli.service';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [appConfig, optimizerConfig],
    }),
    OptimizerCoreModule,
  ],
  providers: [OptimizerCliService],
})
export class CliModule {}
