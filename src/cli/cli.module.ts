import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { CrawlPrimeConfigModule } from '../config/crawl-prime-config.module';
import { validate } from '../config/env.validation';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';

/** Application context for one-shot CLI runs: no HTTP or TCP listeners. */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    CrawlPrimeConfigModule,
    OrchestratorModule,
  ],
})
export class CliModule {}
