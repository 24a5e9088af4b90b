import { Global, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import {
  CRAWL_PRIME_OPTIONS,
  loadCrawlPrimeOptions,
} from './crawl-prime.options';

@Global()
@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: CRAWL_PRIME_OPTIONS,
      useFactory: (configService: ConfigService) =>
        loadCrawlPrimeOptions(configService),
      inject: [ConfigService],
    },
  ],
  exports: [CRAWL_PRIME_OPTIONS],
})
export class CrawlPrimeConfigModule {}
