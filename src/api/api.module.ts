import { Module } from '@nestjs/common';
import { OrchestratorModule } from '../orchestrator/orchestrator.module';
import { CrawlPrimeTcpController } from './crawl-prime-tcp.controller';
import { CrawlPrimeController } from './crawl-prime.controller';

@Module({
  imports: [OrchestratorModule],
  controllers: [CrawlPrimeController, CrawlPrimeTcpController],
})
export class ApiModule {}
