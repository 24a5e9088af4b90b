import { INestApplication, ValidationPipe } from '@nestjs/common';
import { CrawlPrimeExceptionFilter } from './common/filters/crawl-prime-exception.filter';

/** HTTP wiring shared by main.ts and the e2e tests. */
export function configureHttpApp(app: INestApplication): void {
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new CrawlPrimeExceptionFilter());
}
