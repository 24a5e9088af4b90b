/**
 * Ingest Request DTO
 * Body of POST /ingest and payload of the `ingest_url` message pattern
 */

import {
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Max,
  Min,
} from 'class-validator';
import type { CrawlModeOption } from '../../planning/plan.types';

export const CRAWL_MODE_OPTIONS: readonly CrawlModeOption[] = [
  'page',
  'site',
  'auto',
];

export class IngestRequestDto {
  @IsUrl(
    { protocols: ['http', 'https'], require_protocol: true, require_tld: false },
    { message: 'url must be an absolute http(s) URL' },
  )
  url!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @Matches(/^[A-Za-z0-9_-]+$/, {
    message: 'collection may only contain letters, digits, "_" and "-"',
  })
  collection?: string;

  @IsOptional()
  @IsIn(CRAWL_MODE_OPTIONS)
  crawl_mode?: CrawlModeOption;

  @IsOptional()
  @IsInt()
  @Min(1)
  @Max(500)
  max_pages?: number;
}
