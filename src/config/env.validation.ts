/**
 * Environment validation for ConfigModule.forRoot({ validate }).
 * Numbers are coerced here so ConfigService.get returns them typed; booleans
 * stay strings and are interpreted by the options loader.
 */

import { plainToInstance, Type } from 'class-transformer';
import {
  IsIn,
  IsInt,
  IsNumber,
  IsOptional,
  IsString,
  Max,
  Min,
  validateSync,
} from 'class-validator';

const BOOLEAN_LITERALS = ['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'];

export class EnvironmentVariables {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  PORT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  TCP_PORT?: number;

  @IsOptional()
  @IsString()
  TCP_HOST?: string;

  @IsOptional()
  @IsString()
  CRAWLPRIME_COLLECTION?: string;

  @IsOptional()
  @IsString()
  QDRANT_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  QDRANT_PORT?: number;

  @IsOptional()
  @IsIn(BOOLEAN_LITERALS)
  GRAPH_ENABLED?: string;

  @IsOptional()
  @IsString()
  NEO4J_HOST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(65535)
  NEO4J_PORT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  GRAPH_PROBE_TIMEOUT_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  GRAPH_PROBE_CACHE_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  VECTOR_WEIGHT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  GRAPH_WEIGHT?: number;

  @IsOptional()
  @Type(() => Number)
  @IsNumber()
  @Min(0)
  LEXICAL_WEIGHT?: number;

  @IsOptional()
  @IsIn(BOOLEAN_LITERALS)
  ENABLE_SYNTHESIS?: string;

  @IsOptional()
  @IsIn(BOOLEAN_LITERALS)
  ENABLE_SUMMARIZATION?: string;

  @IsOptional()
  @IsIn(BOOLEAN_LITERALS)
  ENABLE_CLUSTERING?: string;

  @IsOptional()
  @IsString()
  STORAGE_PATH?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  CRAWL_MAX_PAGES?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  CRAWL_MAX_DEPTH?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  CRAWL_TIMEOUT_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(100)
  QUERY_TOP_K?: number;

  @IsOptional()
  @IsIn(BOOLEAN_LITERALS)
  QUERY_AUTO_INGEST?: string;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  JOB_RETENTION_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  JOB_SWEEP_INTERVAL_MS?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  INGEST_CONCURRENCY?: number;
}

/**
 * Validates raw environment values. Declared weights may not all be zero:
 * the resolver needs some mass to normalize.
 */
export function validate(
  config: Record<string, unknown>,
): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config);
  const errors = validateSync(validated);

  if (errors.length > 0) {
    const details = errors
      .map((error) => Object.values(error.constraints ?? {}).join(', '))
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }

  const { VECTOR_WEIGHT, GRAPH_WEIGHT, LEXICAL_WEIGHT } = validated;
  if (VECTOR_WEIGHT === 0 && GRAPH_WEIGHT === 0 && LEXICAL_WEIGHT === 0) {
    throw new Error(
      'Invalid environment configuration: retrieval weights must not all be zero',
    );
  }

  return validated;
}
