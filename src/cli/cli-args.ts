import { parseArgs } from 'node:util';
import { ValidationError } from '../common/errors/crawl-prime.errors';
import type { CrawlModeOption } from '../planning/plan.types';
import { CRAWL_MODE_OPTIONS } from '../api/dto/ingest-request.dto';

export const DEFAULT_OUTPUT_DIR = 'data/output';

export const USAGE = `Usage: crawl-prime --url <URL> [options]

Options:
  --url <URL>          Page, site or sitemap URL to ingest (required)
  --output <dir>       Directory for mapped documents (default: ${DEFAULT_OUTPUT_DIR})
  --mode <mode>        page | site | auto (default: auto)
  --max-pages <n>      Page limit for site crawls
  --collection <name>  Target collection (default: CRAWLPRIME_COLLECTION)
  -h, --help           Show this message`;

export interface CliArgs {
  url: string;
  output: string;
  mode: CrawlModeOption;
  maxPages?: number;
  collection?: string;
  help: boolean;
}

function parseMode(value: string | undefined): CrawlModeOption {
  if (value === undefined) {
    return 'auto';
  }
  const mode = CRAWL_MODE_OPTIONS.find((option) => option === value);
  if (!mode) {
    throw new ValidationError(
      `--mode must be one of ${CRAWL_MODE_OPTIONS.join(', ')}, got '${value}'`,
    );
  }
  return mode;
}

function parseMaxPages(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(
      `--max-pages must be a positive integer, got '${value}'`,
    );
  }
  return parsed;
}

function readFlags(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        url: { type: 'string' },
        output: { type: 'string', default: DEFAULT_OUTPUT_DIR },
        mode: { type: 'string' },
        'max-pages': { type: 'string' },
        collection: { type: 'string' },
        help: { type: 'boolean', short: 'h', default: false },
      },
      allowPositionals: false,
      strict: true,
    }).values;
  } catch (error) {
    throw new ValidationError(
      error instanceof Error ? error.message : String(error),
    );
  }
}

export function parseCliArgs(argv: string[]): CliArgs {
  const values = readFlags(argv);
  const help = values.help ?? false;
  if (!help && !values.url) {
    throw new ValidationError('--url is required');
  }

  return {
    url: values.url ?? '',
    output: values.output ?? DEFAULT_OUTPUT_DIR,
    mode: parseMode(values.mode),
    maxPages: parseMaxPages(values['max-pages']),
    collection: values.collection,
    help,
  };
}
