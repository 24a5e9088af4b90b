import type {
  CrawlMode,
  CrawlModeOption,
  PlanOptions,
  PlanStep,
} from './plan.types';

export const DEFAULT_SITE_MAX_PAGES = 20;
export const DEFAULT_SITE_MAX_DEPTH = 1;

const SITEMAP_SEGMENT = /^sitemap.*\.xml$/i;
const URL_IN_TEXT = /https?:\/\/\S+/i;
const TRAILING_PUNCTUATION = /[.,;:!?)\]'"<>]+$/;

/**
 * Parses a user-supplied URL. Only absolute http(s) URLs with a host are
 * accepted; anything else returns null.
 */
export function parseWebUrl(input: string): URL | null {
  const trimmed = input.trim();
  if (trimmed.length === 0) {
    return null;
  }

  let parsed: URL;
  try {
    parsed = new URL(trimmed);
  } catch {
    return null;
  }

  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    return null;
  }
  return parsed.hostname.length > 0 ? parsed : null;
}

export function isSitemapUrl(url: URL): boolean {
  const segments = url.pathname.split('/').filter((s) => s.length > 0);
  const last = segments[segments.length - 1];
  return last !== undefined && SITEMAP_SEGMENT.test(last);
}

export function classifyCrawlMode(
  url: URL,
  requested: CrawlModeOption = 'auto',
): CrawlMode {
  if (requested !== 'auto') {
    return requested;
  }
  return isSitemapUrl(url) ? 'site' : 'page';
}

/**
 * Produces the ordered steps for one URL. Pure: no I/O, no shared state.
 * An unparseable URL yields an empty plan.
 */
export function buildPlan(url: string, options: PlanOptions): PlanStep[] {
  const parsed = parseWebUrl(url);
  if (!parsed) {
    return [];
  }

  const href = parsed.href;
  const { collection } = options;
  const mode = classifyCrawlMode(parsed, options.crawlMode);

  const steps: PlanStep[] =
    mode === 'page'
      ? [{ kind: 'crawl', url: href, mode, maxPages: 1, maxDepth: 0 }]
      : [
          {
            kind: 'crawl',
            url: href,
            mode,
            maxPages: options.maxPages ?? DEFAULT_SITE_MAX_PAGES,
            maxDepth: options.maxDepth ?? DEFAULT_SITE_MAX_DEPTH,
          },
        ];

  steps.push({ kind: 'map', url: href });
  steps.push({ kind: 'ingest', url: href, collection });

  if ((options.summarize ?? true) && options.capabilities.summarize) {
    steps.push({ kind: 'summarize', url: href, collection });
  }
  if ((options.cluster ?? true) && options.capabilities.cluster) {
    steps.push({ kind: 'cluster', url: href, collection });
  }

  return steps;
}

/**
 * Finds the first http(s) URL in free text, without trailing punctuation
 * picked up from the surrounding sentence.
 */
export function detectUrl(text: string): string | null {
  const match = URL_IN_TEXT.exec(text);
  if (!match) {
    return null;
  }
  const candidate = match[0].replace(TRAILING_PUNCTUATION, '');
  return parseWebUrl(candidate) ? candidate : null;
}
