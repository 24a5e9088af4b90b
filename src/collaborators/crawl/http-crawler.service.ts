/**
 * HTTP Crawler Service
 * Fetches server-rendered HTML with axios and walks links or sitemaps with
 * cheerio. No retries: a failed page is reported and the crawl moves on.
 */

import { Inject, Injectable, Logger } from '@nestjs/common';
import axios, { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import {
  CRAWL_PRIME_OPTIONS,
  type CrawlPrimeOptions,
} from '../../config/crawl-prime.options';
import { errorMessage } from '../../common/errors/crawl-prime.errors';
import { isSitemapUrl } from '../../planning/plan-builder';
import type {
  CrawledPage,
  CrawlRequest,
  CrawlResult,
  SubResourceFailure,
  WebCrawler,
} from '../collaborator.interfaces';

export interface FetchedResource {
  url: string;
  contentType: string;
  body: string;
}

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];
const MAX_NESTED_SITEMAPS = 10;

export function extractLinks(html: string, baseUrl: string): string[] {
  const $ = cheerio.load(html);
  const links = new Set<string>();
  $('a[href]').each((_, element) => {
    const href = $(element).attr('href');
    if (!href) {
      return;
    }
    const resolved = resolveHttpUrl(href, baseUrl);
    if (resolved) {
      links.add(resolved);
    }
  });
  return [...links];
}

export function extractSitemapLocations(xml: string): string[] {
  const $ = cheerio.load(xml, { xml: true });
  return $('loc')
    .map((_, element) => $(element).text().trim())
    .get()
    .filter((loc) => loc.length > 0);
}

function resolveHttpUrl(href: string, baseUrl: string): string | null {
  try {
    const url = new URL(href, baseUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    url.hash = '';
    return url.href;
  } catch {
    return null;
  }
}

@Injectable()
export class HttpCrawlerService implements WebCrawler {
  private readonly logger = new Logger(HttpCrawlerService.name);
  private readonly http: AxiosInstance;

  constructor(
    @Inject(CRAWL_PRIME_OPTIONS) private readonly options: CrawlPrimeOptions,
  ) {
    this.http = axios.create({
      timeout: options.crawl.timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
      headers: {
        'User-Agent': options.crawl.userAgent,
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      },
    });
  }

  async crawl(request: CrawlRequest): Promise<CrawlResult> {
    const startTime = Date.now();
    const result =
      request.mode === 'page'
        ? await this.crawlPages([request.url])
        : isSitemapUrl(new URL(request.url))
          ? await this.crawlSitemap(request)
          : await this.crawlLinks(request);

    this.logger.log(
      `[Crawl] url=${request.url} mode=${request.mode} pages=${result.pages.length} failures=${result.failures.length} duration=${Date.now() - startTime}ms`,
    );
    return result;
  }

  protected async fetch(url: string): Promise<FetchedResource> {
    const response = await this.http.get<string>(url);
    const header: unknown = response.headers['content-type'];
    const finalUrl: unknown = response.request?.res?.responseUrl;
    return {
      url: typeof finalUrl === 'string' ? finalUrl : url,
      contentType: typeof header === 'string' ? header : '',
      body: typeof response.data === 'string' ? response.data : String(response.data),
    };
  }

  private async crawlPages(urls: string[]): Promise<CrawlResult> {
    const pages: CrawledPage[] = [];
    const failures: SubResourceFailure[] = [];
    for (const url of urls) {
      const outcome = await this.fetchPage(url);
      if ('reason' in outcome) {
        failures.push(outcome);
      } else {
        pages.push(outcome);
      }
    }
    return { pages, failures };
  }

  /** Breadth-first over same-origin links, bounded by depth and page count. */
  private async crawlLinks(request: CrawlRequest): Promise<CrawlResult> {
    const origin = new URL(request.url).origin;
    const pages: CrawledPage[] = [];
    const failures: SubResourceFailure[] = [];
    const seen = new Set<string>([request.url]);
    let frontier = [request.url];

    for (let depth = 0; depth <= request.maxDepth && frontier.length > 0; depth++) {
      const next: string[] = [];
      for (const url of frontier) {
        if (pages.length >= request.maxPages) {
          return { pages, failures };
        }
        const outcome = await this.fetchPage(url);
        if ('reason' in outcome) {
          failures.push(outcome);
          continue;
        }
        pages.push(outcome);
        for (const link of outcome.links) {
          if (!seen.has(link) && new URL(link).origin === origin) {
            seen.add(link);
            next.push(link);
          }
        }
      }
      frontier = next;
    }

    return { pages, failures };
  }

  /**
   * Reads `<loc>` entries, expanding one level of nested sitemaps. A sitemap
   * that cannot be fetched fails the whole crawl.
   */
  private async crawlSitemap(request: CrawlRequest): Promise<CrawlResult> {
    const root = await this.fetch(request.url);
    const failures: SubResourceFailure[] = [];
    const pageUrls: string[] = [];
    let nested = 0;

    for (const loc of extractSitemapLocations(root.body)) {
      if (pageUrls.length >= request.maxPages) {
        break;
      }
      const parsed = resolveHttpUrl(loc, request.url);
      if (!parsed) {
        continue;
      }
      if (!isSitemapUrl(new URL(parsed))) {
        pageUrls.push(parsed);
        continue;
      }
      if (nested >= MAX_NESTED_SITEMAPS) {
        continue;
      }
      nested += 1;
      try {
        const child = await this.fetch(parsed);
        for (const childLoc of extractSitemapLocations(child.body)) {
          const childUrl = resolveHttpUrl(childLoc, parsed);
          if (childUrl && pageUrls.length < request.maxPages) {
            pageUrls.push(childUrl);
          }
        }
      } catch (error) {
        failures.push({ resource: parsed, stage: 'crawl', reason: errorMessage(error) });
      }
    }

    const crawled = await this.crawlPages(pageUrls);
    return {
      pages: crawled.pages,
      failures: [...failures, ...crawled.failures],
    };
  }

  private async fetchPage(url: string): Promise<CrawledPage | SubResourceFailure> {
    try {
      const resource = await this.fetch(url);
      const mediaType = resource.contentType.split(';')[0].trim().toLowerCase();
      if (mediaType && !HTML_CONTENT_TYPES.includes(mediaType)) {
        return { resource: url, stage: 'crawl', reason: `unsupported content type ${mediaType}` };
      }
      const $ = cheerio.load(resource.body);
      return {
        url: resource.url,
        title: $('title').first().text().trim(),
        html: resource.body,
        links: extractLinks(resource.body, resource.url),
        crawledAt: new Date().toISOString(),
      };
    } catch (error) {
      this.logger.warn(`[Crawl] failed url=${url} error=${errorMessage(error)}`);
      return { resource: url, stage: 'crawl', reason: errorMessage(error) };
    }
  }
}
