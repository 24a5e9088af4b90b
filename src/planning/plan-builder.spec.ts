import {
  buildPlan,
  classifyCrawlMode,
  detectUrl,
  parseWebUrl,
} from './plan-builder';
import type { PlanOptions } from './plan.types';

const noCapabilities: PlanOptions = {
  collection: 'docs',
  capabilities: { summarize: false, cluster: false },
};

describe('buildPlan', () => {
  it('emits crawl, map, ingest for a single page', () => {
    const plan = buildPlan('https://example.com', noCapabilities);

    expect(plan.map((step) => step.kind)).toEqual(['crawl', 'map', 'ingest']);
    expect(plan[0]).toEqual({
      kind: 'crawl',
      url: 'https://example.com/',
      mode: 'page',
      maxPages: 1,
      maxDepth: 0,
    });
    expect(plan[2]).toEqual({
      kind: 'ingest',
      url: 'https://example.com/',
      collection: 'docs',
    });
  });

  it.each([
    'https://example.com/blog/post-1',
    'http://example.com/a/b/c/d.html?x=1',
    '  https://example.com/docs  ',
  ])('treats %s as a single page', (url) => {
    const kinds = buildPlan(url, noCapabilities).map((step) => step.kind);
    expect(kinds).toEqual(['crawl', 'map', 'ingest']);
  });

  it('selects a site crawl for a sitemap hint', () => {
    const plan = buildPlan('https://example.com/sitemap_index.xml', {
      ...noCapabilities,
      maxPages: 5,
    });

    expect(plan[0]).toEqual({
      kind: 'crawl',
      url: 'https://example.com/sitemap_index.xml',
      mode: 'site',
      maxPages: 5,
      maxDepth: 1,
    });
    expect(plan.filter((step) => step.kind === 'ingest')).toHaveLength(1);
  });

  it('honours an explicit site mode with default limits', () => {
    const plan = buildPlan('https://example.com/docs', {
      ...noCapabilities,
      crawlMode: 'site',
    });

    expect(plan[0]).toEqual({
      kind: 'crawl',
      url: 'https://example.com/docs',
      mode: 'site',
      maxPages: 20,
      maxDepth: 1,
    });
  });

  it.each(['', '   ', 'not a url', 'ftp://example.com/file', 'mailto:a@b.c', '/relative/path'])(
    'returns an empty plan for %p',
    (url) => {
      expect(buildPlan(url, noCapabilities)).toEqual([]);
    },
  );

  it('appends post-processing only when both requested and configured', () => {
    const withBoth = buildPlan('https://example.com', {
      collection: 'docs',
      capabilities: { summarize: true, cluster: true },
    });
    expect(withBoth.map((step) => step.kind)).toEqual([
      'crawl',
      'map',
      'ingest',
      'summarize',
      'cluster',
    ]);

    const summarizeOnly = buildPlan('https://example.com', {
      collection: 'docs',
      capabilities: { summarize: true, cluster: false },
    });
    expect(summarizeOnly.map((step) => step.kind)).toEqual([
      'crawl',
      'map',
      'ingest',
      'summarize',
    ]);

    const declined = buildPlan('https://example.com', {
      collection: 'docs',
      summarize: false,
      cluster: false,
      capabilities: { summarize: true, cluster: true },
    });
    expect(declined.map((step) => step.kind)).toEqual([
      'crawl',
      'map',
      'ingest',
    ]);
  });
});

describe('parseWebUrl', () => {
  it('accepts http and https only', () => {
    expect(parseWebUrl('http://example.com/a')?.href).toBe(
      'http://example.com/a',
    );
    expect(parseWebUrl('file:///etc/hosts')).toBeNull();
  });
});

describe('classifyCrawlMode', () => {
  it('matches sitemap files case-insensitively in auto mode', () => {
    expect(classifyCrawlMode(new URL('https://example.com/Sitemap.XML'))).toBe(
      'site',
    );
    expect(classifyCrawlMode(new URL('https://example.com/sitemap/'))).toBe(
      'page',
    );
    expect(
      classifyCrawlMode(new URL('https://example.com/sitemap.xml'), 'page'),
    ).toBe('page');
  });
});

describe('detectUrl', () => {
  it('finds the first URL and strips trailing punctuation', () => {
    expect(
      detectUrl('What does https://example.com/docs/intro. say about caching?'),
    ).toBe('https://example.com/docs/intro');
    expect(detectUrl('see (https://example.com/a), then b')).toBe(
      'https://example.com/a',
    );
  });

  it('returns null when there is no URL', () => {
    expect(detectUrl('how do I configure caching?')).toBeNull();
  });
});
