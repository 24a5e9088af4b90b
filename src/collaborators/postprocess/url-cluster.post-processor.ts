import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ARTIFACT_WRITER,
  type ArtifactWriter,
  type PostProcessContext,
  type PostProcessor,
  type PostProcessResult,
  type StructuredDocument,
} from '../collaborator.interfaces';

export interface UrlCluster {
  key: string;
  urls: string[];
  titles: string[];
}

/** `/docs/intro` → `/docs`; the site root and top-level pages share `/`. */
export function clusterKey(url: string): string {
  const segments = new URL(url).pathname
    .split('/')
    .filter((segment) => segment.length > 0);
  return segments.length > 1 ? `/${segments[0]}` : '/';
}

export function clusterByPath(documents: StructuredDocument[]): UrlCluster[] {
  const clusters = new Map<string, UrlCluster>();
  for (const document of documents) {
    const key = clusterKey(document.url);
    const cluster = clusters.get(key) ?? { key, urls: [], titles: [] };
    if (!cluster.urls.includes(document.url)) {
      cluster.urls.push(document.url);
      cluster.titles.push(document.title);
    }
    clusters.set(key, cluster);
  }
  return [...clusters.values()].sort(
    (a, b) => b.urls.length - a.urls.length || a.key.localeCompare(b.key),
  );
}

/**
 * Groups crawled pages by their leading path segment and writes the grouping
 * as `clusters.json`.
 */
@Injectable()
export class UrlClusterPostProcessor implements PostProcessor {
  readonly name = 'cluster';
  private readonly logger = new Logger(UrlClusterPostProcessor.name);

  constructor(
    @Inject(ARTIFACT_WRITER) private readonly artifactWriter: ArtifactWriter,
  ) {}

  async process(
    documents: StructuredDocument[],
    context: PostProcessContext,
  ): Promise<PostProcessResult> {
    const clusters = clusterByPath(documents);
    const path = await this.artifactWriter.writeJson(
      context.artifactDir,
      'clusters.json',
      { url: context.url, collection: context.collection, clusters },
    );
    this.logger.log(
      `[Cluster] url=${context.url} clusters=${clusters.length} documents=${documents.length}`,
    );
    return { artifacts: [path] };
  }
}
