import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import {
  GRAPH_BACKEND,
  type GraphBackend,
} from '../collaborators/collaborator.interfaces';
import { errorMessage } from '../common/errors/crawl-prime.errors';

export const GRAPH_PROBE_OPTIONS = Symbol('GRAPH_PROBE_OPTIONS');

export interface GraphProbeOptions {
  /** 0 probes on every call. */
  cacheMs: number;
  clock?: () => number;
}

/**
 * Wraps the graph backend's reachability probe. A missing backend and a
 * failing probe both read as unreachable.
 */
@Injectable()
export class GraphReachabilityService {
  private readonly logger = new Logger(GraphReachabilityService.name);
  private readonly clock: () => number;
  private cached: { reachable: boolean; at: number } | null = null;

  constructor(
    @Inject(GRAPH_PROBE_OPTIONS) private readonly options: GraphProbeOptions,
    @Optional()
    @Inject(GRAPH_BACKEND)
    private readonly backend: GraphBackend | null,
  ) {
    this.clock = options.clock ?? Date.now;
  }

  async isReachable(): Promise<boolean> {
    if (!this.backend) {
      return false;
    }

    const now = this.clock();
    if (
      this.options.cacheMs > 0 &&
      this.cached &&
      now - this.cached.at < this.options.cacheMs
    ) {
      return this.cached.reachable;
    }

    let reachable: boolean;
    try {
      reachable = await this.backend.isReachable();
    } catch (error) {
      this.logger.warn(
        `[GraphProbe] unreachable error=${errorMessage(error)}`,
      );
      reachable = false;
    }

    if (this.options.cacheMs > 0) {
      this.cached = { reachable, at: now };
    }
    return reachable;
  }
}
