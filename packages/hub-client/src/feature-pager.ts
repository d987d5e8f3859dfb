import {
  resolveLogger,
  type ConnectionDescriptor,
  type Feature,
  type Logger,
  type LoggerOption,
} from '@geosync/core';
import type { FeaturePage, HubClient, PagedFeatureQuery } from './hub-client.js';

/**
 * Which paged read to drive
 */
export type PagedEndpoint = 'iterate' | 'search';

export interface FeaturePagerConfig {
  endpoint?: PagedEndpoint;
  /** Features per page */
  limit?: number;
  /** Filters sent with every page (tags, property selectors, ...) */
  query?: PagedFeatureQuery;
  /** Stop after this many pages. @default Infinity */
  maxPages?: number;
  logger?: LoggerOption;
}

/**
 * One page yielded by {@link FeaturePager.pages}
 */
export interface PagerPage {
  /** Zero-based page number */
  readonly index: number;
  /** New features on this page; ids already seen are dropped */
  readonly features: Feature[];
  /** Cursor for the next page, `undefined` on the last */
  readonly cursor: string | undefined;
  readonly duplicates: number;
}

function cursorOf(page: FeaturePage): string | undefined {
  return page.handle ?? page.nextPageToken;
}

/**
 * Drives an iterate or search read across pages, following the hub's cursor
 * verbatim until the hub stops returning one.
 *
 * Features whose id was already yielded on an earlier page are dropped,
 * and a cursor the hub repeats ends the walk.
 *
 * @example
 * ```typescript
 * const pager = new FeaturePager(client, conn, { limit: 500 });
 * for await (const page of pager.pages()) {
 *   store.writeFeatureBatch(page.features);
 * }
 * ```
 */
export class FeaturePager {
  private readonly endpoint: PagedEndpoint;
  private readonly limit: number | undefined;
  private readonly query: PagedFeatureQuery;
  private readonly maxPages: number;
  private readonly logger: Logger;

  constructor(
    private readonly client: HubClient,
    private readonly connection: ConnectionDescriptor,
    config: FeaturePagerConfig = {}
  ) {
    this.endpoint = config.endpoint ?? 'iterate';
    this.limit = config.limit;
    this.query = config.query ?? {};
    this.maxPages = config.maxPages ?? Number.POSITIVE_INFINITY;
    this.logger = resolveLogger(config.logger, 'feature-pager');
  }

  async *pages(): AsyncGenerator<PagerPage, void, undefined> {
    const seen = new Set<string>();
    const cursors = new Set<string>();
    let cursor: string | undefined;

    for (let index = 0; index < this.maxPages; index++) {
      const query: PagedFeatureQuery = { ...this.query };
      if (this.limit !== undefined) query.limit = this.limit;
      if (cursor !== undefined) query.handle = cursor;

      const reply =
        this.endpoint === 'search'
          ? this.client.loadFeaturesSearch(this.connection, query)
          : this.client.loadFeaturesIterate(this.connection, query);
      const { body } = await reply.result;

      if (body.features.length === 0) return;

      const features: Feature[] = [];
      let duplicates = 0;
      for (const feature of body.features) {
        if (feature.id !== undefined) {
          const key = String(feature.id);
          if (seen.has(key)) {
            duplicates++;
            continue;
          }
          seen.add(key);
        }
        features.push(feature);
      }
      if (duplicates > 0) {
        this.logger.warn('Dropped features already returned on an earlier page', {
          page: index,
          duplicates,
        });
      }

      const next = cursorOf(body);
      const repeated = next !== undefined && cursors.has(next);
      if (repeated) {
        this.logger.warn('Hub repeated a page cursor, stopping', { page: index, cursor: next });
      }

      yield { index, features, cursor: repeated ? undefined : next, duplicates };

      if (next === undefined || repeated) return;
      cursors.add(next);
      cursor = next;
    }
  }

  /**
   * Read every page and return the features in order.
   */
  async collect(): Promise<Feature[]> {
    const all: Feature[] = [];
    for await (const page of this.pages()) {
      all.push(...page.features);
    }
    return all;
  }
}
