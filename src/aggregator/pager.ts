import type { CallOptions, ContentItem, ListingEnvelope, Site } from "../types.js";

/**
 * Loads one page of a category; must not throw
 */
export type CategoryLoader = (
  site: Site,
  typeId: string,
  page: number,
  filters: Record<string, string>,
  options: CallOptions
) => Promise<ListingEnvelope>;

export interface PagerState {
  site: Site;
  typeId: string;
  filters: Record<string, string>;
  /** Last page loaded */
  page: number;
  pageCount: number;
  items: ContentItem[];
}

/**
 * Category paging per site
 *
 * Each site keeps its own position; loading more from one site never touches
 * another. A failed page leaves the position unchanged so it can be retried.
 */
export class CategoryPager {
  private states = new Map<string, PagerState>();
  private loading = new Map<string, Promise<ListingEnvelope>>();

  constructor(private readonly load: CategoryLoader) {}

  /**
   * Start paging a category from page 1
   */
  async open(
    site: Site,
    typeId: string,
    filters: Record<string, string> = {},
    options: CallOptions = {}
  ): Promise<ListingEnvelope> {
    this.reset(site.key);
    const state: PagerState = { site, typeId, filters, page: 0, pageCount: 1, items: [] };
    this.states.set(site.key, state);
    return this.fetchNext(state, options);
  }

  /**
   * Load the next page of a site's open category
   *
   * @returns undefined when the category is not open or has no more pages
   */
  async loadMore(siteKey: string, options: CallOptions = {}): Promise<ListingEnvelope | undefined> {
    const inflight = this.loading.get(siteKey);
    if (inflight) {
      return inflight;
    }
    const state = this.states.get(siteKey);
    if (!state || !this.hasMore(siteKey)) {
      return undefined;
    }
    return this.fetchNext(state, options);
  }

  hasMore(siteKey: string): boolean {
    const state = this.states.get(siteKey);
    return state !== undefined && state.page < state.pageCount;
  }

  /**
   * Items accumulated so far for a site
   */
  items(siteKey: string): ContentItem[] {
    return [...(this.states.get(siteKey)?.items ?? [])];
  }

  /**
   * Snapshot of a site's paging position; later pages do not change it
   */
  state(siteKey: string): PagerState | undefined {
    const state = this.states.get(siteKey);
    return state ? { ...state, filters: { ...state.filters }, items: [...state.items] } : undefined;
  }

  reset(siteKey: string): void {
    this.states.delete(siteKey);
    this.loading.delete(siteKey);
  }

  private async fetchNext(state: PagerState, options: CallOptions): Promise<ListingEnvelope> {
    const siteKey = state.site.key;
    const promise = this.load(state.site, state.typeId, state.page + 1, state.filters, options);
    this.loading.set(siteKey, promise);

    try {
      const envelope = await promise;
      // Ignore pages of a category that was reset or reopened meanwhile
      if (this.states.get(siteKey) !== state) {
        return envelope;
      }

      if (envelope.status === "ok") {
        state.page = state.page + 1;
        state.pageCount = Math.max(envelope.pageCount, state.page);
        state.items.push(...envelope.items);
      } else if (envelope.status === "empty") {
        state.page = state.page + 1;
        state.pageCount = state.page;
      }
      return envelope;
    } finally {
      if (this.loading.get(siteKey) === promise) {
        this.loading.delete(siteKey);
      }
    }
  }
}
