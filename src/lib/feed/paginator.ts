import { FEED_MAX_PAGES, FEED_TIMEOUT_MS, FEED_USER_AGENT } from "../constants";
import { TransportError, errorMessage } from "../errors";
import { type FetchedPage, formatBytes, proxyFetch, proxyManager } from "../proxy-manager";
import { type FeedItem, type FeedPage, feedPageSchema } from "./types";

export type PageFetcher = (url: string) => Promise<FetchedPage>;
export type FeedLogger = Pick<Console, "log" | "warn" | "error">;

export interface FeedPaginatorOptions {
  baseUrl: string;
  maxPages?: number;
  timeoutMs?: number;
  fetchPage?: PageFetcher;
  logger?: FeedLogger;
}

function defaultFetcher(timeoutMs: number): PageFetcher {
  return (url) =>
    proxyFetch(url, {
      agent: proxyManager.getAgent(),
      headers: {
        "User-Agent": FEED_USER_AGENT,
        Accept: "application/json",
      },
      timeout: timeoutMs,
    });
}

/**
 * Reads a Realtime Paged Data Exchange feed from its first page to its
 * current end, one page at a time.
 */
export class FeedPaginator {
  private readonly baseUrl: string;
  private readonly maxPages: number;
  private readonly fetcher: PageFetcher;
  private readonly logger: FeedLogger;

  constructor(options: FeedPaginatorOptions) {
    this.baseUrl = new URL(options.baseUrl).toString();
    this.maxPages = options.maxPages ?? FEED_MAX_PAGES;
    this.fetcher = options.fetchPage ?? defaultFetcher(options.timeoutMs ?? FEED_TIMEOUT_MS);
    this.logger = options.logger ?? console;
  }

  /**
   * Fetch every page and return all items in arrival order.
   *
   * Stops on the RPDE last page (no items, `next` pointing back at the page
   * itself), on a page without `next`, or after `maxPages` pages with a
   * warning.
   * @throws TransportError if any page cannot be fetched or read
   */
  async fetchAll(): Promise<FeedItem[]> {
    const startTime = Date.now();
    const items: FeedItem[] = [];
    let url = this.baseUrl;
    let pageCount = 0;
    let totalBytes = 0;

    this.logger.log(`📍 Reading feed ${this.baseUrl}`);

    while (true) {
      const { page, bytes } = await this.fetchPage(url);
      pageCount++;
      totalBytes += bytes;
      items.push(...page.items);

      const next = this.resolveNext(page, url);

      if (page.items.length === 0 && next === url) {
        break;
      }
      if (!next) {
        break;
      }
      if (pageCount >= this.maxPages) {
        this.logger.warn(`⚠️  Stopped after ${pageCount} pages to prevent an endless poll; results may be incomplete`);
        break;
      }

      url = next;
    }

    const duration = ((Date.now() - startTime) / 1000).toFixed(1);
    this.logger.log(`📊 Feed: ${pageCount} pages, ${items.length} items, ${formatBytes(totalBytes)} in ${duration}s`);

    return items;
  }

  private resolveNext(page: FeedPage, currentUrl: string): string | null {
    if (!page.next) return null;
    try {
      return new URL(page.next, currentUrl).toString();
    } catch (error) {
      throw new TransportError(`Invalid next URL "${page.next}" from ${currentUrl}`, currentUrl, { cause: error });
    }
  }

  private async fetchPage(url: string): Promise<{ page: FeedPage; bytes: number }> {
    let response: FetchedPage;
    try {
      response = await this.fetcher(url);
    } catch (error) {
      throw new TransportError(`Failed to fetch ${url}: ${errorMessage(error)}`, url, { cause: error });
    }

    if (!response.ok) {
      throw new TransportError(`Failed to fetch ${url}: ${response.status} ${response.statusText}`.trim(), url, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = JSON.parse(response.body);
    } catch (error) {
      throw new TransportError(`Feed page from ${url} is not JSON`, url, { status: response.status, cause: error });
    }

    const parsed = feedPageSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError(`Feed page from ${url} is not an RPDE page`, url, {
        status: response.status,
        cause: parsed.error,
      });
    }

    return { page: parsed.data, bytes: response.body.length };
  }
}
