import { HttpsProxyAgent } from "https-proxy-agent";
import got from "got";

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export interface ProxyStats {
  configured: boolean;
  totalRequests: number;
  totalBytes: number;
}

class ProxyManager {
  private proxyUrl: string | null = null;
  private requestCount = 0;
  private totalBytes = 0;
  private initialized = false;

  initialize() {
    if (this.initialized) return;
    this.initialized = true;

    this.proxyUrl = process.env.FEED_PROXY_URL || null;
    if (this.proxyUrl) {
      // Host only: the URL may carry credentials
      console.warn(`🔧 Feed requests go via proxy ${new URL(this.proxyUrl).host}`);
    }
  }

  getAgent(): HttpsProxyAgent<string> | null {
    if (!this.initialized) {
      this.initialize();
    }

    this.requestCount++;
    return this.proxyUrl ? new HttpsProxyAgent(this.proxyUrl) : null;
  }

  trackBytes(bytes: number) {
    this.totalBytes += bytes;
  }

  getStats(): ProxyStats {
    if (!this.initialized) {
      this.initialize();
    }
    return {
      configured: this.proxyUrl !== null,
      totalRequests: this.requestCount,
      totalBytes: this.totalBytes,
    };
  }
}

export const proxyManager = new ProxyManager();

export interface FetchedPage {
  ok: boolean;
  status: number;
  statusText: string;
  body: string;
}

/**
 * Proxy-aware GET using got. HTTP error statuses are returned, not thrown.
 */
export async function proxyFetch(
  url: string,
  options: {
    agent?: HttpsProxyAgent<string> | null;
    headers?: Record<string, string>;
    timeout?: number;
  } = {}
): Promise<FetchedPage> {
  const response = await got(url, {
    method: "GET",
    headers: options.headers || {},
    timeout: { request: options.timeout || 30000 },
    throwHttpErrors: false,
    retry: { limit: 0 },
    agent: options.agent ? { https: options.agent, http: options.agent } : undefined,
  });

  proxyManager.trackBytes(response.body.length);

  return {
    ok: response.statusCode >= 200 && response.statusCode < 300,
    status: response.statusCode,
    statusText: response.statusMessage || "",
    body: response.body,
  };
}
