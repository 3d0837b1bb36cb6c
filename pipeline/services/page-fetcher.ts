import { errorMessage } from "../../shared/text-utils.js";
import { silentLogger, type MonitorLogger } from "../utils/logger.js";

export type FetchPageResult =
  | { ok: true; url: string; finalUrl: string; status: number; html: string }
  | { ok: false; url: string; status: number | null; reason: string };

interface PageFetcherOptions {
  timeoutMs: number;
  userAgent: string;
}

interface PageFetcherConstructorOptions extends Partial<PageFetcherOptions> {
  fetchImpl?: typeof fetch;
  logger?: MonitorLogger;
}

const DEFAULT_OPTIONS: PageFetcherOptions = {
  timeoutMs: 15_000,
  userAgent:
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36"
};

export class PageFetcher {
  private readonly options: PageFetcherOptions;

  private readonly fetchImpl: typeof fetch;

  private readonly logger: MonitorLogger;

  constructor(options?: PageFetcherConstructorOptions) {
    this.options = {
      timeoutMs: options?.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs,
      userAgent: options?.userAgent ?? DEFAULT_OPTIONS.userAgent
    };
    this.fetchImpl = options?.fetchImpl ?? fetch;
    this.logger = options?.logger ?? silentLogger;
  }

  /**
   * GETs `url` once. Timeouts, connection errors and non-2xx responses come
   * back as `{ ok: false }` rather than being thrown.
   */
  async fetchPage(url: string): Promise<FetchPageResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.options.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8",
          "Accept-Language": "en-CA,en;q=0.9"
        },
        redirect: "follow",
        signal: controller.signal
      });

      if (!response.ok) {
        return { ok: false, url, status: response.status, reason: `HTTP ${response.status}` };
      }

      const html = await response.text();
      this.logger.debug(`[fetchPage] HTTP ${response.status} ${url} (${html.length} chars)`);

      return {
        ok: true,
        url,
        finalUrl: response.url || url,
        status: response.status,
        html
      };
    } catch (error) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.options.timeoutMs}ms`
        : errorMessage(error);
      return { ok: false, url, status: null, reason };
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
