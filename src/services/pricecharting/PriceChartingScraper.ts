import https from 'https';
import axios, { AxiosInstance, isAxiosError } from 'axios';
import { config } from '../../config/scraper';
import { createLogger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import type { CardScraper, ScrapeResult } from '../../types';
import { extractCard, loadDocument } from './extractor';

const log = createLogger('pricecharting-scraper');

export function isPriceChartingUrl(url: string): boolean {
  return url.toLowerCase().includes('pricecharting.com');
}

export interface ScraperOptions {
  timeoutMs?: number;
  userAgent?: string;
  /** Preconfigured HTTP session; one is created when omitted. */
  client?: AxiosInstance;
}

/**
 * Fetches PriceCharting product pages and extracts the card name plus the
 * ungraded and PSA 10 prices. One axios instance serves every request.
 */
export class PriceChartingScraper implements CardScraper {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options: ScraperOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.http.timeoutMs;
    this.userAgent = options.userAgent ?? config.http.userAgent;

    this.client =
      options.client ??
      axios.create({
        timeout: this.timeoutMs,
        headers: {
          'User-Agent': this.userAgent,
        },
        // Certificate checks are off for this session
        httpsAgent: new https.Agent({
          keepAlive: true,
          rejectUnauthorized: false,
        }),
      });

    log.debug({ timeoutMs: this.timeoutMs }, 'PriceCharting scraper initialized');
  }

  async scrapeCard(url: string): Promise<ScrapeResult> {
    let html: string;

    try {
      const response = await this.client.get<string>(url, {
        timeout: this.timeoutMs,
        headers: { 'User-Agent': this.userAgent },
        responseType: 'text',
        validateStatus: () => true,
      });

      if (response.status < 200 || response.status >= 300) {
        log.error({ url, status: response.status }, 'Request failed');
        return { ok: false, url, error: `HTTP ${response.status}` };
      }

      html = String(response.data ?? '');
    } catch (error) {
      const cause = isAxiosError(error) && error.code ? `${error.code}: ${error.message}` : errorMessage(error);
      log.error({ url, error: cause }, 'Request failed');
      return { ok: false, url, error: cause };
    }

    try {
      const extraction = extractCard(loadDocument(html));
      if (!extraction.ok) {
        log.warn({ url }, 'Could not extract card name from the page');
        return { ok: false, url, error: extraction.error };
      }

      return {
        ok: true,
        record: { ...extraction.card, sourceUrl: url },
      };
    } catch (error) {
      log.error({ url, error: errorMessage(error) }, 'Unexpected error while scraping');
      return { ok: false, url, error: errorMessage(error) };
    }
  }
}
