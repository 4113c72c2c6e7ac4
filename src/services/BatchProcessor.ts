import { config } from '../config/scraper';
import { createLogger } from '../utils/logger';
import { readCsvColumn, writeCsv } from '../utils/csv';
import { errorMessage } from '../utils/errors';
import {
  OUTPUT_COLUMNS,
  type BatchResult,
  type BatchSummary,
  type CardRecord,
  type CardScraper,
  type OutputRow,
} from '../types';
import { isPriceChartingUrl } from './pricecharting/PriceChartingScraper';

const log = createLogger('batch-processor');

export type Reporter = Pick<Console, 'log' | 'warn'>;

export interface BatchProcessorOptions {
  scraper: CardScraper;
  delaySeconds?: number;
  sleep?: (ms: number) => Promise<void>;
  reporter?: Reporter;
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

export function formatPrice(price: number | undefined): string {
  return price === undefined ? '' : price.toFixed(2);
}

function displayPrice(price: number | undefined): string {
  return price === undefined ? 'n/a' : `$${formatPrice(price)}`;
}

function successRow(url: string, record: CardRecord): OutputRow {
  return {
    link: url,
    name: record.cardName,
    ungraded_price: formatPrice(record.ungradedPrice),
    psa10_price: formatPrice(record.psa10Price),
  };
}

function errorRow(url: string, name: string): OutputRow {
  return { link: url, name, ungraded_price: '', psa10_price: '' };
}

/**
 * Scrapes PriceCharting URLs one after another with a fixed pause between
 * requests. Every URL yields exactly one output row; failures are marked in
 * the row and counted, never thrown.
 */
export class BatchProcessor {
  private readonly scraper: CardScraper;
  private readonly delaySeconds: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly reporter: Reporter;

  constructor(options: BatchProcessorOptions) {
    this.scraper = options.scraper;
    this.delaySeconds = options.delaySeconds ?? config.batch.delaySeconds;
    this.sleep = options.sleep ?? defaultSleep;
    this.reporter = options.reporter ?? console;
  }

  /**
   * Keeps PriceCharting URLs in their original order. Blank entries are
   * dropped silently, anything else is reported as skipped.
   */
  filterUrls(entries: readonly string[]): string[] {
    const urls: string[] = [];

    for (const entry of entries) {
      const url = entry.trim();
      if (!url) {
        continue;
      }

      if (isPriceChartingUrl(url)) {
        urls.push(url);
      } else {
        this.reporter.warn(`⚠️  Skipping invalid URL: ${url}`);
      }
    }

    return urls;
  }

  /**
   * Filters the entries, then scrapes each remaining URL in order, pausing
   * between requests (not after the last one).
   */
  async process(entries: readonly string[]): Promise<BatchResult> {
    const urls = this.filterUrls(entries);
    const rows: OutputRow[] = [];
    let failed = 0;

    if (urls.length > 0) {
      this.reporter.log(`📋 Found ${urls.length} URLs to process`);
      this.reporter.log(`⏱️  Using ${this.delaySeconds}s delay between requests`);
    }

    for (let i = 0; i < urls.length; i++) {
      const url = urls[i];
      const progress = `[${i + 1}/${urls.length}]`;

      try {
        const result = await this.scraper.scrapeCard(url);

        if (result.ok) {
          const { record } = result;
          rows.push(successRow(url, record));
          this.reporter.log(
            `${progress} ✅ ${record.cardName}: ${displayPrice(record.ungradedPrice)} / ${displayPrice(record.psa10Price)}`,
          );
        } else {
          rows.push(errorRow(url, 'ERROR'));
          failed++;
          this.reporter.log(`${progress} ❌ Failed to scrape: ${url} (${result.error})`);
        }
      } catch (error) {
        rows.push(errorRow(url, `ERROR: ${errorMessage(error)}`));
        failed++;
        log.error({ url, error: errorMessage(error) }, 'Error processing URL');
        this.reporter.log(`${progress} ❌ Error processing ${url}: ${errorMessage(error)}`);
      }

      if (i < urls.length - 1 && this.delaySeconds > 0) {
        await this.sleep(this.delaySeconds * 1000);
      }
    }

    const summary: BatchSummary = {
      total: urls.length,
      success: urls.length - failed,
      failed,
    };

    return { rows, summary };
  }

  async processCsv(inputPath: string, outputPath: string, urlColumn: string = config.batch.urlColumn): Promise<BatchSummary> {
    const { rows, summary } = await this.process(readCsvColumn(inputPath, urlColumn));
    writeCsv(outputPath, OUTPUT_COLUMNS, rows);

    if (summary.total === 0) {
      this.reporter.log(`❌ No URLs found in ${inputPath}`);
      return summary;
    }

    this.reporter.log('');
    this.reporter.log('📊 Processing complete!');
    this.reporter.log(`   Total URLs: ${summary.total}`);
    this.reporter.log(`   Successful: ${summary.success}`);
    this.reporter.log(`   Failed: ${summary.failed}`);
    this.reporter.log(`   Output saved to: ${outputPath}`);

    log.info({ ...summary, outputPath }, 'Batch complete');
    return summary;
  }
}
