#!/usr/bin/env node
/**
 * Batch PriceCharting scrape: reads links from a CSV column, writes
 * link,name,ungraded_price,psa10_price rows to a new CSV.
 *
 *   batch-process <input_csv> <output_csv> [url_column] [delay_seconds]
 */

import fs from 'fs';
import { config } from '../config/scraper';
import { BatchProcessor } from '../services/BatchProcessor';
import { PriceChartingScraper } from '../services/pricecharting/PriceChartingScraper';
import { ConfigurationError } from '../utils/errors';
import { createLogger } from '../utils/logger';
import type { BatchSummary, CardScraper } from '../types';

const log = createLogger('batch-process');

export const USAGE = [
  'Usage: batch-process <input_csv> <output_csv> [url_column] [delay]',
  '',
  'Arguments:',
  '  input_csv   - Path to CSV file containing URLs',
  '  output_csv  - Path for output CSV file',
  `  url_column  - Column name containing URLs (default: '${config.batch.urlColumn}')`,
  `  delay       - Delay between requests in seconds (default: ${config.batch.delaySeconds.toFixed(1)})`,
  '',
  'Example:',
  '  batch-process cards.csv results.csv url 1.5',
].join('\n');

export interface BatchCliOptions {
  inputPath: string;
  outputPath: string;
  urlColumn: string;
  delaySeconds: number;
}

export function parseBatchArgs(argv: string[]): BatchCliOptions | null {
  if (argv.length < 2) {
    return null;
  }

  const [inputPath, outputPath, urlColumn, delayArg] = argv;

  let delaySeconds = config.batch.delaySeconds;
  if (delayArg !== undefined) {
    delaySeconds = Number(delayArg);
    if (delayArg.trim() === '' || !Number.isFinite(delaySeconds) || delaySeconds < 0) {
      throw new ConfigurationError(`Invalid delay: ${delayArg} (expected a non-negative number of seconds)`);
    }
  }

  return {
    inputPath,
    outputPath,
    urlColumn: urlColumn || config.batch.urlColumn,
    delaySeconds,
  };
}

// Partial failure still counts as a successful run
export function exitCodeFor(summary: BatchSummary): number {
  return summary.failed > 0 && summary.success === 0 ? 1 : 0;
}

export type CliOutput = Pick<Console, 'log' | 'warn' | 'error'>;

export interface BatchCliDeps {
  scraper?: CardScraper;
  sleep?: (ms: number) => Promise<void>;
  output?: CliOutput;
}

export async function run(argv: string[], deps: BatchCliDeps = {}): Promise<number> {
  const output = deps.output ?? console;

  try {
    const options = parseBatchArgs(argv);
    if (!options) {
      output.log(USAGE);
      return 1;
    }

    if (!fs.existsSync(options.inputPath)) {
      output.error(`❌ Input file does not exist: ${options.inputPath}`);
      return 1;
    }

    const processor = new BatchProcessor({
      scraper: deps.scraper ?? new PriceChartingScraper(),
      delaySeconds: options.delaySeconds,
      sleep: deps.sleep,
      reporter: output,
    });

    const summary = await processor.processCsv(options.inputPath, options.outputPath, options.urlColumn);
    return exitCodeFor(summary);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      output.error(`❌ ${error.message}`);
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      log.error({ err: error }, 'Batch processing failed');
      console.error('Batch processing failed:', error);
      process.exit(1);
    });
}
