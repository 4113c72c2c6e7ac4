#!/usr/bin/env node
/**
 * Look up a single PriceCharting card page.
 *
 *   card-price <pricecharting_url> [--json]
 */

import { CardPriceApi, isCardPriceError } from '../services/CardPriceApi';
import { PriceChartingScraper } from '../services/pricecharting/PriceChartingScraper';
import { createLogger } from '../utils/logger';
import type { CardRecord, CardScraper } from '../types';

const log = createLogger('card-price');

export const USAGE = [
  'Usage: card-price <pricecharting_url> [--json]',
  'Example: card-price https://www.pricecharting.com/game/pokemon-surging-sparks/latias-ex-239',
].join('\n');

export function describeCard(record: CardRecord): string[] {
  const price = (value: number | undefined) => (value === undefined ? 'Not found' : `$${value.toFixed(2)}`);
  return [
    `Card Name: ${record.cardName}`,
    `Ungraded Price: ${price(record.ungradedPrice)}`,
    `PSA 10 Price: ${price(record.psa10Price)}`,
  ];
}

export interface CardPriceCliDeps {
  scraper?: CardScraper;
  output?: Pick<Console, 'log' | 'error'>;
}

export async function run(args: string[], deps: CardPriceCliDeps = {}): Promise<number> {
  const output = deps.output ?? console;
  const json = args.includes('--json');
  const positional = args.filter((arg) => arg !== '--json');

  if (positional.length !== 1) {
    output.log(USAGE);
    return 1;
  }

  const [url] = positional;
  const api = new CardPriceApi(deps.scraper ?? new PriceChartingScraper());

  if (!api.isPriceChartingUrl(url)) {
    output.error('Error: Please provide a valid PriceCharting URL');
    return 1;
  }

  // JSON mode always succeeds: failures are reported inside the payload
  if (json) {
    output.log(await api.getCardPricesJson(url));
    return 0;
  }

  const result = await api.getCardPrices(url);
  if (isCardPriceError(result)) {
    output.log(result.error);
    return 1;
  }

  describeCard(result).forEach((line) => output.log(line));
  return 0;
}

if (require.main === module) {
  run(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error) => {
      log.error({ err: error }, 'Card lookup failed');
      console.error('Card lookup failed:', error);
      process.exit(1);
    });
}
