import type { CardPriceError, CardPricePayload, CardRecord, CardScraper } from '../types';
import { isPriceChartingUrl } from './pricecharting/PriceChartingScraper';

export function isCardPriceError(value: CardRecord | CardPriceError): value is CardPriceError {
  return 'error' in value;
}

export function toCardPricePayload(record: CardRecord): CardPricePayload {
  return {
    card_name: record.cardName,
    ungraded_price: record.ungradedPrice ?? null,
    psa10_price: record.psa10Price ?? null,
    url: record.sourceUrl,
  };
}

/**
 * Single-URL lookup: validates the link, scrapes it and hands back either
 * the card record or an `{ error, url }` payload.
 */
export class CardPriceApi {
  constructor(private readonly scraper: CardScraper) {}

  isPriceChartingUrl(url: string): boolean {
    return isPriceChartingUrl(url);
  }

  async getCardPrices(url: string): Promise<CardRecord | CardPriceError> {
    if (!isPriceChartingUrl(url)) {
      return { error: 'Not a PriceCharting URL', url };
    }

    const result = await this.scraper.scrapeCard(url);
    if (!result.ok) {
      return { error: `Failed to scrape URL: ${result.error}`, url };
    }

    return result.record;
  }

  async getCardPricesJson(url: string): Promise<string> {
    const result = await this.getCardPrices(url);
    const payload = isCardPriceError(result) ? result : toCardPricePayload(result);
    return JSON.stringify(payload, null, 2);
  }
}
