export { PriceChartingScraper, isPriceChartingUrl } from './services/pricecharting/PriceChartingScraper';
export type { ScraperOptions } from './services/pricecharting/PriceChartingScraper';
export {
  extractCard,
  extractCardName,
  extractPriceByGrade,
  loadDocument,
  parsePrice,
  PRICE_STRATEGIES,
  PSA_10,
  UNGRADED,
} from './services/pricecharting/extractor';
export type { ExtractedCard, ExtractionResult, PriceStrategy } from './services/pricecharting/extractor';
export { BatchProcessor, formatPrice } from './services/BatchProcessor';
export type { BatchProcessorOptions, Reporter } from './services/BatchProcessor';
export { CardPriceApi, isCardPriceError, toCardPricePayload } from './services/CardPriceApi';
export { ConfigurationError } from './utils/errors';
export { config } from './config/scraper';
export * from './types';
