export interface CardRecord {
  cardName: string;
  ungradedPrice?: number;
  psa10Price?: number;
  sourceUrl: string;
}

export type ScrapeResult =
  | { ok: true; record: CardRecord }
  | { ok: false; url: string; error: string };

export interface CardScraper {
  scrapeCard(url: string): Promise<ScrapeResult>;
}

// Column names are the CSV header, hence snake_case
export interface OutputRow {
  link: string;
  name: string;
  ungraded_price: string;
  psa10_price: string;
}

export const OUTPUT_COLUMNS = ['link', 'name', 'ungraded_price', 'psa10_price'] as const satisfies ReadonlyArray<keyof OutputRow>;

export interface BatchSummary {
  total: number;
  success: number;
  failed: number;
}

export interface BatchResult {
  rows: OutputRow[];
  summary: BatchSummary;
}

export interface CardPriceError {
  error: string;
  url: string;
}

export interface CardPricePayload {
  card_name: string;
  ungraded_price: number | null;
  psa10_price: number | null;
  url: string;
}
