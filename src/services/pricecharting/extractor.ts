import * as cheerio from 'cheerio';
import { createLogger } from '../../utils/logger';

const log = createLogger('pricecharting-extractor');

export const UNGRADED = 'Ungraded';
export const PSA_10 = 'PSA 10';

// PriceCharting appends the product line to every card title ("Latias ex #239 Pokemon Surging Sparks")
const PRODUCT_LINE_MARKER = 'Pokemon';
const DOLLAR_AMOUNT = /\$[\d,]+\.?\d*/;
const PRICE_SPAN_SELECTOR = 'span.price, span.js-price';

export interface ExtractedCard {
  cardName: string;
  ungradedPrice?: number;
  psa10Price?: number;
}

export type ExtractionResult =
  | { ok: true; card: ExtractedCard }
  | { ok: false; error: string };

export type PriceStrategy = ($: cheerio.CheerioAPI, grade: string) => number | undefined;

export function loadDocument(html: string): cheerio.CheerioAPI {
  return cheerio.load(html);
}

function cleanText(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Parses a displayed price such as "$1,234.56" into a number.
 * "-" and empty text mean no price; anything that does not reduce to a
 * decimal number is treated the same way.
 */
export function parsePrice(priceText: string | null | undefined): number | undefined {
  if (!priceText || priceText.trim() === '-') {
    return undefined;
  }

  const cleaned = priceText.replace(/[^\d.]/g, '');
  const value = cleaned === '' ? Number.NaN : Number(cleaned);
  if (!Number.isFinite(value)) {
    log.warn({ priceText }, 'Could not parse price');
    return undefined;
  }

  return value;
}

function stripProductLine(text: string): string {
  const markerIndex = text.indexOf(PRODUCT_LINE_MARKER);
  return markerIndex === -1 ? text : text.slice(0, markerIndex).trim();
}

export function extractCardName($: cheerio.CheerioAPI): string | undefined {
  const heading = $('h1').first();
  if (heading.length > 0) {
    return stripProductLine(cleanText(heading.text()));
  }

  const title = $('title').first();
  if (title.length > 0) {
    return stripProductLine(cleanText(title.text()));
  }

  return undefined;
}

// Trimmed cell texts per row per table, in document order; inner whitespace is kept
function readTables($: cheerio.CheerioAPI): string[][][] {
  return $('table')
    .toArray()
    .map((table) =>
      $(table)
        .find('tr')
        .toArray()
        .map((row) =>
          $(row)
            .find('td, th')
            .toArray()
            .map((cell) => $(cell).text().trim()),
        ),
    );
}

// Main comparison table: grade names across the first row, prices in the second
const headerAlignedTable: PriceStrategy = ($, grade) => {
  const needle = grade.toLowerCase();

  for (const rows of readTables($)) {
    if (rows.length < 2) {
      continue;
    }

    const [headers, values] = rows;
    for (let i = 0; i < headers.length; i++) {
      if (!headers[i].toLowerCase().includes(needle) || i >= values.length) {
        continue;
      }

      const amount = values[i].match(DOLLAR_AMOUNT);
      if (amount) {
        const price = parsePrice(amount[0]);
        if (price !== undefined) {
          return price;
        }
      }
    }
  }

  return undefined;
};

// Full price guide: one "<grade> | <price>" row per grade
const twoColumnLookup: PriceStrategy = ($, grade) => {
  const needle = grade.toLowerCase();

  for (const cells of readTables($).flat()) {
    if (cells.length >= 2 && cells[0].toLowerCase() === needle) {
      return parsePrice(cells[1]);
    }
  }

  return undefined;
};

// Last resort: the first price span is the ungraded price; PSA 10 is the span whose parent mentions it
const positionalPriceSpans: PriceStrategy = ($, grade) => {
  const spans = $(PRICE_SPAN_SELECTOR).toArray();
  if (spans.length === 0) {
    return undefined;
  }

  if (grade === UNGRADED) {
    return parsePrice(cleanText($(spans[0]).text()));
  }

  if (grade.includes('10')) {
    for (const span of spans) {
      const parentText = $(span).parent().text();
      if (parentText.toLowerCase().includes('psa') && parentText.includes('10')) {
        return parsePrice(cleanText($(span).text()));
      }
    }
  }

  return undefined;
};

export const PRICE_STRATEGIES: readonly PriceStrategy[] = [headerAlignedTable, twoColumnLookup, positionalPriceSpans];

export function extractPriceByGrade($: cheerio.CheerioAPI, grade: string): number | undefined {
  for (const strategy of PRICE_STRATEGIES) {
    const price = strategy($, grade);
    if (price !== undefined) {
      return price;
    }
  }

  return undefined;
}

export function extractCard($: cheerio.CheerioAPI): ExtractionResult {
  const cardName = extractCardName($);
  if (!cardName) {
    return { ok: false, error: 'name not found' };
  }

  return {
    ok: true,
    card: {
      cardName,
      ungradedPrice: extractPriceByGrade($, UNGRADED),
      psa10Price: extractPriceByGrade($, PSA_10),
    },
  };
}
