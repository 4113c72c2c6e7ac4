import fs from 'fs';
import path from 'path';
import {
  extractCard,
  extractCardName,
  extractPriceByGrade,
  loadDocument,
  parsePrice,
  PSA_10,
  UNGRADED,
} from '../../../../src/services/pricecharting/extractor';
import { formatPrice } from '../../../../src/services/BatchProcessor';

const fixture = fs.readFileSync(path.join(__dirname, '../../../fixtures/latias-ex-239.html'), 'utf8');

describe('PriceCharting extractor', () => {
  describe('parsePrice', () => {
    it('should strip currency symbols and thousands separators', () => {
      expect(parsePrice('$1,234.56')).toBe(1234.56);
      expect(parsePrice('1234.56')).toBe(1234.56);
      expect(parsePrice(' $420.00 ')).toBe(420);
    });

    it('should treat dashes, empty and non-numeric text as absent', () => {
      expect(parsePrice('-')).toBeUndefined();
      expect(parsePrice(' - ')).toBeUndefined();
      expect(parsePrice('')).toBeUndefined();
      expect(parsePrice(undefined)).toBeUndefined();
      expect(parsePrice('abc')).toBeUndefined();
      expect(parsePrice('1.2.3')).toBeUndefined();
    });

    it('should read back a formatted price without loss', () => {
      expect(parsePrice(formatPrice(420.0))).toBe(420);
      expect(parsePrice(formatPrice(146.64))).toBe(146.64);
    });
  });

  describe('extractCardName', () => {
    it('should cut the heading before the product line', () => {
      const $ = loadDocument('<h1>Latias ex #239 Pokemon Surging Sparks</h1>');
      expect(extractCardName($)).toBe('Latias ex #239');
    });

    it('should keep the whole heading when it has no product line', () => {
      const $ = loadDocument('<h1>  Black Lotus  </h1>');
      expect(extractCardName($)).toBe('Black Lotus');
    });

    it('should fall back to the title element', () => {
      const $ = loadDocument('<html><head><title>Charizard #4 Pokemon Base Set</title></head><body></body></html>');
      expect(extractCardName($)).toBe('Charizard #4');
    });

    it('should prefer the heading over the title', () => {
      const $ = loadDocument('<html><head><title>Site title</title></head><body><h1>Pikachu #58</h1></body></html>');
      expect(extractCardName($)).toBe('Pikachu #58');
    });

    it('should return undefined without heading or title', () => {
      expect(extractCardName(loadDocument('<p>nothing here</p>'))).toBeUndefined();
    });
  });

  describe('extractPriceByGrade', () => {
    it('should read the value under the matching header column and ignore the delta', () => {
      const $ = loadDocument(`
        <table>
          <tr><th>Grade 9</th><th>Ungraded</th></tr>
          <tr><td>$50.00</td><td>$12.34 (+$0.50)</td></tr>
        </table>`);

      expect(extractPriceByGrade($, UNGRADED)).toBe(12.34);
    });

    it('should prefer the header-aligned table over a later two-column table', () => {
      const $ = loadDocument(`
        <table>
          <tr><th>Ungraded</th><th>PSA 10</th></tr>
          <tr><td>$10.00</td><td>$99.00</td></tr>
        </table>
        <table>
          <tr><td>Ungraded</td><td>$20.00</td></tr>
          <tr><td>PSA 10</td><td>$200.00</td></tr>
        </table>`);

      expect(extractPriceByGrade($, UNGRADED)).toBe(10);
      expect(extractPriceByGrade($, PSA_10)).toBe(99);
    });

    it('should fall back to a two-column grade table', () => {
      const $ = loadDocument(`
        <table>
          <tr><td>Ungraded</td><td>$1,234.56</td></tr>
          <tr><td>PSA 10</td><td>$2,000.00</td></tr>
        </table>`);

      expect(extractPriceByGrade($, UNGRADED)).toBe(1234.56);
      expect(extractPriceByGrade($, PSA_10)).toBe(2000);
    });

    it('should require an exact grade label in the two-column table', () => {
      const $ = loadDocument('<table><tr><td>Ungraded Price</td><td>$5.00</td></tr></table>');
      expect(extractPriceByGrade($, UNGRADED)).toBeUndefined();
    });

    it('should compare grade labels on trimmed text without collapsing inner whitespace', () => {
      const padded = loadDocument('<table><tr><td>\n  PSA 10 \n</td><td>$7.00</td></tr></table>');
      const split = loadDocument('<table><tr><td>PSA\n   10</td><td>$7.00</td></tr></table>');

      expect(extractPriceByGrade(padded, PSA_10)).toBe(7);
      expect(extractPriceByGrade(split, PSA_10)).toBeUndefined();
    });

    it('should treat a dash in the grade table as no price', () => {
      const $ = loadDocument('<table><tr><td>PSA 10</td><td>-</td></tr></table>');
      expect(extractPriceByGrade($, PSA_10)).toBeUndefined();
    });

    it('should use price spans when no table matches', () => {
      const $ = loadDocument(`
        <div><span class="price js-price">$9.99</span></div>
        <div>PSA 10 <span class="js-price">$88.00</span></div>`);

      expect(extractPriceByGrade($, UNGRADED)).toBe(9.99);
      expect(extractPriceByGrade($, PSA_10)).toBe(88);
    });

    it('should not guess a PSA 10 span without a PSA 10 label nearby', () => {
      const $ = loadDocument('<div><span class="price">$9.99</span></div><div>Grade 9 <span class="price">$50.00</span></div>');
      expect(extractPriceByGrade($, PSA_10)).toBeUndefined();
    });

    it('should return undefined when nothing matches', () => {
      expect(extractPriceByGrade(loadDocument('<h1>Card</h1>'), UNGRADED)).toBeUndefined();
    });
  });

  describe('extractCard', () => {
    it('should extract name and both prices from a product page', () => {
      expect(extractCard(loadDocument(fixture))).toEqual({
        ok: true,
        card: {
          cardName: 'Latias ex #239',
          ungradedPrice: 146.64,
          psa10Price: 420,
        },
      });
    });

    it('should succeed with absent prices', () => {
      expect(extractCard(loadDocument('<h1>Mew #151</h1>'))).toEqual({
        ok: true,
        card: { cardName: 'Mew #151', ungradedPrice: undefined, psa10Price: undefined },
      });
    });

    it('should fail without heading or title even when price tables exist', () => {
      const $ = loadDocument(`
        <table>
          <tr><th>Ungraded</th><th>PSA 10</th></tr>
          <tr><td>$10.00</td><td>$99.00</td></tr>
        </table>`);

      expect(extractCard($)).toEqual({ ok: false, error: 'name not found' });
    });
  });
});
