import fs from 'fs';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const CsvRecords = z.array(z.record(z.string()));

/**
 * Reads one column of a headed CSV file. Values are returned in file order,
 * trimmed, blanks included; a missing column is a ConfigurationError naming
 * the columns that do exist.
 */
export function readCsvColumn(filePath: string, column: string): string[] {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Input file does not exist: ${filePath}`);
  }

  const text = fs.readFileSync(filePath, 'utf8');
  let header: string[] = [];

  const records = CsvRecords.parse(
    parse(text, {
      bom: true,
      columns: (firstLine: string[]) => {
        header = firstLine;
        return firstLine;
      },
      skip_empty_lines: true,
      relax_column_count: true,
    }),
  );

  if (!header.includes(column)) {
    throw new ConfigurationError(`Column '${column}' not found. Available columns: ${header.join(', ')}`);
  }

  return records.map((record) => (record[column] ?? '').trim());
}

export function toCsvLine(fields: ReadonlyArray<string | number | null | undefined>): string {
  return fields
    .map((v) => {
      const s = String(v ?? '');
      if (s.includes('"') || s.includes(',') || s.includes('\n') || s.includes('\r')) {
        return '"' + s.replace(/"/g, '""') + '"';
      }
      return s;
    })
    .join(',');
}

export function writeCsv<T extends object, K extends keyof T & string>(
  filePath: string,
  columns: readonly K[],
  rows: readonly T[],
): void {
  const lines = [toCsvLine(columns)].concat(
    rows.map((row) => toCsvLine(columns.map((column) => String(row[column] ?? '')))),
  );
  fs.writeFileSync(filePath, lines.join('\n') + '\n', 'utf8');
}
