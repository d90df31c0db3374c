// CSV rows -> transactions.
//
// Each row becomes the set of "<column>_<value>" labels of its selected
// columns. Blank cells contribute nothing; rows with no label are dropped.

import Papa from "papaparse";

export type CellValue = string | number | boolean | null | undefined;
export type CsvRow = Record<string, CellValue>;

export function itemLabel(column: string, value: string): string {
  return `${column}_${value}`;
}

export function rowsToTransactions(rows: ReadonlyArray<CsvRow>, columns?: ReadonlyArray<string>): string[][] {
  const out: string[][] = [];
  for (const row of rows) {
    const selected = columns ?? Object.keys(row);
    const labels = new Set<string>();
    for (const column of selected) {
      const cell = row[column];
      if (cell === null || cell === undefined) continue;
      const value = String(cell).trim();
      if (value.length === 0) continue;
      labels.add(itemLabel(column, value));
    }
    if (labels.size > 0) out.push(Array.from(labels));
  }
  return out;
}

/**
 * Parses CSV text with a header row and maps it to transactions.
 * Throws CSV_PARSE_FAILED on malformed input and CSV_UNKNOWN_COLUMN when a
 * requested column is not in the header.
 */
export function parseCsvTransactions(csvText: string, columns?: ReadonlyArray<string>): string[][] {
  const parsed = Papa.parse<Record<string, string>>(csvText, {
    header: true,
    skipEmptyLines: "greedy",
    dynamicTyping: false,
    transformHeader: (h) => h.trim()
  });

  if (parsed.errors.length > 0) {
    const first = parsed.errors[0];
    throw new Error(`CSV_PARSE_FAILED: ${first.message} @ row ${first.row ?? "?"}`);
  }

  const header = parsed.meta.fields ?? [];
  for (const column of columns ?? []) {
    if (!header.includes(column)) throw new Error(`CSV_UNKNOWN_COLUMN: ${column} @ columns`);
  }

  return rowsToTransactions(parsed.data, columns ?? header);
}
