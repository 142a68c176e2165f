/**
 * CSV Loader for Backtest Engine
 *
 * Reads daily-bar and tick CSV exports into validated quotes.
 *
 * Bar files:  instrument_id,date,open,high,low,close,volume
 * Tick files: instrument_id,timestamp,price,volume[,bid_price,bid_volume,ask_price,ask_volume,tick_type]
 *
 * Tick timestamps may be ISO-8601 strings or Unix milliseconds.
 */

import * as fs from 'fs';
import { QuoteSchema, toTradingDate, type Quote, type QuoteGranularity } from '@stocksim/shared';

/**
 * CSV parsing options
 */
export interface CSVLoadOptions {
  /** Kind of rows in the file */
  granularity: QuoteGranularity;
  /** Delimiter (default: ',') */
  delimiter?: string;
  /** Skip rows with invalid data instead of throwing (default: true) */
  skipInvalid?: boolean;
  /** Called for every skipped row */
  onInvalidRow?: (lineNumber: number, reason: string) => void;
}

export interface CSVLoadResult {
  quotes: Quote[];
  skipped: number;
}

/**
 * Parse a CSV line handling quoted values
 */
function parseCSVLine(line: string, delimiter: string): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (const char of line) {
    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Get column index from header, -1 when absent
 */
function getColumnIndex(headers: string[], ...names: string[]): number {
  return headers.findIndex((h) => names.includes(h.toLowerCase()));
}

function requireColumn(headers: string[], ...names: string[]): number {
  const index = getColumnIndex(headers, ...names);
  if (index === -1) {
    throw new Error(`Column "${names[0]}" not found in headers: ${headers.join(', ')}`);
  }
  return index;
}

/**
 * Parse a tick timestamp: Unix milliseconds or an ISO-8601 string
 */
function parseTimestamp(value: string): number {
  return /^\d+$/.test(value) ? parseInt(value, 10) : Date.parse(value);
}

function num(cells: string[], index: number): number {
  return index === -1 ? NaN : parseFloat(cells[index] ?? '');
}

/**
 * Parse CSV content into quotes
 */
export function parseQuotesCSV(content: string, options: CSVLoadOptions): CSVLoadResult {
  const delimiter = options.delimiter ?? ',';
  const skipInvalid = options.skipInvalid ?? true;

  const lines = content.split(/\r?\n/).filter((line) => line.trim() !== '');
  const [headerLine, ...rows] = lines;
  if (headerLine === undefined) {
    return { quotes: [], skipped: 0 };
  }

  const headers = parseCSVLine(headerLine, delimiter);
  const idCol = requireColumn(headers, 'instrument_id', 'stock_id', 'code');
  const volumeCol = requireColumn(headers, 'volume');

  const build: (cells: string[]) => unknown =
    options.granularity === 'bar'
      ? buildBarRow(headers, idCol, volumeCol)
      : buildTickRow(headers, idCol, volumeCol);

  const quotes: Quote[] = [];
  let skipped = 0;

  rows.forEach((line, i) => {
    const lineNumber = i + 2;
    const parsed = QuoteSchema.safeParse(build(parseCSVLine(line, delimiter)));

    if (parsed.success) {
      quotes.push(parsed.data);
      return;
    }

    const reason = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join(', ');
    if (!skipInvalid) {
      throw new Error(`Invalid row at line ${lineNumber}: ${reason}`);
    }
    skipped++;
    options.onInvalidRow?.(lineNumber, reason);
  });

  return { quotes, skipped };
}

function buildBarRow(headers: string[], idCol: number, volumeCol: number): (cells: string[]) => unknown {
  const dateCol = requireColumn(headers, 'date');
  const openCol = requireColumn(headers, 'open');
  const highCol = requireColumn(headers, 'high');
  const lowCol = requireColumn(headers, 'low');
  const closeCol = requireColumn(headers, 'close');

  return (cells) => {
    const date = cells[dateCol] ?? '';
    const close = num(cells, closeCol);
    return {
      instrumentId: cells[idCol],
      timestamp: Date.parse(`${date}T00:00:00Z`),
      date,
      granularity: 'bar',
      open: num(cells, openCol),
      high: num(cells, highCol),
      low: num(cells, lowCol),
      close,
      volume: num(cells, volumeCol),
      currentPrice: close,
    };
  };
}

function buildTickRow(headers: string[], idCol: number, volumeCol: number): (cells: string[]) => unknown {
  const timeCol = requireColumn(headers, 'timestamp', 'time');
  const priceCol = requireColumn(headers, 'price', 'close');
  const bidPriceCol = getColumnIndex(headers, 'bid_price');
  const bidVolumeCol = getColumnIndex(headers, 'bid_volume');
  const askPriceCol = getColumnIndex(headers, 'ask_price');
  const askVolumeCol = getColumnIndex(headers, 'ask_volume');
  const tickTypeCol = getColumnIndex(headers, 'tick_type');
  const hasBook = bidPriceCol !== -1 && askPriceCol !== -1;

  return (cells) => {
    const timestamp = parseTimestamp(cells[timeCol] ?? '');
    const price = num(cells, priceCol);
    return {
      instrumentId: cells[idCol],
      timestamp,
      date: Number.isNaN(timestamp) ? '' : toTradingDate(timestamp),
      granularity: 'tick',
      open: price,
      high: price,
      low: price,
      close: price,
      volume: num(cells, volumeCol),
      currentPrice: price,
      tick: hasBook
        ? {
            bidPrice: num(cells, bidPriceCol),
            bidVolume: num(cells, bidVolumeCol),
            askPrice: num(cells, askPriceCol),
            askVolume: num(cells, askVolumeCol),
            tickType: tickTypeCol === -1 ? 0 : parseInt(cells[tickTypeCol] ?? '0', 10),
          }
        : undefined,
    };
  };
}

/**
 * Load quotes from a CSV file
 */
export function loadQuotesFromCSV(filepath: string, options: CSVLoadOptions): CSVLoadResult {
  if (!fs.existsSync(filepath)) {
    throw new Error(`File not found: ${filepath}`);
  }
  return parseQuotesCSV(fs.readFileSync(filepath, 'utf-8'), options);
}

/**
 * Load several CSV files and concatenate their quotes
 */
export function loadQuotesFromMultipleCSV(filepaths: string[], options: CSVLoadOptions): CSVLoadResult {
  return filepaths.reduce<CSVLoadResult>(
    (acc, filepath) => {
      const result = loadQuotesFromCSV(filepath, options);
      return { quotes: acc.quotes.concat(result.quotes), skipped: acc.skipped + result.skipped };
    },
    { quotes: [], skipped: 0 }
  );
}
