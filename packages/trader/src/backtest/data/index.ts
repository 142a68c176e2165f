/**
 * Quote Data Loading
 */

export {
  parseQuotesCSV,
  loadQuotesFromCSV,
  loadQuotesFromMultipleCSV,
  type CSVLoadOptions,
  type CSVLoadResult,
} from './csv-loader.js';

export {
  InMemoryQuoteSource,
  createQuoteSource,
  type QuoteSource,
  type QuoteTimestep,
} from './quote-source.js';
