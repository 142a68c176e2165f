export * from './quote.schema.js';
export * from './order.schema.js';
