/**
 * Shared types for stocksim
 */

export * from './market.js';
export * from './trade.js';
