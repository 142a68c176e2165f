/**
 * Performance Analysis
 */

export {
  calculatePerformance,
  calculateMaxDrawdown,
  collapseToDaily,
  buildDailyPnlSeries,
  type DailyPnlPoint,
} from './performance-calculator.js';
