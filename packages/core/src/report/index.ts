export {
  formatComparisonLine,
  formatAggregateLine,
  formatTotalsLine,
  formatReportFooter,
  buildReportMessage,
} from './reporter.js';
