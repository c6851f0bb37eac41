export { movingAverage, overviewTotals, summarizeByActivity, summarizeByPeriod } from './engine';
export { filterRecords } from './filter';
export { groupSmallValues, metricTotalsByActivity } from './grouping';
export type { CategoryTotal, MetricTotalsOptions } from './grouping';
export {
  comparePeriodKeys,
  getIsoWeek,
  makePeriodKey,
  nextPeriod,
  parseGranularity,
  periodKeyOf,
  periodRange,
  weeksInIsoYear,
} from './periods';
export { METRIC_NAMES, SummaryBuilder, metricValue, summarize } from './summary';
export { convertDistance } from './units';
