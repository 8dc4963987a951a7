export {
  EMPTY_PERCENTILES,
  computePercentiles,
  median,
  percentile,
} from './percentiles.js';
export { computeThroughput } from './throughput.js';
export {
  OVERWRITE_WAF_WEIGHT,
  WAF_MAX,
  WAF_MIN,
  estimateWriteAmplification,
} from './waf.js';
