export {
  sum,
  sumBy,
  mean,
  sampleStdDev,
  safeRatio,
  percentChange,
  coefficientOfVariation,
} from './descriptive';
