export { WeightedMap, addIndependent, type WeightedEntry } from './weightedMap.js';
export { BayesianUpdater, type Likelihood } from './bayesianUpdater.js';
export { CumulativeDistribution } from './cumulativeDistribution.js';
export { compareHypotheses, hypothesisKey, isNumericHypothesis, type Comparator, type Hypothesis } from './hypothesis.js';
export { defaultRandom, mulberry32, type RandomSource } from './random.js';
