import { EmptyDistributionError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { WeightedMap } from '../core/weightedMap.js';

const logger = createLogger(import.meta.url);

export interface PosteriorSummary {
    total: number;               // weight before normalizing
    mean: number;                // expectation / total
    standardDeviation: number;   // weighted, population form
    mode: number;                // hypothesis with the greatest weight
    median: number;              // 50th percentile
    interval: [number, number];  // central credible interval
}

/**
 * Descriptive statistics of a numeric posterior (mean, std dev, mode, median
 * and credible interval). The map may be unnormalized.
 */
export function summarize(map: WeightedMap<number>, percentage: number = 90): PosteriorSummary {
    const total = map.total();
    if (!(total > 0)) throw new EmptyDistributionError('summarize');

    const mean = map.expectation() / total;

    let squares = 0;
    for (const [hypothesis, weight] of map) {
        squares += weight * Math.pow(hypothesis - mean, 2);
    }
    const standardDeviation = Math.sqrt(squares / total);

    const cdf = map.toCdf();
    const summary: PosteriorSummary = {
        total,
        mean,
        standardDeviation,
        mode: map.maxLikelihood(),
        median: cdf.percentile(total / 2),
        interval: cdf.credibleInterval(percentage),
    };
    logger.debug('Posterior summary', summary);
    return summary;
}
