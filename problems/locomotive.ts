import { BayesianUpdater } from '../core/bayesianUpdater.js';

export type LocomotivePrior = 'uniform' | 'powerLaw';

export interface LocomotiveOptions {
    prior?: LocomotivePrior;
    alpha?: number;
}

/**
 * Estimates how many locomotives a railroad owns from the serial numbers
 * seen. Hypotheses are fleet sizes 1..upperBound.
 */
export function createLocomotiveProblem(upperBound: number = 1000, options: LocomotiveOptions = {}): BayesianUpdater<number, number> {
    const { prior = 'uniform', alpha = 1.0 } = options;
    const suite = new BayesianUpdater<number, number>((observed, fleetSize) =>
        observed > fleetSize ? 0 : 1 / fleetSize
    );

    const sizes = Array.from({ length: upperBound }, (_, i) => i + 1);
    if (prior === 'powerLaw') {
        suite.powerLawDist(sizes, alpha);
    } else {
        suite.uniformDist(sizes);
    }
    return suite;
}
