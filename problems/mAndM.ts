import { BayesianUpdater } from '../core/bayesianUpdater.js';

export type Bag = 'bag1' | 'bag2';
export type MixHypothesis = 'A' | 'B';
export type MAndMObservation = readonly [Bag, string];

// color percentages per bag mix
const MIX_1994: Record<string, number> = { brown: 30, yellow: 20, red: 20, green: 10, orange: 10, tan: 10 };
const MIX_1996: Record<string, number> = { blue: 24, green: 20, orange: 16, yellow: 14, red: 13, brown: 13 };

// A: bag1 holds the 1994 mix, B: bag1 holds the 1996 mix
const HYPOTHESES: Record<MixHypothesis, Record<Bag, Record<string, number>>> = {
    A: { bag1: MIX_1994, bag2: MIX_1996 },
    B: { bag1: MIX_1996, bag2: MIX_1994 },
};

/**
 * One M&M drawn from each of two bags; which bag is from which year?
 */
export function createMAndMProblem(): BayesianUpdater<MixHypothesis, MAndMObservation> {
    const suite = new BayesianUpdater<MixHypothesis, MAndMObservation>(([bag, color], hypothesis) =>
        HYPOTHESES[hypothesis][bag][color] ?? 0
    );
    suite.uniformDist(['A', 'B']);
    return suite;
}
