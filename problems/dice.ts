import { BayesianUpdater } from '../core/bayesianUpdater.js';

export const STANDARD_DICE: readonly number[] = [4, 6, 8, 12, 20];

/**
 * Which die (by number of sides) produced the rolls seen so far.
 */
export function createDiceProblem(sides: readonly number[] = STANDARD_DICE): BayesianUpdater<number, number> {
    const suite = new BayesianUpdater<number, number>((roll, dieSides) =>
        roll < 1 || roll > dieSides ? 0 : 1 / dieSides
    );
    suite.uniformDist(sides);
    return suite;
}
