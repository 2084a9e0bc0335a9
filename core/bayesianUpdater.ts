import { LikelihoodNotImplementedError } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Hypothesis } from './hypothesis.js';
import { WeightedMap, type WeightedEntry } from './weightedMap.js';

const logger = createLogger(import.meta.url);

/**
 * Probability of the observed data given a hypothesis.
 *
 * May close over external state (e.g. counts that shrink as items are drawn
 * without replacement). update() calls it exactly once per hypothesis.
 */
export type Likelihood<H, D> = (data: D, hypothesis: H) => number;

/**
 * WeightedMap whose weights are revised by Bayes' rule. The likelihood is
 * supplied by the caller at construction.
 */
export class BayesianUpdater<H extends Hypothesis = Hypothesis, D = unknown> extends WeightedMap<H> {
    private readonly likelihoodFn: Likelihood<H, D>;

    constructor(likelihood: Likelihood<H, D>, prior?: Iterable<WeightedEntry<H>>) {
        super(prior);
        this.likelihoodFn = likelihood;
    }

    likelihood(data: D, hypothesis: H): number {
        // untyped callers can still get here without a function
        if (typeof this.likelihoodFn !== 'function') throw new LikelihoodNotImplementedError();
        return this.likelihoodFn(data, hypothesis);
    }

    /**
     * Multiplies each weight by the likelihood of `data` and renormalizes.
     * Hypotheses are visited in map order, one likelihood call each, and the
     * list is fixed before the first call.
     *
     * @returns the total weight before normalizing, i.e. the evidence for
     * `data` relative to the prior's total
     */
    update(data: D): number {
        const hypotheses = this.hypotheses();
        for (const hypothesis of hypotheses) {
            this.mult(hypothesis, this.likelihood(data, hypothesis));
        }
        const evidence = this.total();
        logger.debug(`Updated ${hypotheses.length} hypotheses, evidence ${evidence}`);
        this.normalize();
        return evidence;
    }

    /**
     * Applies update() for each datum in order. Returns the evidence of the
     * last update, or the current total when `dataset` is empty.
     */
    updateSet(dataset: Iterable<D>): number {
        let evidence = this.total();
        for (const data of dataset) evidence = this.update(data);
        return evidence;
    }

    override copy(): BayesianUpdater<H, D> {
        return new BayesianUpdater(this.likelihoodFn, this);
    }
}
