import { EmptyDistributionError, DistributionRangeError, NonNumericHypothesisError } from '../errors.js';
import { createLogger } from '../logger.js';
import { CumulativeDistribution } from './cumulativeDistribution.js';
import { compareHypotheses, hypothesisKey, isNumericHypothesis, type Comparator, type Hypothesis } from './hypothesis.js';
import { defaultRandom, type RandomSource } from './random.js';

const logger = createLogger(import.meta.url);

export type WeightedEntry<H> = readonly [H, number];

interface Slot<H> {
    hypothesis: H;
    weight: number;
}

/**
 * Mapping from hypothesis to a non-negative weight.
 *
 * Weights only sum to one right after normalize(). Entries keep insertion
 * order, which is the order sample() and update() walk them in.
 */
export class WeightedMap<H extends Hypothesis = Hypothesis> implements Iterable<[H, number]> {
    private readonly slots = new Map<string, Slot<H>>();

    constructor(entries?: Iterable<WeightedEntry<H>>) {
        if (entries) {
            for (const [hypothesis, weight] of entries) this.set(hypothesis, weight);
        }
    }

    static fromKeys<H extends Hypothesis>(hypotheses: Iterable<H>, weight: number = 1): WeightedMap<H> {
        const map = new WeightedMap<H>();
        for (const hypothesis of hypotheses) map.set(hypothesis, weight);
        return map;
    }

    get size(): number {
        return this.slots.size;
    }

    has(hypothesis: H): boolean {
        return this.slots.has(hypothesisKey(hypothesis));
    }

    get(hypothesis: H): number | undefined {
        return this.slots.get(hypothesisKey(hypothesis))?.weight;
    }

    // 0 for hypotheses that were never added
    prob(hypothesis: H): number {
        return this.get(hypothesis) ?? 0;
    }

    set(hypothesis: H, weight: number): this {
        const key = hypothesisKey(hypothesis);
        const slot = this.slots.get(key);
        if (slot) {
            slot.weight = weight;
        } else {
            this.slots.set(key, { hypothesis, weight });
        }
        return this;
    }

    incr(hypothesis: H, term: number = 1): this {
        return this.set(hypothesis, this.prob(hypothesis) + term);
    }

    mult(hypothesis: H, factor: number): this {
        return this.set(hypothesis, this.prob(hypothesis) * factor);
    }

    delete(hypothesis: H): boolean {
        return this.slots.delete(hypothesisKey(hypothesis));
    }

    clear(): void {
        this.slots.clear();
    }

    hypotheses(): H[] {
        return Array.from(this.slots.values(), slot => slot.hypothesis);
    }

    weights(): number[] {
        return Array.from(this.slots.values(), slot => slot.weight);
    }

    entries(): [H, number][] {
        return Array.from(this.slots.values(), (slot): [H, number] => [slot.hypothesis, slot.weight]);
    }

    *[Symbol.iterator](): Iterator<[H, number]> {
        for (const slot of this.slots.values()) yield [slot.hypothesis, slot.weight];
    }

    /** Independent map with the same entries. */
    copy(): WeightedMap<H> {
        return new WeightedMap(this);
    }

    total(): number {
        let sum = 0;
        for (const slot of this.slots.values()) sum += slot.weight;
        return sum;
    }

    /**
     * Factor that makes the weights sum to one. Infinity when the total is
     * zero, which is what turns an all-zero map into NaN on normalize().
     */
    normalizer(): number {
        const total = this.total();
        return total > 0 ? 1 / total : Infinity;
    }

    scale(factor: number): void {
        for (const slot of this.slots.values()) slot.weight *= factor;
    }

    /**
     * Rescales so the weights sum to one. An all-zero map comes out with every
     * weight NaN (0 * Infinity); that is the expected result, not an error.
     */
    normalize(): void {
        const factor = this.normalizer();
        if (factor === Infinity && this.size > 0) {
            logger.warn(`Normalizing ${this.size} hypotheses with zero total weight, weights become NaN`);
        }
        this.scale(factor);
    }

    /**
     * Sum of hypothesis * weight over the current weights. Divide by total()
     * for the mean of an unnormalized map.
     */
    expectation(): number {
        let sum = 0;
        for (const { hypothesis, weight } of this.slots.values()) {
            if (!isNumericHypothesis(hypothesis)) {
                throw new NonNumericHypothesisError(hypothesis, 'expectation');
            }
            sum += hypothesis * weight;
        }
        return sum;
    }

    /**
     * Draws one hypothesis with probability proportional to its weight.
     * The map does not need to be normalized. Zero-weight hypotheses are
     * never drawn.
     */
    sample(random: RandomSource = defaultRandom): H {
        const total = this.total();
        if (!(total > 0)) throw new EmptyDistributionError('sample from');

        const threshold = random() * total;
        let running = 0;
        let last: H | undefined;
        for (const { hypothesis, weight } of this.slots.values()) {
            if (!(weight > 0)) continue;
            running += weight;
            last = hypothesis;
            if (running >= threshold) return hypothesis;
        }
        // rounding can leave the running sum just short of the threshold
        if (last !== undefined) return last;
        throw new EmptyDistributionError('sample from');
    }

    /** Hypothesis with the greatest weight; the first one wins a tie. */
    maxLikelihood(): H {
        let best: Slot<H> | undefined;
        for (const slot of this.slots.values()) {
            if (!best || slot.weight > best.weight) best = slot;
        }
        if (!best) throw new EmptyDistributionError('take the mode of');
        return best.hypothesis;
    }

    uniformDist(events: Iterable<H>): void {
        this.clear();
        for (const event of events) this.set(event, 1);
        this.normalize();
    }

    powerLawDist(this: WeightedMap<number>, events: Iterable<number>, alpha: number = 1.0): void {
        // checked in full before the current contents are dropped
        const entries: [number, number][] = [];
        for (const event of events) {
            if (!(event > 0)) throw new DistributionRangeError(`Power law events must be positive, got ${event}`);
            entries.push([event, Math.pow(event, -alpha)]);
        }
        this.clear();
        for (const [event, weight] of entries) this.set(event, weight);
        this.normalize();
    }

    addIndependent(this: WeightedMap<number>, other: WeightedMap<number>): WeightedMap<number> {
        return addIndependent(this, other);
    }

    toCdf(comparator: Comparator<H> = compareHypotheses): CumulativeDistribution<H> {
        return new CumulativeDistribution(this, comparator);
    }

    toJSON(): [H, number][] {
        return this.entries();
    }
}

/**
 * Distribution of a + b for independent a and b. Zero-weight entries on
 * either side are skipped.
 */
export function addIndependent(a: WeightedMap<number>, b: WeightedMap<number>): WeightedMap<number> {
    const left = a.entries().filter(([, weight]) => weight > 0);
    const right = b.entries().filter(([, weight]) => weight > 0);

    const sum = new WeightedMap<number>();
    for (const [x, px] of left) {
        for (const [y, py] of right) {
            sum.incr(x + y, px * py);
        }
    }
    return sum;
}
