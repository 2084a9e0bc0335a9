import { EmptyDistributionError, PercentileRangeError } from '../errors.js';
import { compareHypotheses, type Comparator, type Hypothesis } from './hypothesis.js';

/**
 * Cumulative weights over events in sorted order, built from a snapshot of
 * a weighted map. Frozen after construction; later changes to the source
 * map do not reach it.
 *
 * Probabilities are in the source's weight units, so for an unnormalized
 * source percentile() takes values in [0, total].
 */
export class CumulativeDistribution<H extends Hypothesis = Hypothesis> {
    readonly events: readonly H[];
    readonly cumulative: readonly number[];
    private readonly comparator: Comparator<H>;

    constructor(source: Iterable<readonly [H, number]>, comparator: Comparator<H> = compareHypotheses) {
        // Array.prototype.sort is stable, so equal events keep source order
        const pairs = Array.from(source, ([event, weight]): [H, number] => [event, weight])
            .sort((a, b) => comparator(a[0], b[0]));
        if (pairs.length === 0) throw new EmptyDistributionError('build a cumulative distribution from');

        const cumulative: number[] = [];
        let running = 0;
        for (const [, weight] of pairs) {
            running += weight;
            cumulative.push(running);
        }

        this.events = Object.freeze(pairs.map(([event]) => event));
        this.cumulative = Object.freeze(cumulative);
        this.comparator = comparator;
        Object.freeze(this);
    }

    get size(): number {
        return this.events.length;
    }

    get total(): number {
        return this.cumulative[this.cumulative.length - 1];
    }

    /**
     * Index of the event that `probability` falls on. Finds the first
     * cumulative value strictly greater than `probability`; landing exactly
     * on the previous boundary resolves to that previous index.
     */
    floorIndex(probability: number): number {
        const total = this.total;
        if (!(probability >= 0 && probability <= total)) throw new PercentileRangeError(probability, total);

        let lo = 0;
        let hi = this.cumulative.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.cumulative[mid] > probability) {
                hi = mid;
            } else {
                lo = mid + 1;
            }
        }

        if (lo > 0 && this.cumulative[lo - 1] === probability) return lo - 1;
        return lo;
    }

    percentile(probability: number): H {
        return this.events[this.floorIndex(probability)];
    }

    percentiles(...probabilities: number[]): H[] {
        return probabilities.map(probability => this.percentile(probability));
    }

    /**
     * Events bounding the central `percentage` of the mass, e.g. 90 gives the
     * 5th and 95th percentiles.
     */
    credibleInterval(percentage: number = 90): [H, H] {
        if (!(percentage >= 0 && percentage <= 100)) throw new PercentileRangeError(percentage, 100);
        const tail = (100 - percentage) / 200;
        const total = this.total;
        return [this.percentile(total * tail), this.percentile(total * (1 - tail))];
    }

    /** Cumulative weight of every event ordered at or before `event`. */
    cumulativeAt(event: H): number {
        let index = -1;
        for (let i = 0; i < this.events.length; i++) {
            if (this.comparator(this.events[i], event) > 0) break;
            index = i;
        }
        return index < 0 ? 0 : this.cumulative[index];
    }
}
