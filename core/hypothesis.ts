/**
 * A value whose plausibility is tracked by a weight: a number, a string,
 * or a tuple of hypotheses.
 */
export type Hypothesis = number | string | readonly Hypothesis[];

export type Comparator<H> = (a: H, b: H) => number;

/**
 * Identity key used to store a hypothesis in a Map. Tuples compare by
 * value, and `1` and `"1"` stay distinct.
 */
export function hypothesisKey(hypothesis: Hypothesis): string {
    if (typeof hypothesis === 'number') return String(hypothesis);
    if (typeof hypothesis === 'string') return JSON.stringify(hypothesis);
    return `[${hypothesis.map(hypothesisKey).join(',')}]`;
}

function rank(hypothesis: Hypothesis): number {
    if (typeof hypothesis === 'number') return 0;
    if (typeof hypothesis === 'string') return 1;
    return 2;
}

/**
 * Natural order: numbers ascending, then strings, then tuples element by
 * element (a shorter prefix sorts first).
 */
export function compareHypotheses(a: Hypothesis, b: Hypothesis): number {
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a !== 'object' || typeof b !== 'object') return rank(a) - rank(b);

    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const order = compareHypotheses(a[i], b[i]);
        if (order !== 0) return order;
    }
    return a.length - b.length;
}

export function isNumericHypothesis(hypothesis: Hypothesis): hypothesis is number {
    return typeof hypothesis === 'number';
}
