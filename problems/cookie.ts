import { BayesianUpdater } from '../core/bayesianUpdater.js';

// flavor -> number of cookies
export type BowlContents = Record<string, number>;

function countCookies(contents: BowlContents): number {
    return Object.values(contents).reduce((acc, v) => acc + v, 0);
}

/**
 * Which bowl did a cookie come from? Draws are with replacement, so the
 * likelihood of a flavor is its share of the bowl. Bowls start equally likely.
 */
export function createCookieProblem(bowls: Record<string, BowlContents>): BayesianUpdater<string, string> {
    const suite = new BayesianUpdater<string, string>((flavor, bowl) => {
        const contents = bowls[bowl] ?? {};
        const total = countCookies(contents);
        return total > 0 ? (contents[flavor] ?? 0) / total : 0;
    });
    suite.uniformDist(Object.keys(bowls));
    return suite;
}

export interface CookieDraw {
    suite: BayesianUpdater<string, string>;
    remaining: Record<string, BowlContents>;
}

/**
 * Same question, drawing without replacement. Each likelihood call takes the
 * drawn cookie out of the hypothesised bowl, so every update() must ask each
 * bowl exactly once. `remaining` is a private copy of the counts.
 */
export function createCookieDrawProblem(bowls: Record<string, BowlContents>): CookieDraw {
    const remaining: Record<string, BowlContents> = {};
    for (const [bowl, contents] of Object.entries(bowls)) {
        remaining[bowl] = { ...contents };
    }

    const suite = new BayesianUpdater<string, string>((flavor, bowl) => {
        const contents = remaining[bowl];
        if (!contents) return 0;
        const total = countCookies(contents);
        const count = contents[flavor] ?? 0;
        if (count > 0) contents[flavor] = count - 1;
        return total > 0 ? count / total : 0;
    });
    suite.uniformDist(Object.keys(bowls));
    return { suite, remaining };
}
