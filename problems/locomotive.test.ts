import { describe, it, expect } from 'vitest';
import { createLocomotiveProblem } from './locomotive.js';
import { summarize } from '../analysis/summary.js';

describe('locomotive problem', () => {
  it('should estimate the fleet size under a uniform prior', () => {
    const suite = createLocomotiveProblem(1000);
    suite.update(60);

    let count = 0;
    let harmonic = 0;
    for (let n = 60; n <= 1000; n++) {
      count += 1;
      harmonic += 1 / n;
    }

    const { mean, interval, median } = summarize(suite);
    expect(mean).toBeCloseTo(count / harmonic, 6);
    expect(mean).toBeCloseTo(333.42, 2);
    expect(suite.prob(59)).toBe(0);
    expect(interval[0]).toBeGreaterThanOrEqual(60);
    expect(interval[0]).toBeLessThan(median);
    expect(median).toBeLessThan(interval[1]);
    expect(interval[1]).toBeLessThanOrEqual(1000);
  });

  it('should pull the estimate down under a power law prior', () => {
    const suite = createLocomotiveProblem(1000, { prior: 'powerLaw' });
    suite.update(60);

    let first = 0;
    let second = 0;
    for (let n = 60; n <= 1000; n++) {
      first += 1 / n;
      second += 1 / (n * n);
    }

    expect(summarize(suite).mean).toBeCloseTo(first / second, 6);
    expect(summarize(suite).mean).toBeCloseTo(178.55, 2);
  });

  it('should start from the chosen prior', () => {
    const uniform = createLocomotiveProblem(4);
    expect(uniform.entries()).toEqual([[1, 0.25], [2, 0.25], [3, 0.25], [4, 0.25]]);

    const powerLaw = createLocomotiveProblem(2, { prior: 'powerLaw', alpha: 2 });
    expect(powerLaw.prob(1)).toBeCloseTo(0.8, 12);
    expect(powerLaw.prob(2)).toBeCloseTo(0.2, 12);
  });
});
