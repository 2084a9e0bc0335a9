import { describe, it, expect } from 'vitest';
import { BayesianUpdater, type Likelihood } from './bayesianUpdater.js';
import { LikelihoodNotImplementedError, isDistributionError } from '../errors.js';

describe('BayesianUpdater', () => {
  it('should solve the Monty Hall problem', () => {
    const suite = new BayesianUpdater<string, string>((data, given) => {
      if (given === data) return 0;
      if (given === 'a') return 0.5;
      return 1;
    }, [['a', 1], ['b', 1], ['c', 1]]);

    suite.update('b');

    expect(suite.prob('a')).toBeCloseTo(1 / 3, 9);
    expect(suite.prob('b')).toBe(0);
    expect(suite.prob('c')).toBeCloseTo(2 / 3, 9);
  });

  it('should solve the cookie problem', () => {
    const likelihoods: Record<string, number> = { bowl_1: 0.75, bowl_2: 0.5 };
    const suite = new BayesianUpdater<string, string>(
      (_flavor, bowl) => likelihoods[bowl],
      [['bowl_1', 0.5], ['bowl_2', 0.5]],
    );

    const evidence = suite.update('vanilla');

    expect(evidence).toBeCloseTo(0.625, 12);
    expect(suite.prob('bowl_1')).toBeCloseTo(0.6, 9);
    expect(suite.total()).toBeCloseTo(1, 9);
  });

  it('should fail with a not-implemented error when no likelihood was supplied', () => {
    // what an untyped caller ends up with
    const suite: BayesianUpdater<string, string> = Reflect.construct(BayesianUpdater, [undefined, [['x', 2]]]);

    expect(() => suite.update('blah')).toThrow(LikelihoodNotImplementedError);
    try {
      suite.update('blah');
    } catch (error) {
      expect(isDistributionError(error) && error.kind).toBe('not-implemented');
    }
  });

  it('should call the likelihood once per hypothesis, in map order', () => {
    const calls: [string, string][] = [];
    const suite = new BayesianUpdater<string, string>((data, given) => {
      calls.push([data, given]);
      return 1;
    }, [['c', 1], ['a', 1], ['b', 1]]);

    suite.update('d1');
    suite.update('d2');

    expect(calls).toEqual([
      ['d1', 'c'], ['d1', 'a'], ['d1', 'b'],
      ['d2', 'c'], ['d2', 'a'], ['d2', 'b'],
    ]);
  });

  it('should visit only the hypotheses present when the update started', () => {
    let visited = 0;
    const suite: BayesianUpdater<string, string> = new BayesianUpdater<string, string>((_data, given) => {
      visited++;
      if (given === 'a') suite.set('late', 1);
      return 1;
    }, [['a', 1], ['b', 1]]);

    suite.update('x');

    expect(visited).toBe(2);
    expect(suite.has('late')).toBe(true);
  });

  it('should compose sequential updates like one update with the product likelihood', () => {
    const likelihood: Likelihood<number, number> = (data, given) => Math.exp(-Math.abs(data - given));
    const prior: [number, number][] = [[1, 0.2], [2, 0.3], [3, 0.1], [4, 0.4]];

    const sequential = new BayesianUpdater(likelihood, prior);
    sequential.update(2);
    sequential.update(3.5);

    const joint = new BayesianUpdater<number, [number, number]>(
      ([d1, d2], given) => likelihood(d1, given) * likelihood(d2, given),
      prior,
    );
    joint.update([2, 3.5]);

    for (const [hypothesis, weight] of joint) {
      expect(sequential.prob(hypothesis)).toBeCloseTo(weight, 12);
    }
  });

  it('should apply a data set in order', () => {
    const suite = new BayesianUpdater<number, number>(
      (roll, sides) => (roll > sides ? 0 : 1 / sides),
      [[4, 1], [6, 1], [8, 1]],
    );

    suite.updateSet([5, 3]);

    // 4 is ruled out by the 5; 6 and 8 keep (1/6)^2 : (1/8)^2
    expect(suite.prob(4)).toBe(0);
    expect(suite.prob(6)).toBeCloseTo(16 / 25, 12);
    expect(suite.prob(8)).toBeCloseTo(9 / 25, 12);
  });

  it('should return the current total and keep the weights for an empty data set', () => {
    const suite = new BayesianUpdater<string, string>(() => 0.5, [['a', 1], ['b', 3]]);

    expect(suite.updateSet([])).toBe(4);
    expect(suite.entries()).toEqual([['a', 1], ['b', 3]]);
  });

  it('should return the evidence of the last update', () => {
    const suite = new BayesianUpdater<string, string>(
      (data, given) => (data === given ? 0.5 : 0.25),
      [['a', 0.5], ['b', 0.5]],
    );

    // after 'a' the weights are 2/3 and 1/3, so 'b' gives 2/3 * 0.25 + 1/3 * 0.5
    expect(suite.updateSet(['a', 'b'])).toBeCloseTo(1 / 3, 12);
  });

  it('should copy weights and likelihood independently', () => {
    const suite = new BayesianUpdater<string, string>(
      (data, given) => (data === given ? 1 : 0),
      [['a', 1], ['b', 1]],
    );
    const copy = suite.copy();

    copy.update('a');

    expect(copy).toBeInstanceOf(BayesianUpdater);
    expect(copy.prob('a')).toBe(1);
    expect(copy.prob('b')).toBe(0);
    expect(suite.prob('a')).toBe(1);
    expect(suite.prob('b')).toBe(1);
  });

  it('should leave NaN weights when every likelihood is zero', () => {
    const suite = new BayesianUpdater<string, string>(() => 0, [['a', 1], ['b', 1]]);

    expect(suite.update('x')).toBe(0);
    expect(suite.weights().every(weight => Number.isNaN(weight))).toBe(true);
  });
});
