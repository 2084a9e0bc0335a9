import { BayesianUpdater } from '../core/bayesianUpdater.js';

/**
 * Hypotheses are the door hiding the car; data is the door Monty opens.
 * Monty never opens the contestant's door or the car's door and picks at
 * random when he has a choice.
 */
export function createMontyHall(doors: readonly string[] = ['a', 'b', 'c'], chosen: string = 'a'): BayesianUpdater<string, string> {
    const suite = new BayesianUpdater<string, string>((opened, car) => {
        if (car === opened || opened === chosen) return 0;
        // car behind the contestant's door leaves Monty every other door
        if (car === chosen) return 1 / (doors.length - 1);
        return 1 / (doors.length - 2);
    });
    suite.uniformDist(doors);
    return suite;
}
