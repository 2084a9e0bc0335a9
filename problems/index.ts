export { createCookieProblem, createCookieDrawProblem, type BowlContents, type CookieDraw } from './cookie.js';
export { createMontyHall } from './montyHall.js';
export { createDiceProblem, STANDARD_DICE } from './dice.js';
export { createMAndMProblem, type Bag, type MixHypothesis, type MAndMObservation } from './mAndM.js';
export { createLocomotiveProblem, type LocomotiveOptions, type LocomotivePrior } from './locomotive.js';
