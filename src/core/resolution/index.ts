export { Resolver } from './solver.js';
export { describeResolutionError } from './errors.js';
export { explainFailure } from './explanation.js';
export { Incompatibility, type IncompatibilityCause } from './incompatibility.js';
export { Term } from './term.js';
export { createSolution, solutionsEqual } from './solution.js';
export type { ResolutionError, ResolveOptions, Solution, SolutionEntry } from './types.js';
