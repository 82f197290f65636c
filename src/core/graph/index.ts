export { PackageGraphBuilder, moduleName } from './graph-builder.js';
export { PackageGraph, targetKey } from './package-graph.js';
export { describeGraphError } from './errors.js';
export type * from './types.js';
