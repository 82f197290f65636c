import type { GraphError } from './types.js';

export function describeGraphError(error: GraphError): string {
  switch (error.kind) {
    case 'duplicate-module':
      if (error.packages.length === 1) {
        const names = error.targets.map(reference => `'${reference.target}'`).join(', ');
        return `targets ${names} of '${error.packages[0]}' all compile to module '${error.module}'`;
      }
      return `multiple targets named '${error.module}' in: ${error.packages.join(', ')}`;
    case 'unresolved-product-reference':
      return `product '${error.product}' required by target '${error.target}' in '${error.package}' not found in package '${error.dependency}'`;
    case 'unresolved-target-reference':
      return `target '${error.target}' in '${error.package}' depends on '${error.dependency}', which is neither a target of the package nor a product of its dependencies`;
    case 'dependency-cycle':
      return `cyclic dependency between targets: ${[...error.path, error.path[0]]
        .filter(step => step !== undefined)
        .map(step => `${step.package}/${step.target}`)
        .join(' -> ')}`;
    case 'incompatible-platform':
      return `'${error.package}' supports ${error.platform} ${error.declared} but its dependency '${error.dependency}' requires ${error.platform} ${error.required}`;
    case 'manifest-unavailable':
      return `manifest of '${error.identity}' is unavailable: ${error.message}`;
    case 'provider-error':
      return `failed to query '${error.identity}': ${error.message}`;
    case 'cancelled':
      return 'graph build was cancelled';
  }
}
