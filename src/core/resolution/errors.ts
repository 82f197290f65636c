import type { ResolutionError } from './types.js';
import { describeBinding } from '../requirement.js';

/**
 * Carries a ResolutionError out of the solver loop to `resolve`, which
 * returns it as a failed result.
 */
export class ResolutionAbort extends Error {
  constructor(readonly error: ResolutionError) {
    super(`Resolution aborted: ${error.kind}`);
    this.name = 'ResolutionAbort';
  }
}

export function describeResolutionError(error: ResolutionError): string {
  switch (error.kind) {
    case 'version-conflict':
      return error.explanation;
    case 'package-not-found':
      return `Package '${error.identity}' was not found.\n${error.explanation}`;
    case 'no-usable-version': {
      const reasons = error.failures.map(failure => `  ${describeBinding(failure.binding)}: ${failure.message}`);
      return [`No version of '${error.identity}' has a usable manifest:`, ...reasons].join('\n');
    }
    case 'provider-error':
      return `Failed to query '${error.identity}': ${error.message}`;
    case 'cancelled':
      return 'Resolution was cancelled';
  }
}
