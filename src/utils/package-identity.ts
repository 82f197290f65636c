import { ValidationError } from './errors.js';
import type { PackageIdentity } from '../types/index.js';

/**
 * Allowed characters of a normalized identity (a-z, 0-9, ., _, -), starting with a letter or digit
 */
export const IDENTITY_REGEX = /^[a-z0-9][a-z0-9._-]*$/;

/**
 * Matches inputs that are locations rather than bare names:
 * URLs (scheme://...), scp-style git remotes (git@host:org/repo) and filesystem paths.
 */
const LOCATION_REGEX = /^[a-z][a-z0-9+.-]*:\/\/|^[^\s@]+@[^\s:]+:|[\\/]/i;

/**
 * Reduce a location to the last component of its path, without a `.git` suffix.
 *   https://example.com/org/Foo.git -> Foo
 *   git@example.com:org/bar.git    -> bar
 *   ../packages/Baz/               -> Baz
 */
function lastLocationComponent(location: string): string {
  const withoutQuery = location.split(/[?#]/, 1)[0] ?? location;
  const segments = withoutQuery.split(/[\\/:]/).filter(segment => segment.length > 0);
  const last = segments[segments.length - 1] ?? '';
  return last.replace(/\.git$/i, '');
}

/**
 * Normalize a package name or location into its identity.
 * Identities are case-insensitive, so two requirements naming `Foo` and
 * `https://host/org/foo.git` refer to the same package.
 *
 * @throws ValidationError if nothing usable remains after normalization
 */
export function normalizeIdentity(nameOrLocation: string): PackageIdentity {
  const trimmed = nameOrLocation.trim();
  if (trimmed.length === 0) {
    throw new ValidationError('Package identity cannot be empty');
  }

  const base = LOCATION_REGEX.test(trimmed) ? lastLocationComponent(trimmed) : trimmed;
  const identity = base.toLowerCase();

  if (!IDENTITY_REGEX.test(identity)) {
    throw new ValidationError(
      `Package identity '${identity}' (from '${nameOrLocation}') contains invalid characters (use only: a-z, 0-9, ., _, -)`
    );
  }

  return identity;
}

/**
 * Derive the identity of a dependency entry. An explicit name wins over the
 * location the dependency is fetched from.
 */
export function identityFromDeclaration(entry: { name?: string; url?: string; path?: string }): PackageIdentity {
  const source = entry.name ?? entry.url ?? entry.path;
  if (source === undefined) {
    throw new ValidationError('Dependency must have a name, url or path');
  }
  return normalizeIdentity(source);
}

/**
 * Total order on identities used wherever output must be deterministic.
 * Plain code-unit comparison, independent of locale.
 */
export function compareIdentities(a: PackageIdentity, b: PackageIdentity): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
