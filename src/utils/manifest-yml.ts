import * as yaml from 'js-yaml';
import type {
  DependencyCondition,
  DependencyDeclaration,
  PackageManifest,
  ProductDescription,
  ProductKind,
  TargetDependency,
  TargetDescription,
  TargetKind
} from '../types/index.js';
import { parseRequirement } from '../core/requirement.js';
import { identityFromDeclaration, normalizeIdentity } from './package-identity.js';
import { InvalidManifestError, ValidationError } from './errors.js';
import { readTextFile } from './fs.js';

/**
 * graphpin.yml parsing.
 *
 * ```yaml
 * name: app
 * platforms:
 *   macos: "12.0"
 * dependencies:
 *   - name: core
 *     version: ^1.2.0
 *   - url: https://example.com/org/Utils.git
 *     branch: main
 * targets:
 *   - name: App
 *     type: executable
 *     dependencies:
 *       - AppSupport
 *       - product: Core
 *         package: core
 *         condition:
 *           platforms: [linux]
 * products:
 *   - name: App
 *     type: executable
 *     targets: [App]
 * ```
 */

const TARGET_KINDS: readonly TargetKind[] = ['regular', 'executable', 'test', 'plugin'];
const PRODUCT_KINDS: readonly ProductKind[] = ['library', 'executable'];

type YamlRecord = Record<string, unknown>;

function isRecord(value: unknown): value is YamlRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalList(value: unknown, field: string): unknown[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value)) {
    throw new ValidationError(`'${field}' must be a list`);
  }
  return value;
}

function requiredString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`'${field}' must be a non-empty string`);
  }
  return value.trim();
}

function optionalString(value: unknown, field: string): string | undefined {
  return value === undefined ? undefined : requiredString(value, field);
}

function parseKind<K extends string>(value: unknown, allowed: readonly K[], fallback: K, field: string): K {
  if (value === undefined) return fallback;
  const match = allowed.find(kind => kind === value);
  if (!match) {
    throw new ValidationError(`'${field}' must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

function parsePlatforms(value: unknown): Record<string, string> {
  if (value === undefined || value === null) return {};
  if (!isRecord(value)) {
    throw new ValidationError(`'platforms' must be a map of platform to minimum version`);
  }
  const platforms: Record<string, string> = {};
  for (const [platform, minimum] of Object.entries(value)) {
    // YAML reads an unquoted 12.0 as a number
    if (typeof minimum !== 'string' && typeof minimum !== 'number') {
      throw new ValidationError(`platform '${platform}' needs a minimum version`);
    }
    platforms[platform.toLowerCase()] = String(minimum);
  }
  return platforms;
}

function parseDependency(entry: unknown, index: number): DependencyDeclaration {
  if (!isRecord(entry)) {
    throw new ValidationError(`dependencies[${index}] must be a map`);
  }
  const identity = identityFromDeclaration({
    name: optionalString(entry.name, `dependencies[${index}].name`),
    url: optionalString(entry.url, `dependencies[${index}].url`),
    path: typeof entry.path === 'string' ? entry.path : undefined
  });
  try {
    return { identity, requirement: parseRequirement(entry) };
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new ValidationError(`dependency '${identity}': ${error.reason}`);
    }
    throw error;
  }
}

function parseCondition(value: unknown, field: string): DependencyCondition | undefined {
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ValidationError(`'${field}' must be a map`);
  }
  const platforms = optionalList(value.platforms, `${field}.platforms`)
    .map((platform, i) => requiredString(platform, `${field}.platforms[${i}]`).toLowerCase());
  return { platforms };
}

function parseTargetDependency(entry: unknown, field: string): TargetDependency {
  if (typeof entry === 'string') {
    return { kind: 'by-name', name: requiredString(entry, field) };
  }
  if (!isRecord(entry)) {
    throw new ValidationError(`'${field}' must be a name or a map`);
  }
  const condition = parseCondition(entry.condition, `${field}.condition`);
  if (entry.product !== undefined) {
    return {
      kind: 'product',
      name: requiredString(entry.product, `${field}.product`),
      package: normalizeIdentity(requiredString(entry.package, `${field}.package`)),
      condition
    };
  }
  if (entry.target !== undefined) {
    return { kind: 'target', name: requiredString(entry.target, `${field}.target`), condition };
  }
  return { kind: 'by-name', name: requiredString(entry.name, `${field}.name`), condition };
}

function parseTarget(entry: unknown, index: number): TargetDescription {
  const field = `targets[${index}]`;
  if (!isRecord(entry)) {
    throw new ValidationError(`'${field}' must be a map`);
  }
  return {
    name: requiredString(entry.name, `${field}.name`),
    kind: parseKind(entry.type, TARGET_KINDS, 'regular', `${field}.type`),
    dependencies: optionalList(entry.dependencies, `${field}.dependencies`)
      .map((dependency, i) => parseTargetDependency(dependency, `${field}.dependencies[${i}]`))
  };
}

function parseProduct(entry: unknown, index: number): ProductDescription {
  const field = `products[${index}]`;
  if (!isRecord(entry)) {
    throw new ValidationError(`'${field}' must be a map`);
  }
  const targets = optionalList(entry.targets, `${field}.targets`)
    .map((target, i) => requiredString(target, `${field}.targets[${i}]`));
  if (targets.length === 0) {
    throw new ValidationError(`'${field}' must expose at least one target`);
  }
  return {
    name: requiredString(entry.name, `${field}.name`),
    kind: parseKind(entry.type, PRODUCT_KINDS, 'library', `${field}.type`),
    targets
  };
}

/**
 * Parse graphpin.yml content
 *
 * @param source - file path or description used in error messages
 * @throws InvalidManifestError
 */
export function parseManifestText(content: string, source: string): PackageManifest {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.reason : String(error);
    throw new InvalidManifestError(source, `YAML syntax error: ${reason}`);
  }

  try {
    if (!isRecord(parsed)) {
      throw new ValidationError('manifest must be a map');
    }
    const name = requiredString(parsed.name, 'name');
    return {
      identity: normalizeIdentity(name),
      name,
      platforms: parsePlatforms(parsed.platforms),
      dependencies: optionalList(parsed.dependencies, 'dependencies').map(parseDependency),
      targets: optionalList(parsed.targets, 'targets').map(parseTarget),
      products: optionalList(parsed.products, 'products').map(parseProduct),
      replaces: optionalList(parsed.replaces, 'replaces')
        .map((entry, i) => normalizeIdentity(requiredString(entry, `replaces[${i}]`)))
    };
  } catch (error) {
    if (error instanceof ValidationError) {
      throw new InvalidManifestError(source, error.reason);
    }
    throw error;
  }
}

/**
 * Read and parse a graphpin.yml file
 */
export async function parseManifestFile(manifestPath: string): Promise<PackageManifest> {
  const content = await readTextFile(manifestPath);
  return parseManifestText(content, manifestPath);
}
