/**
 * Manifest and requirement model shared by the resolver, the graph builder
 * and the providers.
 */

import type { VersionSet } from '../core/version-set.js';

/** Case-normalized package key, see utils/package-identity.ts */
export type PackageIdentity = string;

// Requirement types

export interface ExactRequirement {
  kind: 'exact';
  version: string;
}

export interface RangeRequirement {
  kind: 'range';
  versions: VersionSet;
}

export interface BranchRequirement {
  kind: 'branch';
  branch: string;
}

export interface RevisionRequirement {
  kind: 'revision';
  revision: string;
}

export interface PathRequirement {
  kind: 'path';
  path: string;
}

export type Requirement =
  | ExactRequirement
  | RangeRequirement
  | BranchRequirement
  | RevisionRequirement
  | PathRequirement;

export type VersionedRequirement = ExactRequirement | RangeRequirement;
export type UnversionedRequirement = BranchRequirement | RevisionRequirement | PathRequirement;

export type RequirementKind = Requirement['kind'];

export interface DependencyDeclaration {
  identity: PackageIdentity;
  requirement: Requirement;
}

// Bindings: what a package identity resolved to

export type PackageBinding =
  | { kind: 'version'; version: string }
  | { kind: 'branch'; branch: string; revision: string }
  | { kind: 'revision'; revision: string }
  | { kind: 'path'; path: string };

// Targets and products

export interface DependencyCondition {
  /** Platforms the dependency applies to; empty means all */
  platforms: string[];
}

export type TargetDependency =
  | { kind: 'target'; name: string; condition?: DependencyCondition }
  | { kind: 'product'; name: string; package: PackageIdentity; condition?: DependencyCondition }
  | { kind: 'by-name'; name: string; condition?: DependencyCondition };

export type TargetKind = 'regular' | 'executable' | 'test' | 'plugin';

export interface TargetDescription {
  name: string;
  kind: TargetKind;
  dependencies: TargetDependency[];
}

export type ProductKind = 'library' | 'executable';

export interface ProductDescription {
  name: string;
  kind: ProductKind;
  targets: string[];
}

export interface PackageManifest {
  identity: PackageIdentity;
  /** Display name as written in the manifest */
  name: string;
  /** Minimum supported version per platform, e.g. { macos: '12.0' } */
  platforms: Record<string, string>;
  dependencies: DependencyDeclaration[];
  targets: TargetDescription[];
  products: ProductDescription[];
  /** Identities this package stands in for when both are resolved */
  replaces: PackageIdentity[];
}
