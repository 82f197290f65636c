import { isAbsolute, join } from 'path';
import * as semver from 'semver';
import { VersionSet } from './version-set.js';
import { ValidationError } from '../utils/errors.js';
import type {
  PackageBinding,
  Requirement,
  UnversionedRequirement,
  VersionedRequirement
} from '../types/index.js';

/**
 * Requirement helpers: conversion to version sets, binding checks and display.
 */

export function isVersioned(requirement: Requirement): requirement is VersionedRequirement {
  return requirement.kind === 'exact' || requirement.kind === 'range';
}

export function isUnversioned(requirement: Requirement): requirement is UnversionedRequirement {
  return !isVersioned(requirement);
}

export function requirementToVersionSet(requirement: VersionedRequirement): VersionSet {
  return requirement.kind === 'exact'
    ? VersionSet.exact(requirement.version)
    : requirement.versions;
}

export function describeRequirement(requirement: Requirement): string {
  switch (requirement.kind) {
    case 'exact':
      return requirement.version;
    case 'range':
      return requirement.versions.toString();
    case 'branch':
      return `branch ${requirement.branch}`;
    case 'revision':
      return `revision ${requirement.revision}`;
    case 'path':
      return `path ${requirement.path}`;
  }
}

/**
 * Whether a resolved binding still meets a requirement. A branch binding
 * meets a branch requirement by name; the pinned revision is what keeps it
 * reproducible.
 */
export function bindingSatisfies(binding: PackageBinding, requirement: Requirement): boolean {
  switch (requirement.kind) {
    case 'exact':
    case 'range':
      return binding.kind === 'version' && requirementToVersionSet(requirement).contains(binding.version);
    case 'branch':
      return binding.kind === 'branch' && binding.branch === requirement.branch;
    case 'revision':
      return binding.kind === 'revision' && binding.revision === requirement.revision;
    case 'path':
      return binding.kind === 'path' && binding.path === requirement.path;
  }
}

/** Stable key used to memoize manifest queries */
export function bindingKey(binding: PackageBinding): string {
  switch (binding.kind) {
    case 'version':
      return `version:${binding.version}`;
    case 'branch':
      return `branch:${binding.branch}@${binding.revision}`;
    case 'revision':
      return `revision:${binding.revision}`;
    case 'path':
      return `path:${binding.path}`;
  }
}

export function describeBinding(binding: PackageBinding): string {
  switch (binding.kind) {
    case 'version':
      return binding.version;
    case 'branch':
      return `${binding.branch} (${binding.revision})`;
    case 'revision':
      return binding.revision;
    case 'path':
      return binding.path;
  }
}

/** Location of a path requirement declared by the package at `parentPath` */
export function nestedPath(parentPath: string, path: string): string {
  return isAbsolute(path) ? path : join(parentPath, path);
}

/**
 * Raw requirement fields as they appear in a manifest dependency entry
 */
export interface RequirementFields {
  version?: unknown;
  exact?: unknown;
  branch?: unknown;
  revision?: unknown;
  path?: unknown;
}

const SOURCE_FIELDS = ['version', 'exact', 'branch', 'revision', 'path'] as const;

function requireString(field: string, value: unknown): string {
  if (typeof value !== 'string' || value.trim().length === 0) {
    throw new ValidationError(`'${field}' must be a non-empty string`);
  }
  return value.trim();
}

/**
 * Parse the requirement of one dependency entry. Exactly one of
 * version, exact, branch, revision or path must be present.
 */
export function parseRequirement(fields: RequirementFields): Requirement {
  const present = SOURCE_FIELDS.filter(field => fields[field] !== undefined);
  if (present.length !== 1) {
    throw new ValidationError(
      present.length === 0
        ? `dependency needs one of: ${SOURCE_FIELDS.join(', ')}`
        : `dependency has conflicting requirement fields: ${present.join(', ')}`
    );
  }

  switch (present[0]) {
    case 'version': {
      const range = requireString('version', fields.version);
      const versions = VersionSet.fromRange(range);
      if (!versions) {
        throw new ValidationError(`invalid version range '${range}'`);
      }
      const single = versions.singleVersion();
      return single ? { kind: 'exact', version: single } : { kind: 'range', versions };
    }
    case 'exact': {
      const raw = requireString('exact', fields.exact);
      const version = semver.valid(raw);
      if (!version) {
        throw new ValidationError(`invalid exact version '${raw}'`);
      }
      return { kind: 'exact', version };
    }
    case 'branch':
      return { kind: 'branch', branch: requireString('branch', fields.branch) };
    case 'revision':
      return { kind: 'revision', revision: requireString('revision', fields.revision) };
    default:
      return { kind: 'path', path: requireString('path', fields.path) };
  }
}
