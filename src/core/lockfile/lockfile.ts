import * as yaml from 'js-yaml';
import * as semver from 'semver';
import type { PackageBinding, PackageIdentity, RequirementKind, Result } from '../../types/index.js';
import { LOCKFILE_FORMAT_VERSION, LOCKFILE_HEADER } from '../../constants/index.js';
import { exists, readTextFile, writeTextFileAtomic } from '../../utils/fs.js';
import { compareIdentities, normalizeIdentity } from '../../utils/package-identity.js';
import { logger } from '../../utils/logger.js';
import { createSolution } from '../resolution/solution.js';
import type { Solution } from '../resolution/types.js';

/** What a pin records. Path bindings are never pinned. */
export type PinState = Exclude<PackageBinding, { kind: 'path' }>;

export interface Pin {
  identity: PackageIdentity;
  requirementKind: Exclude<RequirementKind, 'path'>;
  state: PinState;
}

export interface Lockfile {
  version: typeof LOCKFILE_FORMAT_VERSION;
  /** Sorted by identity */
  pins: Pin[];
}

export interface LockfileError {
  kind: 'invalid-lockfile';
  message: string;
}

const PIN_KINDS: readonly Pin['requirementKind'][] = ['exact', 'range', 'branch', 'revision'];

export function createLockfile(pins: Pin[]): Lockfile {
  return {
    version: LOCKFILE_FORMAT_VERSION,
    pins: [...pins].sort((a, b) => compareIdentities(a.identity, b.identity))
  };
}

export function lockfileFromSolution(solution: Solution): Lockfile {
  const pins: Pin[] = [];
  for (const { identity, binding, requirementKind } of solution.packages) {
    if (binding.kind === 'path' || requirementKind === 'path') continue;
    pins.push({ identity, requirementKind, state: binding });
  }
  return createLockfile(pins);
}

export function solutionFromLockfile(lockfile: Lockfile): Solution {
  return createSolution(lockfile.pins.map(pin => ({
    identity: pin.identity,
    binding: pin.state,
    requirementKind: pin.requirementKind
  })));
}

/**
 * Render a lockfile. Keys are written in a fixed order so the same
 * lockfile always produces the same bytes.
 */
export function serializeLockfile(lockfile: Lockfile): string {
  const pins = createLockfile(lockfile.pins).pins.map(pin => {
    const entry: Record<string, string> = { identity: pin.identity, kind: pin.requirementKind };
    switch (pin.state.kind) {
      case 'version':
        entry.version = pin.state.version;
        break;
      case 'branch':
        entry.branch = pin.state.branch;
        entry.revision = pin.state.revision;
        break;
      case 'revision':
        entry.revision = pin.state.revision;
        break;
    }
    return entry;
  });

  const body = yaml.dump(
    { version: lockfile.version, pins },
    { lineWidth: 120, sortKeys: false, noRefs: true }
  );
  return `${LOCKFILE_HEADER}\n\n${body}`;
}

function invalid(message: string): { success: false; error: LockfileError } {
  return { success: false, error: { kind: 'invalid-lockfile', message } };
}

function stringField(entry: Record<string, unknown>, field: string): string | undefined {
  const value = entry[field];
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

function parsePin(entry: unknown, index: number): Result<Pin, LockfileError> {
  if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
    return invalid(`pins[${index}] must be a map`);
  }
  const record: Record<string, unknown> = { ...entry };
  const rawIdentity = stringField(record, 'identity');
  const kind = PIN_KINDS.find(candidate => candidate === record.kind);
  if (!rawIdentity || !kind) {
    return invalid(`pins[${index}] needs an identity and a kind (${PIN_KINDS.join(', ')})`);
  }
  const identity = normalizeIdentity(rawIdentity);

  if (kind === 'exact' || kind === 'range') {
    const version = stringField(record, 'version');
    if (!version || semver.valid(version) !== version) {
      return invalid(`pin '${identity}' has no valid version`);
    }
    return { success: true, data: { identity, requirementKind: kind, state: { kind: 'version', version } } };
  }

  const revision = stringField(record, 'revision');
  if (!revision) {
    return invalid(`pin '${identity}' has no revision`);
  }
  if (kind === 'revision') {
    return { success: true, data: { identity, requirementKind: kind, state: { kind: 'revision', revision } } };
  }
  const branch = stringField(record, 'branch');
  if (!branch) {
    return invalid(`pin '${identity}' has no branch`);
  }
  return { success: true, data: { identity, requirementKind: kind, state: { kind: 'branch', branch, revision } } };
}

export function parseLockfile(content: string): Result<Lockfile, LockfileError> {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    return invalid(error instanceof yaml.YAMLException ? error.reason : String(error));
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return invalid('lockfile must be a map');
  }

  const record: Record<string, unknown> = { ...parsed };
  if (record.version !== LOCKFILE_FORMAT_VERSION) {
    return invalid(`unsupported lockfile version ${String(record.version)}`);
  }
  const rawPins = record.pins ?? [];
  if (!Array.isArray(rawPins)) {
    return invalid('pins must be a list');
  }

  const pins: Pin[] = [];
  const seen = new Set<PackageIdentity>();
  for (const [index, entry] of rawPins.entries()) {
    let pin: Result<Pin, LockfileError>;
    try {
      pin = parsePin(entry, index);
    } catch (error) {
      return invalid(`pins[${index}]: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!pin.success) return pin;
    if (seen.has(pin.data.identity)) {
      return invalid(`duplicate pin for '${pin.data.identity}'`);
    }
    seen.add(pin.data.identity);
    pins.push(pin.data);
  }

  return { success: true, data: createLockfile(pins) };
}

/**
 * Read a lockfile. A missing file is no lockfile; an unreadable or invalid
 * one is logged and treated the same way.
 */
export async function readLockfile(lockfilePath: string): Promise<Lockfile | undefined> {
  if (!(await exists(lockfilePath))) {
    return undefined;
  }
  try {
    const parsed = parseLockfile(await readTextFile(lockfilePath));
    if (!parsed.success) {
      logger.warn(`Ignoring invalid lockfile at ${lockfilePath}: ${parsed.error.message}`);
      return undefined;
    }
    return parsed.data;
  } catch (error) {
    logger.warn(`Failed to read lockfile at ${lockfilePath}: ${error}`);
    return undefined;
  }
}

export async function writeLockfile(lockfilePath: string, lockfile: Lockfile): Promise<void> {
  await writeTextFileAtomic(lockfilePath, serializeLockfile(lockfile));
  logger.debug(`Wrote lockfile with ${lockfile.pins.length} pin(s) to ${lockfilePath}`);
}
