import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { reconcile, describeStaleReason, type StaleReason } from '../../src/core/lockfile/reconcile.js';
import { createLockfile, type Lockfile, type Pin } from '../../src/core/lockfile/lockfile.js';
import type { DependencyDeclaration } from '../../src/types/index.js';
import { dep, FakeRegistry } from '../test-helpers.js';

function versionPin(identity: string, version: string, requirementKind: 'exact' | 'range' = 'range'): Pin {
  return { identity, requirementKind, state: { kind: 'version', version } };
}

function registry(): FakeRegistry {
  return new FakeRegistry()
    .publish('a', '1.0.0', { dependencies: [dep('b', '^1.0.0')] })
    .publish('b', '1.1.0');
}

async function staleReasons(
  source: FakeRegistry,
  requirements: DependencyDeclaration[],
  lockfile: Lockfile
): Promise<StaleReason[]> {
  const result = await reconcile(requirements, lockfile, source.providers);
  assert.ok(result.success);
  assert.equal(result.data.kind, 'stale');
  return result.data.kind === 'stale' ? result.data.reasons : [];
}

describe('reconcile', () => {
  it('reuses a lockfile that still satisfies every requirement without listing versions', async () => {
    const source = registry();
    const lockfile = createLockfile([versionPin('a', '1.0.0'), versionPin('b', '1.1.0')]);

    const result = await reconcile([dep('a', '^1.0.0')], lockfile, source.providers);

    assert.ok(result.success && result.data.kind === 'fresh');
    assert.deepEqual(result.data.solution.packages, [
      { identity: 'a', binding: { kind: 'version', version: '1.0.0' }, requirementKind: 'range' },
      { identity: 'b', binding: { kind: 'version', version: '1.1.0' }, requirementKind: 'range' }
    ]);
    assert.equal(source.totalVersionQueries(), 0);
  });

  it('reports a requirement with no pin', async () => {
    const reasons = await staleReasons(registry(), [dep('a', '^1.0.0')], createLockfile([versionPin('a', '1.0.0')]));

    assert.deepEqual(reasons, [{ kind: 'missing-pin', identity: 'b' }]);
    assert.equal(describeStaleReason(reasons[0]), 'b is required but not pinned');
  });

  it('reports a pin outside the requirement once', async () => {
    const lockfile = createLockfile([versionPin('a', '1.0.0'), versionPin('b', '1.1.0')]);

    const reasons = await staleReasons(registry(), [dep('a', '^2.0.0')], lockfile);

    assert.deepEqual(reasons, [
      { kind: 'unsatisfied-requirement', identity: 'a', requirement: '>=2.0.0 <3.0.0', pinned: '1.0.0' },
      { kind: 'unreachable-pin', identity: 'b' }
    ]);
    assert.equal(describeStaleReason(reasons[0]), 'a is pinned to 1.0.0, which does not satisfy >=2.0.0 <3.0.0');
  });

  it('reports a pinned version that depends on a branch', async () => {
    const source = new FakeRegistry().publish('a', '1.0.0', { dependencies: [dep('x', { branch: 'main' })] });

    const reasons = await staleReasons(source, [dep('a', '^1.0.0')], createLockfile([versionPin('a', '1.0.0')]));

    assert.deepEqual(reasons, [{ kind: 'unversioned-dependency', identity: 'a', dependency: 'x' }]);
  });

  it('reports a requirement that changed from range to exact', async () => {
    const lockfile = createLockfile([versionPin('a', '1.0.0'), versionPin('b', '1.1.0')]);

    const reasons = await staleReasons(registry(), [dep('a', { exact: '1.0.0' })], lockfile);

    assert.deepEqual(reasons, [{ kind: 'requirement-kind-changed', identity: 'a', pinned: 'range', current: 'exact' }]);
  });

  it('reports pins nothing requires any more', async () => {
    const lockfile = createLockfile([versionPin('a', '1.0.0'), versionPin('b', '1.1.0'), versionPin('old', '0.1.0')]);

    const reasons = await staleReasons(registry(), [dep('a', '^1.0.0')], lockfile);

    assert.deepEqual(reasons, [{ kind: 'unreachable-pin', identity: 'old' }]);
  });

  it('reports a pinned manifest the provider cannot read', async () => {
    const lockfile = createLockfile([versionPin('a', '1.0.0'), versionPin('b', '1.0.9')]);

    const reasons = await staleReasons(registry(), [dep('a', '^1.0.0')], lockfile);

    assert.deepEqual(reasons, [{ kind: 'manifest-unavailable', identity: 'b', message: 'no manifest for b@version:1.0.9' }]);
  });

  it('follows a pinned branch through its revision', async () => {
    const source = new FakeRegistry()
      .setBranch('utils', 'main', 'r2')
      .publishRevision('utils', 'r1', { dependencies: [dep('core', '^1.0.0')] })
      .publish('core', '1.0.0');
    const lockfile = createLockfile([
      { identity: 'utils', requirementKind: 'branch', state: { kind: 'branch', branch: 'main', revision: 'r1' } },
      versionPin('core', '1.0.0')
    ]);

    const result = await reconcile([dep('utils', { branch: 'main' })], lockfile, source.providers);

    assert.ok(result.success && result.data.kind === 'fresh');
    assert.deepEqual(result.data.solution.packages, [
      { identity: 'core', binding: { kind: 'version', version: '1.0.0' }, requirementKind: 'range' },
      { identity: 'utils', binding: { kind: 'branch', branch: 'main', revision: 'r1' }, requirementKind: 'branch' }
    ]);
    assert.equal(source.revisionQueries.size, 0);
  });

  it('reports a branch pin for a different branch', async () => {
    const lockfile = createLockfile([
      { identity: 'utils', requirementKind: 'branch', state: { kind: 'branch', branch: 'main', revision: 'r1' } },
      versionPin('core', '1.0.0')
    ]);

    const reasons = await staleReasons(new FakeRegistry(), [dep('utils', { branch: 'dev' })], lockfile);

    assert.deepEqual(reasons, [
      { kind: 'unsatisfied-requirement', identity: 'utils', requirement: 'branch dev', pinned: 'main (r1)' },
      { kind: 'unreachable-pin', identity: 'core' }
    ]);
  });

  it('reports a version pin for a package the root now takes from a path', async () => {
    const source = new FakeRegistry().publishPath('a', 'libs/a');

    const reasons = await staleReasons(source, [dep('a', { path: 'libs/a' })], createLockfile([versionPin('a', '1.0.0')]));

    assert.deepEqual(reasons, [{ kind: 'requirement-kind-changed', identity: 'a', pinned: 'range', current: 'path' }]);
    assert.equal(describeStaleReason(reasons[0]), 'a was pinned for a range requirement, now path');
  });

  it('follows an absolute path declared by a path-bound package', async () => {
    const source = new FakeRegistry()
      .publishPath('local', 'libs/local', { dependencies: [dep('helper', { path: '/abs/helper' })] })
      .publishPath('helper', '/abs/helper');

    const result = await reconcile([dep('local', { path: 'libs/local' })], createLockfile([]), source.providers);

    assert.ok(result.success && result.data.kind === 'fresh');
    assert.deepEqual(result.data.solution.packages.map(entry => entry.binding), [
      { kind: 'path', path: '/abs/helper' },
      { kind: 'path', path: 'libs/local' }
    ]);
  });

  it('returns cancelled when the signal has fired', async () => {
    const controller = new AbortController();
    controller.abort();

    const result = await reconcile(
      [dep('a', '^1.0.0')],
      createLockfile([versionPin('a', '1.0.0')]),
      registry().providers,
      { signal: controller.signal }
    );

    assert.deepEqual(result, { success: false, error: { kind: 'cancelled' } });
  });
});
