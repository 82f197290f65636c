import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { loadPackageGraph } from '../../src/core/workspace.js';
import { createLockfile, serializeLockfile, writeLockfile } from '../../src/core/lockfile/lockfile.js';
import type { PackageManifest } from '../../src/types/index.js';
import { exists } from '../../src/utils/fs.js';
import { dep, FakeRegistry, library, manifest, target } from '../test-helpers.js';

let testRoot: string;
let runs = 0;

before(async () => {
  testRoot = await fs.mkdtemp(join(tmpdir(), 'graphpin-workspace-test-'));
});

after(async () => {
  await fs.rm(testRoot, { recursive: true, force: true });
});

function freshLockfilePath(): string {
  runs += 1;
  return join(testRoot, `run-${runs}`, 'graphpin.lock.yml');
}

function registry(): FakeRegistry {
  const component = { targets: [target('A')], products: [library('A')] };
  return new FakeRegistry().publish('a', '1.0.0', component).publish('a', '1.1.0', component);
}

const app: PackageManifest = manifest('app', {
  name: 'App',
  dependencies: [dep('a', '^1.0.0')],
  targets: [target('App', ['A'])]
});

describe('loadPackageGraph', () => {
  it('resolves, builds and writes a lockfile when none exists', async () => {
    const lockfilePath = freshLockfilePath();

    const result = await loadPackageGraph(app, { providers: registry().providers, lockfilePath });

    assert.ok(result.success);
    assert.equal(result.data.fastPath, false);
    assert.equal(result.data.lockfileWritten, true);
    assert.deepEqual(result.data.staleReasons, []);
    assert.deepEqual(result.data.graph.modules.map(module => module.name), ['A', 'App']);
    assert.equal(
      await fs.readFile(lockfilePath, 'utf8'),
      serializeLockfile(createLockfile([
        { identity: 'a', requirementKind: 'range', state: { kind: 'version', version: '1.1.0' } }
      ]))
    );
  });

  it('reuses a fresh lockfile without resolving or rewriting it', async () => {
    const lockfilePath = freshLockfilePath();
    const source = registry();
    await loadPackageGraph(app, { providers: source.providers, lockfilePath });
    const queriesAfterFirstRun = source.totalVersionQueries();
    const { mtimeMs } = await fs.stat(lockfilePath);

    const result = await loadPackageGraph(app, { providers: source.providers, lockfilePath });

    assert.ok(result.success);
    assert.equal(result.data.fastPath, true);
    assert.equal(result.data.lockfileWritten, false);
    assert.equal(source.totalVersionQueries(), queriesAfterFirstRun);
    assert.equal((await fs.stat(lockfilePath)).mtimeMs, mtimeMs);
  });

  it('resolves a stale lockfile, keeping pins that still fit', async () => {
    const lockfilePath = freshLockfilePath();
    await writeLockfile(lockfilePath, createLockfile([
      { identity: 'a', requirementKind: 'range', state: { kind: 'version', version: '1.0.0' } },
      { identity: 'old', requirementKind: 'range', state: { kind: 'version', version: '0.1.0' } }
    ]));

    const result = await loadPackageGraph(app, { providers: registry().providers, lockfilePath });

    assert.ok(result.success);
    assert.equal(result.data.fastPath, false);
    assert.deepEqual(result.data.staleReasons, [{ kind: 'unreachable-pin', identity: 'old' }]);
    assert.deepEqual(result.data.lockfile.pins, [
      { identity: 'a', requirementKind: 'range', state: { kind: 'version', version: '1.0.0' } }
    ]);
  });

  it('drops the pin of a package that moved to a path', async () => {
    const lockfilePath = freshLockfilePath();
    await writeLockfile(lockfilePath, createLockfile([
      { identity: 'a', requirementKind: 'range', state: { kind: 'version', version: '1.0.0' } }
    ]));
    const source = registry().publishPath('a', 'libs/a', { targets: [target('A')], products: [library('A')] });
    const local = manifest('app', {
      name: 'App',
      dependencies: [dep('a', { path: 'libs/a' })],
      targets: [target('App', ['A'])]
    });

    const result = await loadPackageGraph(local, { providers: source.providers, lockfilePath });

    assert.ok(result.success);
    assert.equal(result.data.fastPath, false);
    assert.equal(result.data.lockfileWritten, true);
    assert.deepEqual(result.data.staleReasons, [
      { kind: 'requirement-kind-changed', identity: 'a', pinned: 'range', current: 'path' }
    ]);
    assert.deepEqual(result.data.lockfile.pins, []);
    assert.equal(await fs.readFile(lockfilePath, 'utf8'), serializeLockfile(createLockfile([])));
  });

  it('ignores the lockfile when updating', async () => {
    const lockfilePath = freshLockfilePath();
    await writeLockfile(lockfilePath, createLockfile([
      { identity: 'a', requirementKind: 'range', state: { kind: 'version', version: '1.0.0' } }
    ]));

    const result = await loadPackageGraph(app, { providers: registry().providers, lockfilePath, update: true });

    assert.ok(result.success);
    assert.equal(result.data.fastPath, false);
    assert.deepEqual(result.data.solution.packages.map(entry => entry.binding), [{ kind: 'version', version: '1.1.0' }]);
  });

  it('leaves the lockfile alone when resolution fails', async () => {
    const lockfilePath = freshLockfilePath();
    const broken = manifest('app', { dependencies: [dep('ghost', '^1.0.0')] });

    const result = await loadPackageGraph(broken, { providers: registry().providers, lockfilePath });

    assert.ok(!result.success);
    assert.equal(result.error.stage, 'resolution');
    assert.equal(result.error.error.kind, 'package-not-found');
    assert.equal(await exists(lockfilePath), false);
  });

  it('leaves the lockfile alone when the graph is invalid', async () => {
    const lockfilePath = freshLockfilePath();
    const broken = manifest('app', { dependencies: [dep('a', '^1.0.0')], targets: [target('App', ['Nope'])] });

    const result = await loadPackageGraph(broken, { providers: registry().providers, lockfilePath });

    assert.ok(!result.success);
    assert.equal(result.error.stage, 'graph');
    assert.equal(result.error.error.kind, 'unresolved-product-reference');
    assert.equal(await exists(lockfilePath), false);
  });

  it('returns cancelled and writes nothing once aborted', async () => {
    const lockfilePath = freshLockfilePath();
    const controller = new AbortController();
    controller.abort();

    const result = await loadPackageGraph(app, { providers: registry().providers, lockfilePath, signal: controller.signal });

    assert.deepEqual(result, { success: false, error: { stage: 'resolution', error: { kind: 'cancelled' } } });
    assert.equal(await exists(lockfilePath), false);
  });
});
