/**
 * End-to-end runs of the resolve and graph commands against a registry
 * directory in a temp dir
 */

import { describe, it, before, after, afterEach, mock } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import type { Command } from 'commander';

let testRoot: string;
let workspaceDir: string;
let registryDir: string;
let program: Command;

const coreManifest = [
  'name: core',
  'targets:',
  '  - name: Core',
  'products:',
  '  - name: Core',
  '    targets: [Core]',
  ''
].join('\n');

const appManifest = [
  'name: App',
  'dependencies:',
  '  - name: core',
  '    version: ^1.0.0',
  'targets:',
  '  - name: App',
  '    dependencies:',
  '      - Core',
  ''
].join('\n');

async function writeFile(path: string, content: string): Promise<void> {
  await fs.mkdir(join(path, '..'), { recursive: true });
  await fs.writeFile(path, content);
}

async function runCli(...args: string[]): Promise<{ out: string[]; err: string[] }> {
  const log = mock.method(console, 'log', () => undefined);
  const error = mock.method(console, 'error', () => undefined);
  await program.parseAsync(['--cwd', workspaceDir, '--registry', registryDir, ...args], { from: 'user' });
  return {
    out: log.mock.calls.map(call => String(call.arguments[0])),
    err: error.mock.calls.map(call => String(call.arguments[0]))
  };
}

before(async () => {
  testRoot = await fs.mkdtemp(join(tmpdir(), 'graphpin-cli-test-'));
  workspaceDir = join(testRoot, 'workspace');
  registryDir = join(testRoot, 'registry');
  await writeFile(join(registryDir, 'core', '1.0.0', 'graphpin.yml'), coreManifest);
  await writeFile(join(registryDir, 'core', '1.1.0', 'graphpin.yml'), coreManifest);
  await writeFile(join(workspaceDir, 'graphpin.yml'), appManifest);

  // The config singleton reads GRAPHPIN_HOME when the CLI module loads
  process.env.GRAPHPIN_HOME = join(testRoot, 'home');
  ({ program } = await import('../../src/index.js'));
});

after(async () => {
  await fs.rm(testRoot, { recursive: true, force: true });
});

afterEach(() => {
  mock.restoreAll();
});

describe('graphpin CLI', () => {
  it('resolve prints the pins and writes the lockfile', async () => {
    const lockfilePath = join(workspaceDir, 'graphpin.lock.yml');

    const { out, err } = await runCli('resolve');

    assert.deepEqual(err, []);
    assert.deepEqual(out, [
      '… Resolving App',
      '✓ Resolved 1 package(s)',
      '\nResolved packages\ncore 1.1.0',
      `✓ Wrote ${lockfilePath}`
    ]);
    assert.match(await fs.readFile(lockfilePath, 'utf8'), /identity: core\n {4}kind: range\n {4}version: 1\.1\.0\n/);
  });

  it('graph reuses the lockfile and lists modules dependency-first', async () => {
    const { out, err } = await runCli('graph');

    assert.deepEqual(err, []);
    assert.deepEqual(out, [
      '… Resolving App',
      '✓ Lockfile is up to date',
      '\nModules of App\nApp:\n  Core\n  App'
    ]);
  });

  it('graph rejects an unknown root target', async () => {
    const { err } = await runCli('graph', '--target', 'Nope');

    assert.deepEqual(err, ["Validation error: Unknown target 'Nope'. Root targets: App"]);
    assert.equal(process.exitCode, 1);
    process.exitCode = 0;
  });
});
