import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { listDirectories, readJsonOrJsoncFile, writeTextFileAtomic } from '../../src/utils/fs.js';
import { FileSystemError } from '../../src/utils/errors.js';

let testRoot: string;

before(async () => {
  testRoot = await fs.mkdtemp(join(tmpdir(), 'graphpin-fs-test-'));
});

after(async () => {
  await fs.rm(testRoot, { recursive: true, force: true });
});

describe('writeTextFileAtomic', () => {
  it('replaces the target and leaves no temp file behind', async () => {
    const dir = join(testRoot, 'atomic');
    const target = join(dir, 'out.txt');
    await writeTextFileAtomic(target, 'first\n');
    await writeTextFileAtomic(target, 'second\n');

    assert.equal(await fs.readFile(target, 'utf8'), 'second\n');
    assert.deepEqual(await fs.readdir(dir), ['out.txt']);
  });
});

describe('listDirectories', () => {
  it('lists only directories and skips junk entries', async () => {
    const dir = join(testRoot, 'listing');
    await fs.mkdir(join(dir, '1.0.0'), { recursive: true });
    await fs.mkdir(join(dir, 'Thumbs.db'), { recursive: true });
    await fs.writeFile(join(dir, 'notes.txt'), 'not a directory');

    assert.deepEqual(await listDirectories(dir), ['1.0.0']);
  });
});

describe('readJsonOrJsoncFile', () => {
  it('accepts comments and trailing commas', async () => {
    const file = join(testRoot, 'config.jsonc');
    await fs.writeFile(file, '{\n  // registry used by default\n  "registry": "./registry",\n}\n');
    assert.deepEqual(await readJsonOrJsoncFile(file), { registry: './registry' });
  });

  it('fails on malformed content', async () => {
    const file = join(testRoot, 'broken.json');
    await fs.writeFile(file, '{ "registry": ');
    await assert.rejects(readJsonOrJsoncFile(file), FileSystemError);
  });
});
