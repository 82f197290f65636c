import { describe, it, before, after } from 'node:test';
import assert from 'node:assert/strict';
import { promises as fs } from 'fs';
import { join, resolve } from 'path';
import { tmpdir } from 'os';
import { ConfigManager } from '../../src/core/config.js';
import { getGraphpinDirectories } from '../../src/core/directory.js';
import { ConfigError } from '../../src/utils/errors.js';

let testRoot: string;
let homes = 0;

before(async () => {
  testRoot = await fs.mkdtemp(join(tmpdir(), 'graphpin-config-test-'));
});

after(async () => {
  await fs.rm(testRoot, { recursive: true, force: true });
});

async function home(files: Record<string, string> = {}): Promise<string> {
  homes += 1;
  const dir = join(testRoot, `home-${homes}`);
  await fs.mkdir(dir, { recursive: true });
  for (const [name, content] of Object.entries(files)) {
    await fs.writeFile(join(dir, name), content);
  }
  return dir;
}

describe('getGraphpinDirectories', () => {
  it('uses GRAPHPIN_HOME when it is set', () => {
    assert.deepEqual(getGraphpinDirectories({ GRAPHPIN_HOME: 'custom/home' }), { config: resolve('custom/home') });
  });

  it('falls back to ~/.graphpin', () => {
    const { config } = getGraphpinDirectories({ GRAPHPIN_HOME: '  ' });
    assert.equal(config.endsWith('.graphpin'), true);
  });
});

describe('ConfigManager', () => {
  it('uses defaults when there is no config file', async () => {
    const manager = new ConfigManager({ config: await home() });

    assert.deepEqual(await manager.load(), { lockfileName: 'graphpin.lock.yml' });
    assert.equal(manager.getLoadedConfigPath(), null);
  });

  it('reads a commented config.jsonc', async () => {
    const dir = await home({
      'config.jsonc': '{\n  // shared registry\n  "registry": "./registry",\n  "platform": "macOS",\n}\n'
    });
    const manager = new ConfigManager({ config: dir });

    assert.deepEqual(await manager.resolveSettings({}, {}), {
      registry: './registry',
      platform: 'macos',
      lockfileName: 'graphpin.lock.yml'
    });
    assert.equal(manager.getLoadedConfigPath(), join(dir, 'config.jsonc'));
    assert.equal(await manager.get('registry'), './registry');
  });

  it('prefers config.jsonc over config.json', async () => {
    const dir = await home({
      'config.jsonc': '{ "lockfileName": "from-jsonc.yml" }',
      'config.json': '{ "lockfileName": "from-json.yml" }'
    });

    assert.equal(await new ConfigManager({ config: dir }).get('lockfileName'), 'from-jsonc.yml');
  });

  it('lets flags win over the environment and the environment over the file', async () => {
    const dir = await home({ 'config.json': '{ "registry": "/file/registry", "platform": "ios" }' });
    const manager = new ConfigManager({ config: dir });

    assert.deepEqual(
      await manager.resolveSettings(
        { platform: 'Linux' },
        { GRAPHPIN_REGISTRY: '/env/registry', GRAPHPIN_PLATFORM: 'watchos' }
      ),
      { registry: '/env/registry', platform: 'linux', lockfileName: 'graphpin.lock.yml' }
    );
    assert.deepEqual(
      await manager.resolveSettings({}, { GRAPHPIN_REGISTRY: ' ' }),
      { registry: '/file/registry', platform: 'ios', lockfileName: 'graphpin.lock.yml' }
    );
  });

  it('rejects fields of the wrong type', async () => {
    const dir = await home({ 'config.json': '{ "registry": 3 }' });

    await assert.rejects(new ConfigManager({ config: dir }).load(), (error: unknown) => {
      assert.ok(error instanceof ConfigError);
      assert.equal(error.message, `Invalid configuration in ${join(dir, 'config.json')}: 'registry' must be a string`);
      return true;
    });
  });

  it('rejects a config that is not an object', async () => {
    const dir = await home({ 'config.json': '["registry"]' });

    await assert.rejects(
      new ConfigManager({ config: dir }).load(),
      { message: `Invalid configuration in ${join(dir, 'config.json')}: expected an object` }
    );
  });
});
