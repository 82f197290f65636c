import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { formatModules, formatSolution } from '../../src/utils/formatters.js';
import { createSolution } from '../../src/core/resolution/index.js';
import { PackageGraph } from '../../src/core/graph/index.js';

describe('formatSolution', () => {
  it('pads identities to one column', () => {
    const solution = createSolution([
      { identity: 'logging', binding: { kind: 'branch', branch: 'main', revision: '4f2a9c1' }, requirementKind: 'branch' },
      { identity: 'core', binding: { kind: 'version', version: '1.4.0' }, requirementKind: 'range' }
    ]);

    assert.deepEqual(formatSolution(solution), ['core    1.4.0', 'logging main (4f2a9c1)']);
  });

  it('returns nothing for an empty solution', () => {
    assert.deepEqual(formatSolution(createSolution([])), []);
  });
});

describe('formatModules', () => {
  const graph = new PackageGraph('app', [], [], new Map([
    ['App', ['Core', 'App']],
    ['AppTests', ['Core', 'App', 'AppTests']]
  ]));

  it('lists the modules of every root target', () => {
    assert.deepEqual(formatModules(graph), [
      'App:',
      '  Core',
      '  App',
      'AppTests:',
      '  Core',
      '  App',
      '  AppTests'
    ]);
  });

  it('lists one root target when asked', () => {
    assert.deepEqual(formatModules(graph, 'AppTests'), ['AppTests:', '  Core', '  App', '  AppTests']);
  });
});
