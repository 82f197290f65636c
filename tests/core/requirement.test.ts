import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import {
  bindingKey,
  bindingSatisfies,
  describeBinding,
  describeRequirement,
  parseRequirement
} from '../../src/core/requirement.js';
import { ValidationError } from '../../src/utils/errors.js';

describe('parseRequirement', () => {
  it('turns a range into an interval set', () => {
    const requirement = parseRequirement({ version: '^2.1.0' });
    assert.equal(requirement.kind, 'range');
    assert.equal(describeRequirement(requirement), '>=2.1.0 <3.0.0');
  });

  it('treats a range naming one version as exact', () => {
    assert.deepEqual(parseRequirement({ version: '1.4.0' }), { kind: 'exact', version: '1.4.0' });
  });

  it('validates exact versions', () => {
    assert.deepEqual(parseRequirement({ exact: '2.0.0' }), { kind: 'exact', version: '2.0.0' });
    assert.throws(() => parseRequirement({ exact: 'two' }), (error: unknown) =>
      error instanceof ValidationError && error.reason === "invalid exact version 'two'");
  });

  it('reads branch, revision and path requirements', () => {
    assert.deepEqual(parseRequirement({ branch: 'main' }), { kind: 'branch', branch: 'main' });
    assert.deepEqual(parseRequirement({ revision: 'abc123' }), { kind: 'revision', revision: 'abc123' });
    assert.deepEqual(parseRequirement({ path: '../local' }), { kind: 'path', path: '../local' });
  });

  it('rejects zero or several requirement fields', () => {
    assert.throws(() => parseRequirement({}), (error: unknown) =>
      error instanceof ValidationError
      && error.reason === 'dependency needs one of: version, exact, branch, revision, path');
    assert.throws(() => parseRequirement({ version: '^1.0.0', branch: 'main' }), (error: unknown) =>
      error instanceof ValidationError
      && error.reason === 'dependency has conflicting requirement fields: version, branch');
  });

  it('rejects invalid ranges', () => {
    assert.throws(() => parseRequirement({ version: 'latest-and-greatest' }), ValidationError);
  });
});

describe('bindings', () => {
  it('checks whether a binding meets a requirement', () => {
    assert.equal(bindingSatisfies({ kind: 'version', version: '1.2.0' }, parseRequirement({ version: '^1.0.0' })), true);
    assert.equal(bindingSatisfies({ kind: 'version', version: '2.0.0' }, parseRequirement({ version: '^1.0.0' })), false);
    assert.equal(bindingSatisfies({ kind: 'branch', branch: 'main', revision: 'r1' }, { kind: 'branch', branch: 'main' }), true);
    assert.equal(bindingSatisfies({ kind: 'branch', branch: 'dev', revision: 'r1' }, { kind: 'branch', branch: 'main' }), false);
    assert.equal(bindingSatisfies({ kind: 'revision', revision: 'r1' }, { kind: 'branch', branch: 'main' }), false);
  });

  it('describes and keys bindings', () => {
    assert.equal(describeBinding({ kind: 'branch', branch: 'main', revision: 'r1' }), 'main (r1)');
    assert.equal(bindingKey({ kind: 'branch', branch: 'main', revision: 'r1' }), 'branch:main@r1');
    assert.equal(bindingKey({ kind: 'path', path: '../x' }), 'path:../x');
  });
});
