import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { parseDefines } from '../../../../src/cli/commands/init.ts';

describe('parseDefines', () => {
  it('splits at the first equals sign', () => {
    assert.deepEqual(parseDefines(['PROJECT.NAME=demo', 'PROJECT.DESCRIPTION=a=b', 'WITH.TESTS=no']), {
      'PROJECT.NAME': 'demo',
      'PROJECT.DESCRIPTION': 'a=b',
      'WITH.TESTS': 'no',
    });
  });

  it('allows empty values', () => {
    assert.deepEqual(parseDefines(['COPY.HOLDER=']), { 'COPY.HOLDER': '' });
  });

  it('rejects entries without a key', () => {
    assert.throws(() => parseDefines(['=demo']), /Invalid definition "=demo"; expected KEY=value/);
    assert.throws(() => parseDefines(['PROJECT.NAME']), /expected KEY=value/);
  });
});
