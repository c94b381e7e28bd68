import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { InvalidArgumentError } from 'commander';
import { parsePositiveInteger, parseTerminator, parseTimeout } from '../../src/cli/options.js';

describe('parsePositiveInteger', () => {
  it('accepts positive integers only', () => {
    assert.equal(parsePositiveInteger('4'), 4);
    assert.throws(() => parsePositiveInteger('0'), InvalidArgumentError);
    assert.throws(() => parsePositiveInteger('2.5'), InvalidArgumentError);
    assert.throws(() => parsePositiveInteger('many'), InvalidArgumentError);
  });
});

describe('parseTimeout', () => {
  it('accepts the longest delay a timer can hold', () => {
    assert.equal(parseTimeout('2147483647'), 2147483647);
  });

  it('rejects delays a timer would cut short', () => {
    assert.throws(() => parseTimeout('3000000000'), {
      name: 'InvalidArgumentError',
      message: 'Must be at most 2147483647.'
    });
  });
});

describe('parseTerminator', () => {
  it('trims surrounding whitespace', () => {
    assert.equal(parseTerminator(' GO '), 'GO');
  });

  it('rejects a blank terminator', () => {
    assert.throws(() => parseTerminator('   '), { name: 'InvalidArgumentError', message: 'Must not be empty.' });
  });
});
