import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { isAffirmativeVerdict, stripReasoning } from './response-sanitizer.js';

describe('stripReasoning', () => {
  it('drops a leading reasoning block', () => {
    assert.equal(stripReasoning('<think>ignored</think>true'), 'true');
  });

  it('removes every block, across newlines, non-greedily', () => {
    const text = '<think>first\nsecond</think> hello <think>again</think> world ';
    assert.equal(stripReasoning(text), 'hello  world');
    assert.equal(stripReasoning('<think>x</think>keep<think>y</think>'), 'keep');
  });

  it('only trims text without markers', () => {
    assert.equal(stripReasoning('  plain text \n'), 'plain text');
    assert.equal(stripReasoning('<think>never closed true'), '<think>never closed true');
  });

  it('removes blocks that appear once an inner block is gone', () => {
    assert.equal(stripReasoning('<th<think>a</think>ink>b</think>true'), 'true');
  });

  it('is idempotent', () => {
    const samples = [
      '',
      '   ',
      'true',
      ' <think>a</think> false ',
      '<th<think>a</think>ink>b</think>x',
      '<think>\n\n</think>\n<think>z</think>\nmaybe\n',
      'a</think>b<think>c'
    ];
    for (const sample of samples) {
      const once = stripReasoning(sample);
      assert.equal(stripReasoning(once), once, `not idempotent for ${JSON.stringify(sample)}`);
    }
  });
});

describe('isAffirmativeVerdict', () => {
  it('accepts "true" in any case with surrounding whitespace', () => {
    for (const output of ['True', ' true ', 'TRUE', '<think>hmm</think>\ntrue\n']) {
      assert.equal(isAffirmativeVerdict(output), true, output);
    }
  });

  it('treats everything else as negative', () => {
    for (const output of ['false', 'maybe', '', 'true.', 'true false', '"true"', '<think>true</think>']) {
      assert.equal(isAffirmativeVerdict(output), false, output);
    }
  });
});
