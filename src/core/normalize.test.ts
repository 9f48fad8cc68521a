import { describe, it } from 'node:test';
import assert from 'node:assert';
import { normalizeFreeText, normalizeIdentifier, normalizeText } from './normalize.js';

describe('normalizeText', () => {
  it('should trim whitespace from both ends', () => {
    assert.strictEqual(normalizeText('  hello world  '), 'hello world');
  });

  it('should convert text to lowercase', () => {
    assert.strictEqual(normalizeText('Due DATE'), 'due date');
  });

  it('should normalize Windows line endings to Unix', () => {
    assert.strictEqual(normalizeText('line1\r\nline2'), 'line1\nline2');
  });

  it('should collapse multiple spaces and tabs into a single space', () => {
    assert.strictEqual(normalizeText('word1   word2\t\tword3'), 'word1 word2 word3');
  });

  it('should reduce 3 or more newlines to 2 newlines', () => {
    assert.strictEqual(normalizeText('line1\n\n\nline2'), 'line1\n\nline2');
  });

  it('should return empty string for blank input', () => {
    assert.strictEqual(normalizeText(''), '');
    assert.strictEqual(normalizeText('   '), '');
  });
});

describe('normalizeIdentifier', () => {
  it('should only trim, keeping inner characters as typed', () => {
    assert.strictEqual(normalizeIdentifier('  1001 \n'), '1001');
    assert.strictEqual(normalizeIdentifier('10 01'), '10 01');
  });
});

describe('normalizeFreeText', () => {
  it('should keep case and fold newlines into single spaces', () => {
    assert.strictEqual(normalizeFreeText('  Pump\n\nfailure   at  Site B '), 'Pump failure at Site B');
  });
});
