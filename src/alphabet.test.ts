import assert from 'node:assert/strict';
import test from 'node:test';
import { ALPHABET_NAMES, DEFAULT_ALPHABET, getAlphabet, parseAlphabetName } from './alphabet.js';

test('tables carry the exact character sets', () => {
  assert.equal(getAlphabet('bitcoin').chars, '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz');
  assert.equal(getAlphabet('ripple').chars, 'rpshnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCg65jkm8oFqi1tuvAxyz');
  assert.equal(getAlphabet('flickr').chars, '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ');
});

test('default alphabet is bitcoin', () => {
  assert.equal(DEFAULT_ALPHABET, 'bitcoin');
  assert.equal(getAlphabet(), getAlphabet('bitcoin'));
});

test('every table has 58 distinct characters that map back to their index', () => {
  for (const name of ALPHABET_NAMES) {
    const table = getAlphabet(name);
    assert.equal(new Set(table.chars).size, 58);
    for (let digit = 0; digit < 58; digit++) {
      assert.equal(table.digitFor(table.symbolAt(digit)), digit, `${name} digit ${digit}`);
    }
  }
});

test('zero symbol is the first character', () => {
  assert.equal(getAlphabet('bitcoin').zero, '1');
  assert.equal(getAlphabet('ripple').zero, 'r');
  assert.equal(getAlphabet('flickr').zero, '1');
});

test('digitFor returns undefined for characters outside the alphabet', () => {
  const bitcoin = getAlphabet('bitcoin');
  for (const ch of ['0', 'O', 'I', 'l', ' ', '+', 'é', '€', '']) {
    assert.equal(bitcoin.digitFor(ch), undefined, JSON.stringify(ch));
  }
  assert.equal(bitcoin.digitFor('12'), undefined);
});

test('same character maps to different digits across alphabets', () => {
  assert.equal(getAlphabet('bitcoin').digitFor('a'), 33);
  assert.equal(getAlphabet('flickr').digitFor('a'), 9);
  assert.equal(getAlphabet('ripple').digitFor('a'), 5);
});

test('lookups are stable across repeated calls', () => {
  const ripple = getAlphabet('ripple');
  const first = [ripple.digitFor('z'), ripple.symbolAt(10), ripple.digitFor('0')];
  for (let i = 0; i < 3; i++) {
    assert.deepEqual([ripple.digitFor('z'), ripple.symbolAt(10), ripple.digitFor('0')], first);
  }
  assert.deepEqual(first, [57, 'B', undefined]);
  assert.equal(getAlphabet('ripple'), ripple);
});

test('tables are frozen', () => {
  assert.ok(Object.isFrozen(getAlphabet('flickr')));
});

test('parses alphabet names and aliases case-insensitively', () => {
  assert.equal(parseAlphabetName('bitcoin'), 'bitcoin');
  assert.equal(parseAlphabetName('BTC'), 'bitcoin');
  assert.equal(parseAlphabetName('Ripple'), 'ripple');
  assert.equal(parseAlphabetName('xrp'), 'ripple');
  assert.equal(parseAlphabetName('FLICKR'), 'flickr');
});

test('rejects unknown alphabet names', () => {
  assert.throws(
    () => parseAlphabetName('base64'),
    /^Error: Unknown alphabet: base64\. Valid options: bitcoin, ripple, flickr$/,
  );
  assert.throws(() => parseAlphabetName('constructor'), /Unknown alphabet: constructor/);
});
