export { ALPHABET_NAMES, BASE, DEFAULT_ALPHABET, getAlphabet, parseAlphabetName } from './alphabet.js';
export type { AlphabetName, AlphabetTable } from './alphabet.js';
export { decode, decodeWithAlphabet, encode, encodeWithAlphabet, isBase58 } from './base58.js';
export { DecodeError } from './errors.js';
export type { DecodeErrorKind } from './errors.js';
