import { BASE, DEFAULT_ALPHABET, getAlphabet } from './alphabet.js';
import type { AlphabetName, AlphabetTable } from './alphabet.js';
import { DecodeError } from './errors.js';

/*
 * The intermediate integer is a plain byte array (base 256), big-endian for
 * encode and little-endian while decode accumulates, with the carries handled
 * by hand. Both directions are quadratic in the input length.
 */

function toTable(alphabet: AlphabetName | AlphabetTable): AlphabetTable {
  return typeof alphabet === 'string' ? getAlphabet(alphabet) : alphabet;
}

export function encode(bytes: Uint8Array): string {
  return encodeWithAlphabet(bytes, DEFAULT_ALPHABET);
}

export function decode(str: string): Uint8Array {
  return decodeWithAlphabet(str, DEFAULT_ALPHABET);
}

export function encodeWithAlphabet(bytes: Uint8Array, alphabet: AlphabetName | AlphabetTable): string {
  const table = toTable(alphabet);
  if (bytes.length === 0) return '';

  // Count leading zeros
  let leadingZeros = 0;
  while (leadingZeros < bytes.length && bytes[leadingZeros] === 0) leadingZeros++;

  // Long division of num by 58, one remainder per pass. `start` skips the
  // quotient's leading zero bytes so each pass gets shorter.
  const num = new Uint8Array(bytes.subarray(leadingZeros));
  const digits: number[] = [];
  let start = 0;
  while (start < num.length) {
    let rem = 0;
    for (let i = start; i < num.length; i++) {
      const acc = rem * 256 + num[i];
      num[i] = Math.floor(acc / BASE);
      rem = acc % BASE;
    }
    digits.push(rem);
    while (start < num.length && num[start] === 0) start++;
  }

  let encoded = table.zero.repeat(leadingZeros);
  for (let i = digits.length - 1; i >= 0; i--) {
    encoded += table.symbolAt(digits[i]);
  }
  return encoded;
}

export function decodeWithAlphabet(str: string, alphabet: AlphabetName | AlphabetTable): Uint8Array {
  const table = toTable(alphabet);
  if (str.length === 0) return new Uint8Array(0);

  // Count leading zero symbols (zero bytes). The zero symbol is one UTF-16 unit.
  let leadingZeros = 0;
  while (leadingZeros < str.length && str[leadingZeros] === table.zero) leadingZeros++;

  // Little-endian base-256 accumulator: acc = acc * 58 + digit.
  const acc: number[] = [];
  let position = leadingZeros;
  for (const ch of str.slice(leadingZeros)) {
    const digit = table.digitFor(ch);
    if (digit === undefined) throw DecodeError.invalidCharacter(ch, position);
    position++;

    let carry = digit;
    for (let i = 0; i < acc.length; i++) {
      carry += acc[i] * BASE;
      acc[i] = carry & 0xff;
      carry >>= 8;
    }
    while (carry > 0) {
      acc.push(carry & 0xff);
      carry >>= 8;
    }
  }

  const result = new Uint8Array(leadingZeros + acc.length);
  for (let i = 0; i < acc.length; i++) {
    result[leadingZeros + i] = acc[acc.length - 1 - i];
  }
  return result;
}

/** True when every character of `str` belongs to the alphabet. */
export function isBase58(str: string, alphabet: AlphabetName | AlphabetTable = DEFAULT_ALPHABET): boolean {
  const table = toTable(alphabet);
  for (const ch of str) {
    if (table.digitFor(ch) === undefined) return false;
  }
  return true;
}
