export type AlphabetName = 'bitcoin' | 'ripple' | 'flickr';

export interface AlphabetTable {
  readonly name: AlphabetName;
  /** The 58 symbols; index = digit value. */
  readonly chars: string;
  /** Symbol for digit 0, used for leading zero bytes. */
  readonly zero: string;
  symbolAt(digit: number): string;
  digitFor(char: string): number | undefined;
}

export const BASE = 58;
export const DEFAULT_ALPHABET: AlphabetName = 'bitcoin';
export const ALPHABET_NAMES: readonly AlphabetName[] = ['bitcoin', 'ripple', 'flickr'];

const CHARSETS: Record<AlphabetName, string> = {
  bitcoin: '123456789ABCDEFGHJKLMNPQRSTUVWXYZabcdefghijkmnopqrstuvwxyz',
  ripple: 'rpshnaf39wBUDNEGHJKLM4PQRST7VWXYZ2bcdeCg65jkm8oFqi1tuvAxyz',
  flickr: '123456789abcdefghijkmnopqrstuvwxyzABCDEFGHJKLMNPQRSTUVWXYZ',
};

const ALIASES = new Map<string, AlphabetName>([
  ['bitcoin', 'bitcoin'],
  ['btc', 'bitcoin'],
  ['ripple', 'ripple'],
  ['xrp', 'ripple'],
  ['flickr', 'flickr'],
]);

// Marks a character code with no digit in the reverse lookup.
const NO_DIGIT = 0xff;

function buildTable(name: AlphabetName, chars: string): AlphabetTable {
  if (chars.length !== BASE) {
    throw new Error(`Alphabet ${name} must have ${BASE} characters, got ${chars.length}`);
  }

  const symbols = chars.split('');
  const lookup = new Uint8Array(256).fill(NO_DIGIT);
  for (let i = 0; i < symbols.length; i++) {
    const code = chars.charCodeAt(i);
    if (code > 0xff) throw new Error(`Alphabet ${name} has a non single-byte character: ${symbols[i]}`);
    if (lookup[code] !== NO_DIGIT) throw new Error(`Alphabet ${name} repeats character: ${symbols[i]}`);
    lookup[code] = i;
  }

  return Object.freeze({
    name,
    chars,
    zero: symbols[0],
    symbolAt: (digit: number) => symbols[digit],
    digitFor: (char: string) => {
      if (char.length !== 1) return undefined;
      const code = char.charCodeAt(0);
      if (code > 0xff) return undefined;
      const digit = lookup[code];
      return digit === NO_DIGIT ? undefined : digit;
    },
  });
}

const TABLES: Record<AlphabetName, AlphabetTable> = {
  bitcoin: buildTable('bitcoin', CHARSETS.bitcoin),
  ripple: buildTable('ripple', CHARSETS.ripple),
  flickr: buildTable('flickr', CHARSETS.flickr),
};

export function getAlphabet(name: AlphabetName = DEFAULT_ALPHABET): AlphabetTable {
  return TABLES[name];
}

/**
 * Parse a user-supplied alphabet name. Case-insensitive; `btc` and `xrp` are
 * accepted as aliases.
 */
export function parseAlphabetName(text: string): AlphabetName {
  const name = ALIASES.get(text.toLowerCase());
  if (name === undefined) {
    throw new Error(`Unknown alphabet: ${text}. Valid options: ${ALPHABET_NAMES.join(', ')}`);
  }
  return name;
}
