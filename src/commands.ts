import { ALPHABET_NAMES, DEFAULT_ALPHABET, parseAlphabetName } from './alphabet.js';
import type { AlphabetName } from './alphabet.js';
import { decodeWithAlphabet, encodeWithAlphabet } from './base58.js';
import type { Base58Config } from './config.js';
import { resolve } from './config.js';
import { DecodeError } from './errors.js';

// ── Types ─────────────────────────────────────────────────────────

export interface FlagDef {
  short: string;
  name: string;
  value?: string;
  description: string;
}

export interface ParsedArgs {
  decode: boolean;
  help: boolean;
  alphabet: string | undefined;
  /** Input file; undefined (or `-`) reads stdin. */
  file: string | undefined;
}

export interface RunOptions {
  decode: boolean;
  alphabet: AlphabetName;
}

/** A bad command line; the CLI prints usage after the message. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export const ALPHABET_ENV = 'BASE58_ALPHABET';

export const FLAGS: FlagDef[] = [
  { short: 'd', name: 'decode', description: 'Decode Base58 input (default: encode)' },
  {
    short: 'a',
    name: 'alphabet',
    value: '<ALPHABET>',
    description: `Specify alphabet (${ALPHABET_NAMES.join(', ')}) [default: ${DEFAULT_ALPHABET}]`,
  },
  { short: 'h', name: 'help', description: 'Show this help message' },
];

// ── Arg parser ────────────────────────────────────────────────────

export function parseArgs(args: string[]): ParsedArgs {
  const parsed: ParsedArgs = { decode: false, help: false, alphabet: undefined, file: undefined };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-d' || arg === '--decode') {
      parsed.decode = true;
    } else if (arg === '-h' || arg === '--help') {
      parsed.help = true;
    } else if (arg === '-a' || arg === '--alphabet') {
      const next = args[i + 1];
      if (next === undefined) throw new UsageError('--alphabet requires a value');
      parsed.alphabet = next;
      i++;
    } else if (arg.startsWith('--alphabet=')) {
      parsed.alphabet = arg.slice('--alphabet='.length);
    } else if (arg !== '-' && arg.startsWith('-')) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else if (parsed.file === undefined) {
      parsed.file = arg;
    } else {
      throw new UsageError(`Unexpected argument: ${arg}`);
    }
  }
  return parsed;
}

/** Pick the alphabet with precedence --alphabet > BASE58_ALPHABET > config > default. */
export function resolveAlphabet(flagValue: string | undefined, config: Base58Config): AlphabetName {
  const name = resolve(flagValue, ALPHABET_ENV, config.alphabet);
  return name === undefined ? DEFAULT_ALPHABET : parseAlphabetName(name);
}

// ── Usage ─────────────────────────────────────────────────────────

export function formatUsage(): string {
  const pad = 29;
  return `base58 - Base58 encoding and decoding utility

USAGE:
    base58 [OPTIONS] [FILE]

    Reads FILE, or standard input when FILE is absent or "-".

OPTIONS:
${FLAGS.map((f) => `    ${`-${f.short}, --${f.name}${f.value ? ` ${f.value}` : ''}`.padEnd(pad)}${f.description}`).join('\n')}

ENVIRONMENT:
    ${ALPHABET_ENV.padEnd(pad)}Default alphabet when --alphabet is not given

EXAMPLES:
    printf 'Hello, World!' | base58
    printf '72k1xXWG59fYdzSNoA' | base58 -d
    base58 --alphabet ripple < input.txt
    base58 -d --alphabet bitcoin encoded.txt
`;
}

// ── Run ───────────────────────────────────────────────────────────

const utf8 = new TextDecoder('utf-8', { fatal: true });
const encoder = new TextEncoder();

/**
 * Encode or decode a whole input buffer. Encoded text is returned with a
 * trailing newline; decoded output is the raw bytes.
 */
export function runCodec(input: Uint8Array, opts: RunOptions): Uint8Array {
  if (!opts.decode) {
    return encoder.encode(encodeWithAlphabet(input, opts.alphabet) + '\n');
  }

  let text: string;
  try {
    text = utf8.decode(input);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Input is not valid UTF-8: ${msg}`);
  }
  return decodeWithAlphabet(text.trim(), opts.alphabet);
}

export function describeError(err: unknown): string {
  if (err instanceof DecodeError && err.kind === 'InvalidCharacter') {
    return `Invalid character '${err.character ?? ''}' in Base58 input`;
  }
  return err instanceof Error ? err.message : String(err);
}
