export type DecodeErrorKind = 'InvalidCharacter' | 'EmptyInput' | 'Overflow';

/**
 * Thrown by the decoders. Only `InvalidCharacter` is raised today;
 * `EmptyInput` and `Overflow` stay in the taxonomy so callers can match on
 * them, but the arbitrary-precision decoder has no path that produces them.
 */
export class DecodeError extends Error {
  readonly kind: DecodeErrorKind;
  /** The offending character, for `InvalidCharacter`. */
  readonly character: string | undefined;
  /** Code point index of `character` within the input. */
  readonly position: number | undefined;

  constructor(kind: DecodeErrorKind, message: string, character?: string, position?: number) {
    super(message);
    this.name = 'DecodeError';
    this.kind = kind;
    this.character = character;
    this.position = position;
  }

  static invalidCharacter(character: string, position: number): DecodeError {
    return new DecodeError('InvalidCharacter', `Invalid character: '${character}'`, character, position);
  }

  static emptyInput(): DecodeError {
    return new DecodeError('EmptyInput', 'Input string is empty');
  }

  static overflow(): DecodeError {
    return new DecodeError('Overflow', 'Numeric overflow during decoding');
  }
}
