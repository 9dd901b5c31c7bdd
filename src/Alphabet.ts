/**
 * Result of classifying a single character against an {@link Alphabet}.
 * Ordinal 0 is a real symbol, absence is reported as `unsupported`.
 */
export type CharClass =
  | { kind: 'basic'; ordinal: number }
  | { kind: 'extended'; ordinal: number }
  | { kind: 'unsupported' };

const UNSUPPORTED: CharClass = { kind: 'unsupported' };

/**
 * Character table for domain labels: a basic set plus an extended set that
 * the encoder switches into for characters outside the basic one.
 */
export class Alphabet {
  public readonly basic: readonly string[];
  public readonly extended: readonly string[];

  private readonly lookup: ReadonlyMap<string, CharClass>;

  /**
   * @param basic     At least two characters; the first one has ordinal 0
   * @param extended  At least one character, disjoint from `basic`
   */
  constructor(basic: string, extended: string) {
    this.basic = Array.from(basic);
    this.extended = Array.from(extended);

    if (this.basic.length < 2) {
      throw new Error('Basic alphabet needs at least two characters');
    }
    if (this.extended.length < 1) {
      throw new Error('Extended alphabet needs at least one character');
    }

    const lookup = new Map<string, CharClass>();
    const register = (char: string, cls: CharClass) => {
      if (lookup.has(char)) {
        throw new Error(`Duplicate alphabet character '${char}'`);
      }
      lookup.set(char, cls);
    };
    this.basic.forEach((char, ordinal) => register(char, { kind: 'basic', ordinal }));
    this.extended.forEach((char, ordinal) => register(char, { kind: 'extended', ordinal }));
    this.lookup = lookup;
  }

  /* ------------------------------------------------------------------ */
  /* lookup                                                             */
  /* ------------------------------------------------------------------ */

  public classify(char: string): CharClass {
    return this.lookup.get(char) ?? UNSUPPORTED;
  }

  public basicChar(ordinal: number): string {
    const char = this.basic[ordinal];
    if (char === undefined) {
      throw new RangeError(`No basic character with ordinal ${ordinal}`);
    }
    return char;
  }

  public extendedChar(ordinal: number): string {
    const char = this.extended[ordinal];
    if (char === undefined) {
      throw new RangeError(`No extended character with ordinal ${ordinal}`);
    }
    return char;
  }

  /* ------------------------------------------------------------------ */
  /* radices                                                            */
  /* ------------------------------------------------------------------ */

  /** Digit that announces an extended character (one past the last basic ordinal). */
  public get switchMarker(): bigint {
    return BigInt(this.basic.length);
  }

  public get basicRadix(): bigint {
    return BigInt(this.basic.length + 1);
  }

  /** Radix of an extended digit that is followed by more characters. */
  public get extendedRadix(): bigint {
    return BigInt(this.extended.length);
  }

  /** Radix of the extended digit in the last position (0 stands for the zero character). */
  public get finalExtendedRadix(): bigint {
    return BigInt(this.extended.length + 1);
  }

  /* ------------------------------------------------------------------ */
  /* characters the bias scheme relies on                               */
  /* ------------------------------------------------------------------ */

  public get zeroChar(): string {
    return this.basicChar(0);
  }

  public get oneChar(): string {
    return this.basicChar(1);
  }

  public get firstExtended(): string {
    return this.extendedChar(0);
  }

  public get lastExtended(): string {
    return this.extendedChar(this.extended.length - 1);
  }
}

export const BASIC_CHARACTERS = 'abcdefghijklmnopqrstuvwxyz0123456789-';
export const EXTENDED_CHARACTERS = '这来';

export const DEFAULT_ALPHABET = new Alphabet(BASIC_CHARACTERS, EXTENDED_CHARACTERS);
