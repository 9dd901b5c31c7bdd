import { Alphabet, DEFAULT_ALPHABET } from '../Alphabet';

/**
 * Tail rewriting that keeps the label encoding injective.
 *
 * A first-extended character followed by the ordinal-1 basic character at
 * the very end of a label reads back as a single trailing last-extended
 * character. To keep both apart, trailing runs of the last-extended
 * character are stored with an odd length and a `<first-extended><one>`
 * ending is stored as an even run:
 *
 *   `…来` × j      → `…来` × (2j − 1)
 *   `…来` × j `这b` → `…来` × (2j + 2)
 */

export interface TrailingRun {
  /** Characters before the run. */
  head: string[];
  /** Length of the run of last-extended characters at the end. */
  run: number;
}

export function splitTrailingRun(
  chars: readonly string[],
  alphabet: Alphabet = DEFAULT_ALPHABET
): TrailingRun {
  let end = chars.length;
  while (end > 0 && chars[end - 1] === alphabet.lastExtended) {
    end--;
  }
  return { head: chars.slice(0, end), run: chars.length - end };
}

function repeat(char: string, count: number): string[] {
  return new Array<string>(count).fill(char);
}

export function applyTailBias(
  chars: readonly string[],
  alphabet: Alphabet = DEFAULT_ALPHABET
): string[] {
  const n = chars.length;
  const endsWithPair =
    n >= 2 &&
    chars[n - 2] === alphabet.firstExtended &&
    chars[n - 1] === alphabet.oneChar;

  if (endsWithPair) {
    const { head, run } = splitTrailingRun(chars.slice(0, n - 2), alphabet);
    return [...head, ...repeat(alphabet.lastExtended, 2 * (run + 1))];
  }

  const { head, run } = splitTrailingRun(chars, alphabet);
  if (run === 0) return [...chars];
  return [...head, ...repeat(alphabet.lastExtended, 2 * run - 1)];
}

export function removeTailBias(
  chars: readonly string[],
  alphabet: Alphabet = DEFAULT_ALPHABET
): string[] {
  const { head, run } = splitTrailingRun(chars, alphabet);
  if (run === 0) return [...chars];

  if (run % 2 === 0) {
    return [
      ...head,
      ...repeat(alphabet.lastExtended, run / 2 - 1),
      alphabet.firstExtended,
      alphabet.oneChar,
    ];
  }
  return [...head, ...repeat(alphabet.lastExtended, (run + 1) / 2)];
}
