import { Alphabet, DEFAULT_ALPHABET } from '../Alphabet';

// A basic digit equal to the switch marker means the next digit belongs to
// the extended set. That digit is final (base m + 1) exactly when what is
// left of the value is smaller than m + 1, otherwise it is read in base m.

export function isSwitchMarker(digit: bigint, alphabet: Alphabet = DEFAULT_ALPHABET): boolean {
  return digit === alphabet.switchMarker;
}

export function isFinalSwitch(rest: bigint, alphabet: Alphabet = DEFAULT_ALPHABET): boolean {
  return rest / alphabet.finalExtendedRadix === 0n;
}
