import { Alphabet, DEFAULT_ALPHABET } from '../Alphabet';

// A label ending in the ordinal-0 character would lose it as a leading zero
// digit. It is written as the switch marker instead, followed by an implicit
// final extended digit 0, which no extended character uses (those start at 1).

/**
 * Basic digit for the character with the given ordinal.
 */
export function applyZeroBias(ordinal: number, isLast: boolean, alphabet: Alphabet = DEFAULT_ALPHABET): bigint {
  return isLast && ordinal === 0 ? alphabet.switchMarker : BigInt(ordinal);
}

/**
 * Character for the final extended digit following a switch marker.
 */
export function removeZeroBias(finalDigit: bigint, alphabet: Alphabet = DEFAULT_ALPHABET): string {
  return finalDigit === 0n ? alphabet.zeroChar : alphabet.extendedChar(Number(finalDigit) - 1);
}
