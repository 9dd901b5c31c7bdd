import { Alphabet, DEFAULT_ALPHABET } from './Alphabet';
import { FIELD_PRIME } from './consts';
import { isFinalSwitch, isSwitchMarker } from './utils/RadixSwitch';
import { removeTailBias } from './utils/TailBias';
import { removeZeroBias } from './utils/ZeroBias';

/**
 * Decodes an integer back into a domain label. Never throws: values that no
 * label encodes to still produce some string. Negative values are read as
 * field elements (reduced modulo the field prime).
 */
export function decodeLabel(value: bigint, alphabet: Alphabet = DEFAULT_ALPHABET): string {
  let rest = value < 0n ? ((value % FIELD_PRIME) + FIELD_PRIME) % FIELD_PRIME : value;
  const chars: string[] = [];

  while (rest !== 0n) {
    const digit = rest % alphabet.basicRadix;
    rest /= alphabet.basicRadix;

    if (!isSwitchMarker(digit, alphabet)) {
      chars.push(alphabet.basicChar(Number(digit)));
      continue;
    }

    if (isFinalSwitch(rest, alphabet)) {
      chars.push(removeZeroBias(rest, alphabet));
      rest = 0n;
    } else {
      chars.push(alphabet.extendedChar(Number(rest % alphabet.extendedRadix)));
      rest /= alphabet.extendedRadix;
    }
  }

  return removeTailBias(chars, alphabet).join('');
}
