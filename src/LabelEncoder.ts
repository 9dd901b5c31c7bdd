import { Alphabet, DEFAULT_ALPHABET } from './Alphabet';
import { UnknownCharacterError } from './Errors';
import { applyTailBias } from './utils/TailBias';
import { applyZeroBias } from './utils/ZeroBias';

export type EncodeResult =
  | { ok: true; value: bigint }
  | { ok: false; error: UnknownCharacterError };

/**
 * Encodes a single domain label (no dots, no `.stark` suffix) into an
 * integer. The first character is the least significant digit.
 *
 * Returns the first character outside the alphabet as an error; no value
 * is returned in that case.
 */
export function tryEncodeLabel(label: string, alphabet: Alphabet = DEFAULT_ALPHABET): EncodeResult {
  // the tail bias only rewrites alphabet characters, so the first
  // unsupported character keeps its place
  const biased = applyTailBias(Array.from(label), alphabet);
  const lastIndex = biased.length - 1;
  let encoded = 0n;
  let multiplier = 1n;

  for (let i = 0; i < biased.length; i++) {
    const char = biased[i];
    const cls = alphabet.classify(char);
    const isLast = i === lastIndex;

    switch (cls.kind) {
      case 'basic':
        encoded += multiplier * applyZeroBias(cls.ordinal, isLast, alphabet);
        multiplier *= alphabet.basicRadix;
        break;

      case 'extended':
        encoded += multiplier * alphabet.switchMarker;
        multiplier *= alphabet.basicRadix;
        if (isLast) {
          encoded += multiplier * BigInt(cls.ordinal + 1);
          multiplier *= alphabet.finalExtendedRadix;
        } else {
          encoded += multiplier * BigInt(cls.ordinal);
          multiplier *= alphabet.extendedRadix;
        }
        break;

      case 'unsupported':
        return { ok: false, error: new UnknownCharacterError(char) };
    }
  }

  return { ok: true, value: encoded };
}

/**
 * Throwing variant of {@link tryEncodeLabel}.
 *
 * @throws UnknownCharacterError
 */
export function encodeLabel(label: string, alphabet: Alphabet = DEFAULT_ALPHABET): bigint {
  const result = tryEncodeLabel(label, alphabet);
  if (!result.ok) throw result.error;
  return result.value;
}
