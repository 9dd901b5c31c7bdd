import { Alphabet, DEFAULT_ALPHABET } from './Alphabet';
import { STARK_SUFFIX, isFieldElement } from './consts';
import { ResolutionError } from './Errors';
import { encodeLabel } from './LabelEncoder';
import { decodeLabel } from './LabelDecoder';

/**
 * Full `.stark` domains: splitting into labels, and joining decoded labels
 * back with dots and the suffix.
 */
export class StarkDomain {
  public static isStarkDomain(domain: string): boolean {
    if (!domain.endsWith(STARK_SUFFIX)) return false;
    const body = domain.slice(0, -STARK_SUFFIX.length);
    return body.length > 0 && body.split('.').every(label => label.length > 0);
  }

  /**
   * Labels of a domain, leftmost (innermost subdomain) first.
   *
   * @throws ResolutionError `InvalidDomain` when the suffix or a label is missing
   */
  public static labelsOf(domain: string): string[] {
    if (!StarkDomain.isStarkDomain(domain)) {
      throw new ResolutionError('InvalidDomain', `'${domain}' is not a ${STARK_SUFFIX} domain`);
    }
    return domain.slice(0, -STARK_SUFFIX.length).split('.');
  }

  /**
   * Encodes every label of a domain.
   *
   * @throws UnknownCharacterError for a character outside the alphabet
   * @throws ResolutionError `InvalidDomain` when a label does not fit a field element
   */
  public static encode(domain: string, alphabet: Alphabet = DEFAULT_ALPHABET): bigint[] {
    return StarkDomain.labelsOf(domain).map(label => {
      const value = encodeLabel(label, alphabet);
      if (!isFieldElement(value)) {
        throw new ResolutionError('InvalidDomain', `Label '${label}' is too long to fit a field element`);
      }
      return value;
    });
  }

  /**
   * Joins decoded labels into a full domain; no labels yield `''`.
   */
  public static decode(values: readonly bigint[], alphabet: Alphabet = DEFAULT_ALPHABET): string {
    if (values.length === 0) return '';
    return values.map(v => decodeLabel(v, alphabet)).join('.') + STARK_SUFFIX;
  }
}
