/**
 * Raised by the label encoder for the first character outside the alphabet.
 */
export class UnknownCharacterError extends Error {
  public readonly kind = 'UnknownCharacter' as const;

  constructor(public readonly character: string) {
    super(`Unknown character '${character}' in domain label`);
    this.name = 'UnknownCharacterError';
  }
}

export type ResolutionErrorKind =
  | 'ConnectionError'
  | 'InvalidContractResult'
  | 'InvalidDomain'
  | 'InvalidAddress'
  | 'ResolutionNotSupported';

/**
 * Failure of the resolving layer (RPC transport, contract output, input
 * validation or an unsupported network).
 */
export class ResolutionError extends Error {
  constructor(
    public readonly kind: ResolutionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ResolutionError';
  }
}

export type NamingError = UnknownCharacterError | ResolutionError;
