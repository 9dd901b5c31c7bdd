// Codec
export { Alphabet, DEFAULT_ALPHABET, BASIC_CHARACTERS, EXTENDED_CHARACTERS } from './Alphabet';
export { tryEncodeLabel, encodeLabel } from './LabelEncoder';
export { decodeLabel } from './LabelDecoder';
export { applyTailBias, removeTailBias, splitTrailingRun } from './utils/TailBias';
export { isSwitchMarker, isFinalSwitch } from './utils/RadixSwitch';
export { applyZeroBias, removeZeroBias } from './utils/ZeroBias';
export { FIELD_PRIME, STARK_SUFFIX, isFieldElement } from './consts';
export { UnknownCharacterError, ResolutionError } from './Errors';

// Resolving layer
export { StarkDomain } from './StarkDomain';
export { Selector } from './Selector';
export { StarknetChainApi, toFeltHex } from './StarknetChainApi';
export { NameResolver, parseAddress, formatAddress } from './NameResolver';
export { GlobalConfig, loadConfig } from './Config';
export { createLogger } from './log';

// Types
export type { CharClass } from './Alphabet';
export type { EncodeResult } from './LabelEncoder';
export type { TrailingRun } from './utils/TailBias';
export type { ResolutionErrorKind, NamingError } from './Errors';
export type { ContractCall, IChainApi } from './interfaces/IChainApi';
export type { INameResolver } from './interfaces/INameResolver';
export type { StarknetChainApiOptions } from './StarknetChainApi';
export type { ResolverConfig } from './Config';
export type { Logger, LogLevelName } from './log';

// Export mocks for testing
export { ChainApiMock } from './mocks/ChainApiMock';
