/**
 * A read-only contract call.
 */
export interface ContractCall {
  /** 0x-prefixed contract address */
  contractAddress: string;
  /** Entry-point name; the implementation derives the selector */
  entrypoint: string;
  calldata: readonly bigint[];
}

/**
 * Minimal read-only Starknet API needed by the name resolver.
 */
export interface IChainApi {
  /**
   * Gets the chain ID as a 0x-prefixed hex string (e.g. `0x534e5f4d41494e`).
   */
  getChainIdAsync(): Promise<string>;

  /**
   * Executes a `starknet_call` against the latest block.
   *
   * @returns The returned felts
   */
  callContractAsync(call: ContractCall): Promise<bigint[]>;
}
