/**
 * On-chain naming (`.stark` domain ↔ account address).
 */
export interface INameResolver {
  /**
   * Naming contract used for the connected network.
   */
  getNamingContractAsync(): Promise<string>;

  /**
   * Resolve a domain such as `fricoben.stark` or `sub.fricoben.stark`.
   * @returns The address (0x + 64 hex digits) or null if the domain is unassigned
   */
  getAddressFromStarkNameAsync(domain: string): Promise<string | null>;

  /**
   * Reverse lookup of an address.
   * @returns The full domain including `.stark`, or null if none is set
   */
  getStarkNameAsync(address: string): Promise<string | null>;
}
