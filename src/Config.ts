import { ResolutionError } from './Errors';

const SN_MAIN = '0x534e5f4d41494e';
const SN_SEPOLIA = '0x534e5f5345504f4c4941';

/**
 * Global SDK constants and configuration
 */
export class GlobalConfig {
  public static readonly DefaultRpcTimeoutMs = 30_000;

  /** `SN_MAIN` / `SN_SEPOLIA` as returned by `starknet_chainId`. */
  public static readonly MainnetChainId = SN_MAIN;
  public static readonly SepoliaChainId = SN_SEPOLIA;

  /**
   * Naming contract per chain ID
   */
  public static readonly NamingContracts: Readonly<Record<string, string>> = {
    [SN_MAIN]: '0x6ac597f8116f886fa1c97a23fa4e08299975ecaf6b598873ca6792b9bbfb678',
    [SN_SEPOLIA]: '0x154bc2e1af9260b9e66af0e9c46fc757ff893b3ff6a85718a810baf1474',
  };

  /**
   * Naming contract deployed on the given chain.
   *
   * @throws ResolutionError `ResolutionNotSupported` for any other chain
   */
  public static namingContractFor(chainId: string): string {
    const address = GlobalConfig.NamingContracts[chainId.toLowerCase()];
    if (address === undefined) {
      throw new ResolutionError('ResolutionNotSupported', `No naming contract known for chain ${chainId}`);
    }
    return address;
  }
}

export interface ResolverConfig {
  rpcUrl: string | null;
  /** Overrides the per-chain naming contract. */
  namingContract: string | null;
  /** Skips the `starknet_chainId` round-trip when set. */
  chainId: string | null;
  timeoutMs: number;
}

function nonEmpty(raw: string | undefined): string | null {
  const value = raw?.trim();
  return value ? value : null;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResolverConfig {
  const rawTimeout = nonEmpty(env.NAMING_RPC_TIMEOUT_MS);
  let timeoutMs = GlobalConfig.DefaultRpcTimeoutMs;
  if (rawTimeout !== null) {
    const parsed = Number(rawTimeout);
    if (!Number.isInteger(parsed) || parsed <= 0) {
      throw new Error(`NAMING_RPC_TIMEOUT_MS must be a positive integer, got '${rawTimeout}'`);
    }
    timeoutMs = parsed;
  }

  return {
    rpcUrl: nonEmpty(env.STARKNET_RPC_URL),
    namingContract: nonEmpty(env.NAMING_CONTRACT_ADDRESS),
    chainId: nonEmpty(env.STARKNET_CHAIN_ID),
    timeoutMs,
  };
}
