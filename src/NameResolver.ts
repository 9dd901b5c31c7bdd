import { toBeHex, toBigInt } from 'ethers';
import { GlobalConfig, ResolverConfig } from './Config';
import { FELT_HEX_RX, FIELD_PRIME } from './consts';
import { ResolutionError } from './Errors';
import { IChainApi } from './interfaces/IChainApi';
import { INameResolver } from './interfaces/INameResolver';
import { StarkDomain } from './StarkDomain';
import { StarknetChainApi } from './StarknetChainApi';
import { createLogger } from './log';

const log = createLogger('resolver');

export function parseAddress(address: string): bigint {
  const value = FELT_HEX_RX.test(address) ? toBigInt(address) : null;
  if (value === null || value >= FIELD_PRIME) {
    throw new ResolutionError('InvalidAddress', `'${address}' is not a Starknet address`);
  }
  return value;
}

export function formatAddress(value: bigint): string {
  return toBeHex(value, 32);
}

/**
 * Resolves `.stark` domains through the naming contract.
 * Stateless apart from its constructor arguments; nothing is cached.
 */
export class NameResolver implements INameResolver {
  private readonly chain: IChainApi;
  private readonly namingContract: string | null;

  /**
   * @param chain           Read-only chain access
   * @param namingContract  Optional override of the per-chain naming contract
   */
  constructor(chain: IChainApi, namingContract: string | null = null) {
    this.chain = chain;
    this.namingContract = namingContract;
  }

  public static fromConfig(config: ResolverConfig): NameResolver {
    if (config.rpcUrl === null) {
      throw new Error('STARKNET_RPC_URL is not configured');
    }
    const chain = new StarknetChainApi(config.rpcUrl, {
      chainId: config.chainId ?? undefined,
      timeoutMs: config.timeoutMs,
    });
    return new NameResolver(chain, config.namingContract);
  }

  public async getNamingContractAsync(): Promise<string> {
    if (this.namingContract !== null) {
      return this.namingContract;
    }
    const chainId = await this.chain.getChainIdAsync();
    return GlobalConfig.namingContractFor(chainId);
  }

  public async getAddressFromStarkNameAsync(domain: string): Promise<string | null> {
    const encoded = StarkDomain.encode(domain);
    const contractAddress = await this.getNamingContractAsync();

    const result = await log.time('domain_to_address', () =>
      this.chain.callContractAsync({
        contractAddress,
        entrypoint: 'domain_to_address',
        // domain: Span<felt252>, hint: Span<felt252> (empty)
        calldata: [BigInt(encoded.length), ...encoded, 0n],
      }),
      { domain }
    );

    if (result.length === 0) {
      throw new ResolutionError('InvalidContractResult', 'domain_to_address returned no data');
    }
    const [address] = result;
    if (address === 0n) {
      log.info('getAddressFromStarkName: none', { domain });
      return null;
    }
    const out = formatAddress(address);
    log.info('getAddressFromStarkName: ok', { domain, address: out });
    return out;
  }

  public async getStarkNameAsync(address: string): Promise<string | null> {
    const value = parseAddress(address);
    const contractAddress = await this.getNamingContractAsync();

    const result = await log.time('address_to_domain', () =>
      this.chain.callContractAsync({
        contractAddress,
        entrypoint: 'address_to_domain',
        calldata: [value, 0n],
      }),
      { address }
    );

    if (result.length === 0) {
      throw new ResolutionError('InvalidContractResult', 'address_to_domain returned no data');
    }
    const [length, ...labels] = result;
    if (length !== BigInt(labels.length)) {
      throw new ResolutionError(
        'InvalidContractResult',
        `address_to_domain announced ${length} labels but returned ${labels.length}`
      );
    }
    if (labels.length === 0) {
      log.info('getStarkName: none', { address });
      return null;
    }
    const domain = StarkDomain.decode(labels);
    log.info('getStarkName: ok', { address, domain });
    return domain;
  }
}
