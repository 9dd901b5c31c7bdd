import { GlobalConfig } from '../Config';
import { ContractCall, IChainApi } from '../interfaces/IChainApi';
import { StarkDomain } from '../StarkDomain';
import { parseAddress } from '../NameResolver';

/**
 * In-memory naming contract behind IChainApi, for testing.
 * Records every call it receives in `calls`.
 */
export class ChainApiMock implements IChainApi {
  public readonly calls: ContractCall[] = [];

  private readonly addresses = new Map<string, bigint>();
  private readonly domains = new Map<bigint, bigint[]>();

  constructor(private readonly chainId: string = GlobalConfig.MainnetChainId) {}

  /**
   * Create a mock where `domain` resolves to `address` and back.
   */
  public static withDomain(domain: string, address: string, chainId?: string): ChainApiMock {
    const mock = new ChainApiMock(chainId);
    mock.register(domain, address);
    return mock;
  }

  public register(domain: string, address: string): void {
    const encoded = StarkDomain.encode(domain);
    const value = parseAddress(address);
    this.addresses.set(encoded.join(','), value);
    this.domains.set(value, encoded);
  }

  public async getChainIdAsync(): Promise<string> {
    return this.chainId;
  }

  public async callContractAsync(call: ContractCall): Promise<bigint[]> {
    this.calls.push(call);

    switch (call.entrypoint) {
      case 'domain_to_address': {
        const length = Number(call.calldata[0] ?? 0n);
        const key = call.calldata.slice(1, 1 + length).join(',');
        return [this.addresses.get(key) ?? 0n];
      }
      case 'address_to_domain': {
        const labels = this.domains.get(call.calldata[0] ?? 0n) ?? [];
        return [BigInt(labels.length), ...labels];
      }
      default:
        throw new Error(`ChainApiMock: unknown entrypoint ${call.entrypoint}`);
    }
  }
}
