import { FetchRequest, toBigInt } from 'ethers';
import type { FetchGetUrlFunc } from 'ethers';
import { GlobalConfig } from './Config';
import { ResolutionError } from './Errors';
import { ContractCall, IChainApi } from './interfaces/IChainApi';
import { Selector } from './Selector';
import { createLogger, errorMessage } from './log';

const log = createLogger('chain:rpc');

export interface StarknetChainApiOptions {
  /** Known chain ID; skips `starknet_chainId` */
  chainId?: string;
  timeoutMs?: number;
  /** Replaces the HTTP transport (tests, custom agents) */
  getUrlFunc?: FetchGetUrlFunc;
}

// JSON-RPC code Starknet nodes use for a failing contract call
const CONTRACT_ERROR_CODE = 40;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function toFeltHex(value: bigint): string {
  return '0x' + value.toString(16);
}

/**
 * Thin JSON-RPC implementation of IChainApi on top of ethers' FetchRequest.
 */
export class StarknetChainApi implements IChainApi {
  private readonly rpcUrl: string;
  private readonly chainId: string | null;
  private readonly timeoutMs: number;
  private readonly getUrlFunc: FetchGetUrlFunc | null;
  private nextId = 1;

  constructor(rpcUrl: string, options: StarknetChainApiOptions = {}) {
    if (!rpcUrl) {
      throw new Error('rpcUrl required');
    }
    this.rpcUrl = rpcUrl;
    this.chainId = options.chainId ?? null;
    this.timeoutMs = options.timeoutMs ?? GlobalConfig.DefaultRpcTimeoutMs;
    this.getUrlFunc = options.getUrlFunc ?? null;
    log.info('StarknetChainApi constructed', { rpcUrl, chainId: this.chainId });
  }

  /* ---------------------------------------------------------------------- */
  /* IChainApi implementation                                              */
  /* ---------------------------------------------------------------------- */

  public async getChainIdAsync(): Promise<string> {
    if (this.chainId !== null) {
      return this.chainId;
    }
    const result = await this.send('starknet_chainId', []);
    if (typeof result !== 'string') {
      throw new ResolutionError('InvalidContractResult', 'starknet_chainId returned a non-string result');
    }
    return result.toLowerCase();
  }

  public async callContractAsync(call: ContractCall): Promise<bigint[]> {
    const start = Date.now();
    const result = await this.send('starknet_call', {
      request: {
        contract_address: call.contractAddress,
        entry_point_selector: Selector.toHex(call.entrypoint),
        calldata: call.calldata.map(toFeltHex),
      },
      block_id: 'latest',
    });

    if (!Array.isArray(result)) {
      throw new ResolutionError('InvalidContractResult', `${call.entrypoint} returned a non-array result`);
    }
    const felts = result.map(item => {
      if (typeof item !== 'string') {
        throw new ResolutionError('InvalidContractResult', `${call.entrypoint} returned a non-string felt`);
      }
      try {
        return toBigInt(item);
      } catch (e) {
        throw new ResolutionError('InvalidContractResult', `${call.entrypoint} returned malformed felt '${item}'`, { cause: e });
      }
    });
    log.debug('call', { to: call.contractAddress, entrypoint: call.entrypoint, felts: felts.length, ms: Date.now() - start });
    return felts;
  }

  /* ---------------------------------------------------------------------- */
  /* JSON-RPC transport                                                    */
  /* ---------------------------------------------------------------------- */

  private async send(method: string, params: unknown): Promise<unknown> {
    const req = new FetchRequest(this.rpcUrl);
    req.timeout = this.timeoutMs;
    // ethers retries 429 with backoff by default
    req.setThrottleParams({ maxAttempts: 1 });
    if (this.getUrlFunc !== null) {
      req.getUrlFunc = this.getUrlFunc;
    }
    req.body = { jsonrpc: '2.0', id: this.nextId++, method, params };

    let payload: unknown;
    try {
      const resp = await req.send();
      resp.assertOk();
      payload = resp.bodyJson;
    } catch (e) {
      log.error(`${method} transport error`, { rpcUrl: this.rpcUrl, error: errorMessage(e) });
      throw new ResolutionError('ConnectionError', `${method} failed: ${errorMessage(e)}`, { cause: e });
    }

    if (!isRecord(payload)) {
      throw new ResolutionError('ConnectionError', `${method} returned a malformed JSON-RPC response`);
    }
    const error = payload.error;
    if (error !== undefined) {
      const rpcError: Record<string, unknown> = isRecord(error) ? error : {};
      const message = String(rpcError.message ?? 'unknown error');
      const kind = rpcError.code === CONTRACT_ERROR_CODE ? 'InvalidContractResult' : 'ConnectionError';
      log.warn(`${method} rpc error`, { error });
      throw new ResolutionError(kind, `${method} failed: ${message}`);
    }
    return payload.result;
  }
}
