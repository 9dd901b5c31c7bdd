import { describe, expect, it } from 'vitest';
import { toUtf8Bytes, toUtf8String } from 'ethers';
import type { FetchGetUrlFunc } from 'ethers';

import { Selector } from '../src/Selector';
import { StarknetChainApi } from '../src/StarknetChainApi';

/* ------------------------------------------------------------------ */
/* in-process JSON-RPC endpoint                                       */
/* ------------------------------------------------------------------ */

interface RpcRequest {
    jsonrpc: string;
    id: number;
    method: string;
    params: unknown;
}

const STATUS_TEXT: Record<number, string> = {
    200: 'OK',
    429: 'Too Many Requests',
    500: 'Internal Server Error',
};

function rpcStub(reply: (req: RpcRequest) => unknown, statusCode = 200) {
    const requests: RpcRequest[] = [];
    const getUrlFunc: FetchGetUrlFunc = async (req) => {
        const body: RpcRequest = JSON.parse(toUtf8String(req.body ?? new Uint8Array()));
        requests.push(body);
        return {
            statusCode,
            statusMessage: STATUS_TEXT[statusCode] ?? 'Error',
            headers: { 'content-type': 'application/json' },
            body: toUtf8Bytes(JSON.stringify(reply(body))),
        };
    };
    return { requests, getUrlFunc };
}

const RPC = 'http://127.0.0.1:5050/rpc';

describe('StarknetChainApi', () => {
    it('asks the node for its chain ID', async () => {
        const stub = rpcStub(req => ({ jsonrpc: '2.0', id: req.id, result: '0x534E5F4D41494E' }));
        const api = new StarknetChainApi(RPC, { getUrlFunc: stub.getUrlFunc });

        await expect(api.getChainIdAsync()).resolves.toBe('0x534e5f4d41494e');
        expect(stub.requests).toEqual([{ jsonrpc: '2.0', id: 1, method: 'starknet_chainId', params: [] }]);
    });

    it('uses a configured chain ID without a request', async () => {
        const stub = rpcStub(() => ({}));
        const api = new StarknetChainApi(RPC, { chainId: '0x1234', getUrlFunc: stub.getUrlFunc });

        await expect(api.getChainIdAsync()).resolves.toBe('0x1234');
        expect(stub.requests).toHaveLength(0);
    });

    it('serialises starknet_call and parses the felts', async () => {
        const stub = rpcStub(req => ({ jsonrpc: '2.0', id: req.id, result: ['0x1', '0x15d2'] }));
        const api = new StarknetChainApi(RPC, { getUrlFunc: stub.getUrlFunc });

        const felts = await api.callContractAsync({
            contractAddress: '0xabc',
            entrypoint: 'domain_to_address',
            calldata: [1n, 1499554868251n, 0n],
        });

        expect(felts).toEqual([1n, 0x15d2n]);
        expect(stub.requests[0].method).toBe('starknet_call');
        expect(stub.requests[0].params).toEqual({
            request: {
                contract_address: '0xabc',
                entry_point_selector: Selector.toHex('domain_to_address'),
                calldata: ['0x1', '0x15d246f6c1b', '0x0'],
            },
            block_id: 'latest',
        });
    });

    it('maps contract errors to InvalidContractResult', async () => {
        const stub = rpcStub(req => ({ jsonrpc: '2.0', id: req.id, error: { code: 40, message: 'Contract error' } }));
        const api = new StarknetChainApi(RPC, { getUrlFunc: stub.getUrlFunc });

        await expect(
            api.callContractAsync({ contractAddress: '0xabc', entrypoint: 'address_to_domain', calldata: [1n, 0n] })
        ).rejects.toMatchObject({ kind: 'InvalidContractResult', message: 'starknet_call failed: Contract error' });
    });

    it('maps other JSON-RPC errors to ConnectionError', async () => {
        const stub = rpcStub(req => ({ jsonrpc: '2.0', id: req.id, error: { code: -32603, message: 'Internal error' } }));
        const api = new StarknetChainApi(RPC, { getUrlFunc: stub.getUrlFunc });

        await expect(api.getChainIdAsync()).rejects.toMatchObject({ kind: 'ConnectionError' });
    });

    it('maps HTTP failures to ConnectionError', async () => {
        const stub = rpcStub(() => ({ message: 'down' }), 500);
        const api = new StarknetChainApi(RPC, { getUrlFunc: stub.getUrlFunc });

        await expect(api.getChainIdAsync()).rejects.toMatchObject({ kind: 'ConnectionError' });
    });

    it('fails at once when the node throttles', async () => {
        const stub = rpcStub(() => ({ message: 'slow down' }), 429);
        const api = new StarknetChainApi(RPC, { timeoutMs: 60_000, getUrlFunc: stub.getUrlFunc });

        await expect(api.getChainIdAsync()).rejects.toMatchObject({ kind: 'ConnectionError' });
        expect(stub.requests).toHaveLength(1);
    });

    it('rejects non-array call results', async () => {
        const stub = rpcStub(req => ({ jsonrpc: '2.0', id: req.id, result: '0x1' }));
        const api = new StarknetChainApi(RPC, { getUrlFunc: stub.getUrlFunc });

        await expect(
            api.callContractAsync({ contractAddress: '0xabc', entrypoint: 'domain_to_address', calldata: [] })
        ).rejects.toMatchObject({ kind: 'InvalidContractResult' });
    });

    it('requires an RPC URL', () => {
        expect(() => new StarknetChainApi('')).toThrow('rpcUrl required');
    });
});
