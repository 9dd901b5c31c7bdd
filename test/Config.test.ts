import { afterEach, describe, expect, it, vi } from 'vitest';

import { GlobalConfig, loadConfig } from '../src/Config';
import { ResolutionError } from '../src/Errors';
import { createLogger } from '../src/log';
import { NameResolver } from '../src/NameResolver';

describe('loadConfig', () => {
    it('falls back to defaults', () => {
        expect(loadConfig({})).toEqual({
            rpcUrl: null,
            namingContract: null,
            chainId: null,
            timeoutMs: 30_000,
        });
    });

    it('reads the environment', () => {
        expect(
            loadConfig({
                STARKNET_RPC_URL: ' http://127.0.0.1:5050/rpc ',
                NAMING_CONTRACT_ADDRESS: '0xabc',
                STARKNET_CHAIN_ID: '0x534e5f4d41494e',
                NAMING_RPC_TIMEOUT_MS: '5000',
            })
        ).toEqual({
            rpcUrl: 'http://127.0.0.1:5050/rpc',
            namingContract: '0xabc',
            chainId: '0x534e5f4d41494e',
            timeoutMs: 5000,
        });
    });

    it('rejects a bad timeout', () => {
        expect(() => loadConfig({ NAMING_RPC_TIMEOUT_MS: '-1' })).toThrow(
            "NAMING_RPC_TIMEOUT_MS must be a positive integer, got '-1'"
        );
    });

    it('needs an RPC URL to build a resolver', () => {
        expect(() => NameResolver.fromConfig(loadConfig({}))).toThrow('STARKNET_RPC_URL is not configured');
    });

    it('builds a resolver with an explicit contract', async () => {
        const resolver = NameResolver.fromConfig(
            loadConfig({ STARKNET_RPC_URL: 'http://127.0.0.1:5050/rpc', NAMING_CONTRACT_ADDRESS: '0xabc' })
        );
        await expect(resolver.getNamingContractAsync()).resolves.toBe('0xabc');
    });
});

describe('GlobalConfig.namingContractFor', () => {
    it('accepts chain IDs in any case', () => {
        expect(GlobalConfig.namingContractFor('0x534E5F4D41494E')).toBe(
            '0x6ac597f8116f886fa1c97a23fa4e08299975ecaf6b598873ca6792b9bbfb678'
        );
    });

    it('throws ResolutionNotSupported for unknown chains', () => {
        expect(() => GlobalConfig.namingContractFor('0x1')).toThrow(ResolutionError);
        expect(() => GlobalConfig.namingContractFor('0x1')).toThrow('No naming contract known for chain 0x1');
    });
});

/* ------------------------------------------------------------------ */
/* logger                                                             */
/* ------------------------------------------------------------------ */

describe('createLogger', () => {
    const saved = { level: process.env.NAMING_LOG_LEVEL, filter: process.env.NAMING_LOG_FILTER };

    function restore(key: string, value: string | undefined) {
        if (value === undefined) {
            delete process.env[key];
        } else {
            process.env[key] = value;
        }
    }

    afterEach(() => {
        restore('NAMING_LOG_LEVEL', saved.level);
        restore('NAMING_LOG_FILTER', saved.filter);
        vi.restoreAllMocks();
    });

    it('prefixes lines with level and category', () => {
        process.env.NAMING_LOG_LEVEL = 'info';
        delete process.env.NAMING_LOG_FILTER;
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('chain:rpc').info('hello');
        createLogger('chain:rpc').debug('hidden');

        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy.mock.calls[0][0]).toMatch(/^\[StarkNaming\] \[[^\]]+\] \[INFO\] \[chain:rpc\] hello$/);
    });

    it('drops categories outside the filter', () => {
        process.env.NAMING_LOG_LEVEL = 'trace';
        process.env.NAMING_LOG_FILTER = 'resolver';
        const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);

        createLogger('chain:rpc').info('hello');
        expect(spy).not.toHaveBeenCalled();
    });

    it('logs and rethrows failures of timed operations', async () => {
        process.env.NAMING_LOG_LEVEL = 'error';
        delete process.env.NAMING_LOG_FILTER;
        const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

        const failing = createLogger('resolver').time('lookup', async () => {
            throw new Error('boom');
        });

        await expect(failing).rejects.toThrow('boom');
        expect(spy).toHaveBeenCalledTimes(1);
        expect(spy.mock.calls[0][1]).toEqual({ error: 'boom' });
    });
});
