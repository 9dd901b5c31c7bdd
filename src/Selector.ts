import { keccak256 } from 'js-sha3';
import { MASK_250 } from './consts';

/**
 * Starknet entry-point selectors (`starknet_keccak`): keccak-256 of the
 * function name, truncated to 250 bits.
 */
export class Selector {
  public static fromName(name: string): bigint {
    return BigInt('0x' + keccak256(name)) & MASK_250;
  }

  public static toHex(name: string): string {
    return '0x' + Selector.fromName(name).toString(16);
  }
}
