export const FIELD_PRIME = 2n ** 251n + 17n * 2n ** 192n + 1n;
export const MASK_250 = 2n ** 250n - 1n;
export const STARK_SUFFIX = '.stark';
export const FELT_HEX_RX = /^0x[0-9a-fA-F]{1,64}$/;

export function isFieldElement(value: bigint): boolean {
  return value >= 0n && value < FIELD_PRIME;
}
