import { utils } from 'ethers';

/** Keccak-256 of the UTF-8 customer identifier, as 0x-prefixed lowercase hex. */
export function hashCustomerId(customerId: string): string {
  return utils.keccak256(utils.toUtf8Bytes(customerId));
}
