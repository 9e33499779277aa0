import { hashCustomerId } from './customer-hash';

describe('hashCustomerId', () => {
  it('returns the keccak-256 digest as 0x-prefixed lowercase hex', () => {
    expect(hashCustomerId('')).toBe('0xc5d2460186f7233c927e7db2dcc703c0e500b653ca82273b7bfad8045d85a470');
    expect(hashCustomerId('hello')).toBe('0x1c8aff950685c2ed4bc3174f3472287b56d9517b9c948127319a09a7a36deac8');
  });

  it('is fixed width and distinguishes identifiers', () => {
    const hash = hashCustomerId('USER123');
    expect(hash).toMatch(/^0x[0-9a-f]{64}$/);
    expect(hashCustomerId('USER123')).toBe(hash);
    expect(hashCustomerId('USER124')).not.toBe(hash);
  });
});
