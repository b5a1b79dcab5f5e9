/**
 * Gateway Boundary Invariants
 *
 * Branded identifiers and runtime assertions for every value that crosses the
 * gateway's trust boundary.
 *
 * These invariants are NON-NEGOTIABLE:
 *
 * 1. Chain IDs and message types are uint16
 * 2. Nonces are uint64, gas values are uint256
 * 3. Addresses are 20-byte EVM addresses, compared in checksum form
 * 4. Byte buffers are copied on entry, never aliased into a registry
 *
 * Every registry key goes through one of these constructors before any state
 * is read or written.
 */

import { BytesLike, getAddress, getBytesCopy, hexlify, isAddress } from 'ethers';

// =============================================================================
// BRANDED TYPES (Compile-time enforcement)
// =============================================================================

declare const __brand: unique symbol;
type Brand<T, B> = T & { readonly [__brand]: B };

/**
 * Remote or local chain identifier as the transport numbers it.
 */
export type ChainId = Brand<number, 'ChainId'>;

/**
 * Application-defined payload discriminator, keys the gas floor registry.
 */
export type MessageType = Brand<number, 'MessageType'>;

/**
 * Inbound nonce assigned by the transport per path.
 */
export type Nonce = Brand<bigint, 'Nonce'>;

/**
 * Checksummed 20-byte address.
 */
export type EvmAddress = Brand<string, 'EvmAddress'>;

export const MAX_UINT16 = 0xffff;
export const MAX_UINT64 = (1n << 64n) - 1n;
export const MAX_UINT256 = (1n << 256n) - 1n;
export const ADDRESS_LENGTH = 20;

// =============================================================================
// ASSERTIONS (Runtime enforcement)
// =============================================================================

/**
 * Invariant violation error.
 * If this is thrown, an identifier or buffer failed validation before it
 * could reach a registry or the transport.
 */
export class InvariantViolation extends Error {
  constructor(
    public readonly invariant: string,
    public readonly details: string
  ) {
    super(`INVARIANT VIOLATION: ${invariant} — ${details}`);
    this.name = 'InvariantViolation';
  }
}

export function assertUint16(value: number, name: string): void {
  if (!Number.isInteger(value) || value < 0 || value > MAX_UINT16) {
    throw new InvariantViolation('UINT16', `${name} must be an integer in [0, ${MAX_UINT16}], got ${value}`);
  }
}

export function assertUint256(value: bigint, name: string): void {
  if (value < 0n || value > MAX_UINT256) {
    throw new InvariantViolation('UINT256', `${name} must fit in 256 unsigned bits`);
  }
}

// =============================================================================
// CONSTRUCTORS
// =============================================================================

export function chainId(raw: number): ChainId {
  assertUint16(raw, 'Chain ID');
  return raw as ChainId;
}

export function messageType(raw: number): MessageType {
  assertUint16(raw, 'Message type');
  return raw as MessageType;
}

export function nonce(raw: bigint | number): Nonce {
  if (typeof raw === 'number' && !Number.isSafeInteger(raw)) {
    throw new InvariantViolation('UINT64', `Nonce must be an integer, got ${raw}`);
  }
  const value = BigInt(raw);
  if (value < 0n || value > MAX_UINT64) {
    throw new InvariantViolation('UINT64', `Nonce must fit in 64 unsigned bits, got ${value}`);
  }
  return value as Nonce;
}

export function evmAddress(raw: string): EvmAddress {
  if (!isAddress(raw)) {
    throw new InvariantViolation('EVM_ADDRESS', `${JSON.stringify(raw)} is not a 20-byte address`);
  }
  return getAddress(raw) as EvmAddress;
}

/**
 * Compare a caller identity against an expected address.
 * Malformed identities never match.
 */
export function sameAddress(raw: string, expected: EvmAddress): boolean {
  return isAddress(raw) && getAddress(raw) === expected;
}

// =============================================================================
// BYTES
// =============================================================================

/**
 * Normalize hex or raw bytes into an owned copy.
 */
export function toBytes(value: BytesLike, name: string): Uint8Array {
  try {
    return getBytesCopy(value, name);
  } catch {
    throw new InvariantViolation('BYTES', `${name} must be a byte array or an even-length 0x hex string`);
  }
}

export function concatBytes(...parts: Uint8Array[]): Uint8Array {
  const total = parts.reduce((sum, part) => sum + part.length, 0);
  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function toHex(bytes: Uint8Array): string {
  return hexlify(bytes);
}
