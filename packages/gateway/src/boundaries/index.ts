/**
 * Gateway Boundaries Module
 *
 * Exports branded identifiers and the assertions that guard them.
 */

// Type-only exports
export type {
  ChainId,
  MessageType,
  Nonce,
  EvmAddress,
} from './invariants.js';

// Value exports
export {
  // Constants
  MAX_UINT16,
  MAX_UINT64,
  MAX_UINT256,
  ADDRESS_LENGTH,

  // Assertions
  InvariantViolation,
  assertUint16,
  assertUint256,

  // Type constructors
  chainId,
  messageType,
  nonce,
  evmAddress,
  sameAddress,

  // Bytes
  toBytes,
  concatBytes,
  bytesEqual,
  toHex,
} from './invariants.js';
