/**
 * Adapter Params Codec
 *
 * Layout (big-endian, tightly packed):
 *
 *   v1: uint16 version | uint256 gasLimit                                   (34 bytes)
 *   v2: uint16 version | uint256 gasLimit | uint256 nativeForDst | address  (86 bytes)
 *
 * Only the gas limit is interpreted locally; everything after it belongs to
 * the transport.
 */

import { BytesLike, getBytes, solidityPacked, toBigInt } from 'ethers';
import { assertUint256, evmAddress, toBytes } from '../boundaries/index.js';
import { InvalidAdapterParamsError } from '../errors/index.js';

export const ADAPTER_PARAMS_VERSION_1 = 1;
export const ADAPTER_PARAMS_VERSION_2 = 2;

const VERSION_LENGTH = 2;
const GAS_LIMIT_LENGTH = 32;

/**
 * Version tag plus one uint256.
 */
export const ADAPTER_PARAMS_MIN_LENGTH = VERSION_LENGTH + GAS_LIMIT_LENGTH;

/**
 * Read the destination gas limit.
 * The length precondition is checked before any byte is read; trailing bytes
 * are ignored.
 */
export function decodeGasLimit(adapterParams: BytesLike): bigint {
  const bytes = toBytes(adapterParams, 'adapter params');
  if (bytes.length < ADAPTER_PARAMS_MIN_LENGTH) {
    throw new InvalidAdapterParamsError(bytes.length, ADAPTER_PARAMS_MIN_LENGTH);
  }
  return toBigInt(bytes.subarray(VERSION_LENGTH, ADAPTER_PARAMS_MIN_LENGTH));
}

export function encodeAdapterParamsV1(gasLimit: bigint): Uint8Array {
  assertUint256(gasLimit, 'gasLimit');
  return getBytes(solidityPacked(['uint16', 'uint256'], [ADAPTER_PARAMS_VERSION_1, gasLimit]));
}

/**
 * v2 additionally asks the transport to airdrop `nativeForDst` to `airdropAddress`
 * on the destination chain.
 */
export function encodeAdapterParamsV2(
  gasLimit: bigint,
  nativeForDst: bigint,
  airdropAddress: string
): Uint8Array {
  assertUint256(gasLimit, 'gasLimit');
  assertUint256(nativeForDst, 'nativeForDst');
  return getBytes(solidityPacked(
    ['uint16', 'uint256', 'uint256', 'address'],
    [ADAPTER_PARAMS_VERSION_2, gasLimit, nativeForDst, evmAddress(airdropAddress)]
  ));
}
