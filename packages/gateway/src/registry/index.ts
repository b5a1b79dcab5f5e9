/**
 * Registry Module
 *
 * Per-gateway keyed policy state: trusted paths, gas floors, payload limits.
 */

export type { TrustedPathEntry } from './path-registry.js';
export type { MinGasEntry } from './gas-policy.js';
export type { PayloadSizeEntry } from './payload-size.js';

export { PathRegistry } from './path-registry.js';
export { GasPolicy } from './gas-policy.js';
export { PayloadSizePolicy, DEFAULT_PAYLOAD_SIZE_LIMIT } from './payload-size.js';
export {
  ADAPTER_PARAMS_MIN_LENGTH,
  ADAPTER_PARAMS_VERSION_1,
  ADAPTER_PARAMS_VERSION_2,
  decodeGasLimit,
  encodeAdapterParamsV1,
  encodeAdapterParamsV2,
} from './adapter-params.js';
