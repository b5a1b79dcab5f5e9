/**
 * Errors Module
 */

export type { GatewayErrorCode } from './gateway-errors.js';

export {
  GatewayError,
  ForbiddenError,
  NoTrustedRemoteError,
  MinGasLimitNotSetError,
  GasLimitTooLowError,
  InvalidAdapterParamsError,
  InvalidMinGasError,
  PayloadTooLargeError,
  NoStoredMessageError,
  InvalidPayloadError,
  TransportError,
  errorCode,
} from './gateway-errors.js';
