/**
 * Gateway Errors
 *
 * Every rejection is terminal for the call that raised it: no local retry,
 * no partial effect. The `code` is stable and safe to branch on.
 */

export type GatewayErrorCode =
  | 'FORBIDDEN'
  | 'NO_TRUSTED_REMOTE'
  | 'MIN_GAS_LIMIT_NOT_SET'
  | 'GAS_LIMIT_TOO_LOW'
  | 'INVALID_ADAPTER_PARAMS'
  | 'INVALID_MIN_GAS'
  | 'PAYLOAD_TOO_LARGE'
  | 'NO_STORED_MESSAGE'
  | 'INVALID_PAYLOAD'
  | 'TRANSPORT_ERROR';

export abstract class GatewayError extends Error {
  abstract readonly code: GatewayErrorCode;

  constructor(
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Caller is not the transport endpoint (inbound) or not an administrator.
 */
export class ForbiddenError extends GatewayError {
  readonly code = 'FORBIDDEN' as const;
}

/**
 * No path registered for the chain, or the candidate path does not match.
 */
export class NoTrustedRemoteError extends GatewayError {
  readonly code = 'NO_TRUSTED_REMOTE' as const;

  constructor(public readonly remoteChainId: number, message?: string) {
    super(message ?? `No trusted path record for chain ${remoteChainId}`, { remoteChainId });
  }
}

export class MinGasLimitNotSetError extends GatewayError {
  readonly code = 'MIN_GAS_LIMIT_NOT_SET' as const;

  constructor(public readonly dstChainId: number, public readonly messageType: number) {
    super(`Minimum destination gas not set for chain ${dstChainId}, type ${messageType}`, {
      dstChainId,
      messageType,
    });
  }
}

export class GasLimitTooLowError extends GatewayError {
  readonly code = 'GAS_LIMIT_TOO_LOW' as const;

  constructor(public readonly provided: bigint, public readonly required: bigint) {
    super(`Gas limit is too low: provided ${provided}, required ${required}`, {
      provided: provided.toString(),
      required: required.toString(),
    });
  }
}

export class InvalidAdapterParamsError extends GatewayError {
  readonly code = 'INVALID_ADAPTER_PARAMS' as const;

  constructor(public readonly length: number, public readonly minimum: number) {
    super(`Invalid adapter params: ${length} bytes, need at least ${minimum}`, { length, minimum });
  }
}

export class InvalidMinGasError extends GatewayError {
  readonly code = 'INVALID_MIN_GAS' as const;

  constructor(public readonly dstChainId: number, public readonly messageType: number) {
    super(`Invalid minimum gas for chain ${dstChainId}, type ${messageType}: must be greater than zero`, {
      dstChainId,
      messageType,
    });
  }
}

export class PayloadTooLargeError extends GatewayError {
  readonly code = 'PAYLOAD_TOO_LARGE' as const;

  constructor(public readonly size: number, public readonly limit: number) {
    super(`Payload size ${size} exceeds limit ${limit}`, { size, limit });
  }
}

export class NoStoredMessageError extends GatewayError {
  readonly code = 'NO_STORED_MESSAGE' as const;
}

export class InvalidPayloadError extends GatewayError {
  readonly code = 'INVALID_PAYLOAD' as const;
}

/**
 * The endpoint refused or reverted a forwarded call.
 */
export class TransportError extends GatewayError {
  readonly code = 'TRANSPORT_ERROR' as const;
}

export function errorCode(error: unknown): GatewayErrorCode | 'UNKNOWN' {
  return error instanceof GatewayError ? error.code : 'UNKNOWN';
}
