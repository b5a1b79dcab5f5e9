/**
 * HTTP Admin API Routes
 *
 * Thin controllers - authenticate, validate input, call the admin surface,
 * return state. The bearer token resolves to a caller address before the body
 * is read; the admin surface decides what that caller may do.
 *
 * Bytes are 0x hex strings, gas values are decimal strings.
 */

import { Router, Request, Response, NextFunction } from 'express';
import { InvariantViolation, toHex } from '../boundaries/index.js';
import type { AdminContext, AdminSurface } from '../admin/index.js';
import {
  ForbiddenError,
  GatewayError,
  NoStoredMessageError,
  NoTrustedRemoteError,
} from '../errors/index.js';
import type { NonblockingReceiveHandler } from '../gateway/index.js';
import { Logger } from '../utils/logger.js';

// =============================================================================
// VALIDATION
// =============================================================================

class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

function bodyField(req: Request, fieldName: string): unknown {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null) {
    throw new ValidationError('Request body must be a JSON object');
  }
  const value: unknown = Object.getOwnPropertyDescriptor(body, fieldName)?.value;
  return value;
}

function validateString(value: unknown, fieldName: string): string {
  if (typeof value !== 'string') {
    throw new ValidationError(`${fieldName} must be a string`);
  }
  return value;
}

function validateHexString(value: unknown, fieldName: string): string {
  const text = validateString(value, fieldName);
  if (!text.startsWith('0x')) {
    throw new ValidationError(`${fieldName} must start with 0x`);
  }
  return text;
}

function validatePositiveInteger(value: unknown, fieldName: string): number {
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`);
  }
  return value;
}

function validateIntegerParam(value: string | undefined, fieldName: string): number {
  if (value === undefined || !/^\d+$/.test(value)) {
    throw new ValidationError(`${fieldName} must be a non-negative integer`);
  }
  return Number(value);
}

function validateDecimalString(value: unknown, fieldName: string): bigint {
  if (typeof value !== 'string' || !/^\d+$/.test(value)) {
    throw new ValidationError(`${fieldName} must be a decimal string`);
  }
  return BigInt(value);
}

// =============================================================================
// CALLER RESOLUTION
// =============================================================================

/**
 * Bearer token -> caller address.
 */
export type AdminCredentials = ReadonlyMap<string, string>;

function bearerToken(req: Request): string {
  const header = req.header('authorization') ?? '';
  return header.startsWith('Bearer ') ? header.slice('Bearer '.length).trim() : '';
}

function resolveCaller(req: Request, credentials: AdminCredentials): AdminContext {
  const caller = credentials.get(bearerToken(req));
  if (caller === undefined) {
    throw new ForbiddenError('Unknown admin credential');
  }
  return { caller };
}

// =============================================================================
// ROUTE FACTORY
// =============================================================================

export function createAdminRoutes(
  admin: AdminSurface,
  credentials: AdminCredentials,
  logger: Logger,
  options?: {
    /** Exposes POST /retry-message when the gateway receives non-blocking. */
    retryHandler?: NonblockingReceiveHandler;
  }
): Router {
  const router = Router();

  // ===========================================================================
  // Trusted paths
  // ===========================================================================
  router.get(
    '/trusted-remotes/:chainId',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const path = admin.getTrustedRemote(chainId);
        res.json({ chainId, path: toHex(path), trusted: path.length > 0 });
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/trusted-remotes/:chainId',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const path = validateHexString(bodyField(req, 'path'), 'path');

        await admin.setTrustedRemote(ctx, chainId, path);

        res.json({ chainId, path: toHex(admin.getTrustedRemote(chainId)) });
      } catch (error) {
        next(error);
      }
    }
  );

  router.get(
    '/trusted-remotes/:chainId/address',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        res.json({ chainId, remoteAddress: toHex(admin.getTrustedRemoteAddress(chainId)) });
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/trusted-remotes/:chainId/address',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const remoteAddress = validateHexString(bodyField(req, 'remoteAddress'), 'remoteAddress');

        await admin.setTrustedRemoteAddress(ctx, chainId, remoteAddress);

        res.json({ chainId, path: toHex(admin.getTrustedRemote(chainId)) });
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/trusted-remotes/:chainId/verify',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const path = validateHexString(bodyField(req, 'path'), 'path');
        res.json({ chainId, trusted: admin.isTrustedRemote(chainId, path) });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Gas floors
  // ===========================================================================
  router.get(
    '/min-dst-gas/:chainId/:messageType',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const messageType = validateIntegerParam(req.params.messageType, 'messageType');
        res.json({ chainId, messageType, minGas: admin.getMinDstGas(chainId, messageType).toString() });
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/min-dst-gas/:chainId/:messageType',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const messageType = validateIntegerParam(req.params.messageType, 'messageType');
        const minGas = validateDecimalString(bodyField(req, 'minGas'), 'minGas');

        await admin.setMinDstGas(ctx, chainId, messageType, minGas);

        res.json({ chainId, messageType, minGas: minGas.toString() });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Payload size
  // ===========================================================================
  router.get(
    '/payload-size-limits/:chainId',
    (req: Request, res: Response, next: NextFunction) => {
      try {
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        res.json({ chainId, size: admin.getPayloadSizeLimit(chainId) });
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/payload-size-limits/:chainId',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const size = validatePositiveInteger(bodyField(req, 'size'), 'size');

        await admin.setPayloadSizeLimit(ctx, chainId, size);

        res.json({ chainId, size });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Precrime
  // ===========================================================================
  router.get('/precrime', (_req: Request, res: Response) => {
    res.json({ precrime: admin.getPrecrime() });
  });

  router.put(
    '/precrime',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const precrime = validateString(bodyField(req, 'precrime'), 'precrime');

        await admin.setPrecrime(ctx, precrime);

        res.json({ precrime: admin.getPrecrime() });
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Transport configuration
  // ===========================================================================
  router.get(
    '/config/:version/:chainId/:configType',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const version = validateIntegerParam(req.params.version, 'version');
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const configType = validateIntegerParam(req.params.configType, 'configType');

        const config = await admin.getConfig(version, chainId, configType);

        res.json({ version, chainId, configType, config: toHex(config) });
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/config/:version/:chainId/:configType',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const version = validateIntegerParam(req.params.version, 'version');
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const configType = validateIntegerParam(req.params.configType, 'configType');
        const config = validateHexString(bodyField(req, 'config'), 'config');

        await admin.setConfig(ctx, version, chainId, configType, config);

        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/send-version',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const version = validatePositiveInteger(bodyField(req, 'version'), 'version');
        await admin.setSendVersion(ctx, version);
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  router.put(
    '/receive-version',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const version = validatePositiveInteger(bodyField(req, 'version'), 'version');
        await admin.setReceiveVersion(ctx, version);
        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  router.post(
    '/force-resume-receive/:chainId',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const ctx = resolveCaller(req, credentials);
        const chainId = validateIntegerParam(req.params.chainId, 'chainId');
        const srcAddress = validateHexString(bodyField(req, 'srcAddress'), 'srcAddress');

        await admin.forceResumeReceive(ctx, chainId, srcAddress);

        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  // ===========================================================================
  // Stored message retry (open to any caller holding the payload)
  // ===========================================================================
  const retryHandler = options?.retryHandler;
  if (retryHandler) {
    router.post(
      '/retry-message',
      async (req: Request, res: Response, next: NextFunction) => {
        try {
          const srcChainId = validatePositiveInteger(bodyField(req, 'srcChainId'), 'srcChainId');
          const srcAddress = validateHexString(bodyField(req, 'srcAddress'), 'srcAddress');
          const nonce = validateDecimalString(bodyField(req, 'nonce'), 'nonce');
          const payload = validateHexString(bodyField(req, 'payload'), 'payload');

          logger.info({ chainId: srcChainId, nonce }, 'Retrying stored message');
          await retryHandler.retryMessage(srcChainId, srcAddress, nonce, payload);

          res.status(204).end();
        } catch (error) {
          next(error);
        }
      }
    );
  }

  // ===========================================================================
  // Health check
  // ===========================================================================
  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return router;
}

// =============================================================================
// INBOUND RELAY
// =============================================================================

/**
 * The inbound side of an endpoint transport. The relay token is the channel's
 * credential; the transport decides which identity it delivers as.
 */
export interface RelayChannel {
  acceptsRelayToken(token: string): boolean;
  relay(token: string, srcChainId: number, srcAddress: string, nonce: bigint, payload: string): Promise<void>;
}

export function createRelayRoutes(channel: RelayChannel, logger: Logger): Router {
  const router = Router();

  router.post(
    '/relay',
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const token = bearerToken(req);
        if (!channel.acceptsRelayToken(token)) {
          throw new ForbiddenError('Unknown relay credential');
        }
        const srcChainId = validatePositiveInteger(bodyField(req, 'srcChainId'), 'srcChainId');
        const srcAddress = validateHexString(bodyField(req, 'srcAddress'), 'srcAddress');
        const nonce = validateDecimalString(bodyField(req, 'nonce'), 'nonce');
        const payload = validateHexString(bodyField(req, 'payload'), 'payload');

        logger.debug({ chainId: srcChainId, nonce }, 'Relayed delivery');
        await channel.relay(token, srcChainId, srcAddress, nonce, payload);

        res.status(204).end();
      } catch (error) {
        next(error);
      }
    }
  );

  return router;
}

// =============================================================================
// ERROR HANDLER MIDDLEWARE
// =============================================================================

export function errorHandler(logger: Logger) {
  return (err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ForbiddenError) {
      res.status(403).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof NoTrustedRemoteError || err instanceof NoStoredMessageError) {
      res.status(404).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof GatewayError) {
      res.status(400).json({ error: err.message, code: err.code });
      return;
    }
    if (err instanceof ValidationError || err instanceof InvariantViolation) {
      res.status(400).json({ error: err.message });
      return;
    }
    // express.json() parse failures
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }

    logger.error({ error: err }, 'Unhandled error');
    res.status(500).json({ error: 'Internal server error' });
  };
}
