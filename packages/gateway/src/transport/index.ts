/**
 * Transport Module
 *
 * Endpoint implementations:
 * - On-chain endpoint (ethers.js)
 * - In-process loopback
 */

// Type-only exports
export type {
  DispatchRequest,
  SendReceipt,
  FeeQuote,
  Transport,
  InboundDelivery,
  InboundReceiver,
} from './types.js';
export type { DeliveryRecord, DeliveryStatus, StoredPayload } from './loopback-endpoint.js';

// Value exports
export { EthersEndpointTransport, createEndpointTransport, ENDPOINT_ABI } from './ethers-endpoint.js';
export { LoopbackEndpoint } from './loopback-endpoint.js';
