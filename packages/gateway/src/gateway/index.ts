/**
 * Gateway Module
 *
 * Inbound authentication, outbound dispatch, receive strategies and events.
 */

export type {
  InboundMessage,
  ApplicationReceiver,
  FailedMessageEntry,
  ReceiveHandler,
  SendRequest,
} from './types.js';
export type { GatewayEvent, GatewayEventType, EventHandler } from './events.js';
export type { MessageGatewayOptions } from './message-gateway.js';
export type { FailedMessageStore } from './receive-handlers.js';

export { GatewayEventBus } from './events.js';
export { MessageGateway } from './message-gateway.js';
export { BlockingReceiveHandler, NonblockingReceiveHandler } from './receive-handlers.js';
