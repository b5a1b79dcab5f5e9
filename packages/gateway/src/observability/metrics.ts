/**
 * Metrics Interface
 *
 * Write-only signals for observability.
 *
 * HARD CONSTRAINT: the gateway must NEVER read metrics or act on them.
 * Metrics are purely for external monitoring.
 *
 * Default implementation is no-op.
 * Production can inject Prometheus, StatsD, etc.
 */

// =============================================================================
// METRICS INTERFACE
// =============================================================================

/**
 * Write-only metrics sink.
 *
 * All methods are fire-and-forget.
 * Implementations must never throw.
 */
export interface GatewayMetrics {
  // =========================================================================
  // Inbound
  // =========================================================================

  /**
   * Message authenticated and handed to the receive handler.
   */
  messageAccepted(srcChainId: number): void;

  /**
   * Message dropped before reaching the receive handler.
   */
  messageRejected(srcChainId: number, errorCode: string): void;

  /**
   * Application failed on a message; stored for retry.
   */
  messageFailed(srcChainId: number): void;

  /**
   * Stored message retried successfully.
   */
  messageRetried(srcChainId: number): void;

  // =========================================================================
  // Outbound
  // =========================================================================

  /**
   * Payload handed to the transport.
   */
  messageSent(dstChainId: number, payloadSize: number): void;

  /**
   * Send refused before any transport call.
   */
  sendRejected(dstChainId: number, errorCode: string): void;

  // =========================================================================
  // Administration
  // =========================================================================

  adminMutation(operation: string): void;

  adminDenied(operation: string): void;
}

// =============================================================================
// NO-OP IMPLEMENTATION (Default)
// =============================================================================

export class NoOpMetrics implements GatewayMetrics {
  messageAccepted(_srcChainId: number): void {}
  messageRejected(_srcChainId: number, _errorCode: string): void {}
  messageFailed(_srcChainId: number): void {}
  messageRetried(_srcChainId: number): void {}

  messageSent(_dstChainId: number, _payloadSize: number): void {}
  sendRejected(_dstChainId: number, _errorCode: string): void {}

  adminMutation(_operation: string): void {}
  adminDenied(_operation: string): void {}
}

// =============================================================================
// CONSOLE METRICS (for development)
// =============================================================================

/**
 * Logs every signal to stdout as one JSON line.
 */
export class ConsoleMetrics implements GatewayMetrics {
  private log(category: string, event: string, data: Record<string, unknown>): void {
    console.log(JSON.stringify({
      timestamp: new Date().toISOString(),
      category,
      event,
      ...data,
    }));
  }

  messageAccepted(srcChainId: number): void {
    this.log('inbound', 'accepted', { srcChainId });
  }

  messageRejected(srcChainId: number, errorCode: string): void {
    this.log('inbound', 'rejected', { srcChainId, errorCode });
  }

  messageFailed(srcChainId: number): void {
    this.log('inbound', 'failed', { srcChainId });
  }

  messageRetried(srcChainId: number): void {
    this.log('inbound', 'retried', { srcChainId });
  }

  messageSent(dstChainId: number, payloadSize: number): void {
    this.log('outbound', 'sent', { dstChainId, payloadSize });
  }

  sendRejected(dstChainId: number, errorCode: string): void {
    this.log('outbound', 'rejected', { dstChainId, errorCode });
  }

  adminMutation(operation: string): void {
    this.log('admin', 'mutation', { operation });
  }

  adminDenied(operation: string): void {
    this.log('admin', 'denied', { operation });
  }
}
