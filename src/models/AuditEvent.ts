/**
 * Audit event models
 */

export type TradeEventType = 'ORDER_CREATED' | 'ORDER_FILLED' | 'ORDER_REJECTED' | 'ORDER_CANCELLED';

export interface AuditEvent {
  eventId: string;
  timestamp: Date;
  eventType: string;
  sessionId?: string;
  details: Record<string, unknown>;
  signature: string;
}

/**
 * Best-effort receiver of trade lifecycle events
 */
export interface AuditSink {
  recordTradeEvent(eventType: TradeEventType, details: Record<string, unknown>): void;
}
