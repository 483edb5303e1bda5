import { createHmac, randomBytes } from 'crypto';
import { AuditEvent, AuditSink, TradeEventType } from '../models/AuditEvent';

const REDACTED = '[REDACTED]';

const SENSITIVE_KEYS = ['apikey', 'secret', 'password', 'privatekey', 'credential', 'token'];

/**
 * Audit Service provides tamper-evident logging of trade and configuration events
 * with HMAC signatures over a canonical encoding
 */
export class AuditService implements AuditSink {
  private auditLog: AuditEvent[] = [];
  private readonly signingKey: Buffer;
  private readonly sessionId?: string;
  private readonly now: () => Date;

  constructor(signingKey?: Buffer, sessionId?: string, now: () => Date = () => new Date()) {
    // A fresh key per process unless one is supplied
    this.signingKey = signingKey ?? randomBytes(32);
    this.sessionId = sessionId;
    this.now = now;
  }

  /**
   * Records an event with sensitive fields redacted before signing
   */
  logEvent(eventType: string, details: Record<string, unknown>): string {
    const event = this.buildEvent(eventType, this.redactSensitiveData(details));
    this.auditLog.push(event);
    return event.eventId;
  }

  recordTradeEvent(eventType: TradeEventType, details: Record<string, unknown>): void {
    this.logEvent(eventType, details);
  }

  exportAuditLog(startDate?: Date, endDate?: Date): AuditEvent[] {
    return this.auditLog
      .filter(event => {
        if (startDate && event.timestamp < startDate) return false;
        if (endDate && event.timestamp > endDate) return false;
        return true;
      })
      .map(event => ({ ...event, details: this.redactSensitiveData(event.details) }));
  }

  /**
   * Recomputes every signature; false if any event was altered after it was recorded
   */
  verifyLogIntegrity(): boolean {
    return this.auditLog.every(event => event.signature === this.generateSignature(event));
  }

  getAllEvents(): AuditEvent[] {
    return [...this.auditLog];
  }

  getEventsByType(eventType: string): AuditEvent[] {
    return this.auditLog.filter(event => event.eventType === eventType);
  }

  clearLog(): void {
    this.auditLog = [];
  }

  private buildEvent(eventType: string, details: Record<string, unknown>): AuditEvent {
    const unsigned = {
      eventId: randomBytes(16).toString('hex'),
      timestamp: this.now(),
      eventType,
      sessionId: this.sessionId,
      details
    };
    return { ...unsigned, signature: this.generateSignature(unsigned) };
  }

  private generateSignature(event: Omit<AuditEvent, 'signature'>): string {
    const signingData = {
      eventId: event.eventId,
      timestamp: event.timestamp.toISOString(),
      eventType: event.eventType,
      sessionId: event.sessionId ?? null,
      details: canonicalJson(event.details)
    };

    return createHmac('sha256', this.signingKey)
      .update(canonicalJson(signingData))
      .digest('hex');
  }

  private redactSensitiveData(data: Record<string, unknown>): Record<string, unknown> {
    const redacted: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      const lowerKey = key.toLowerCase();
      if (SENSITIVE_KEYS.some(sensitive => lowerKey.includes(sensitive))) {
        redacted[key] = REDACTED;
      } else if (Array.isArray(value)) {
        redacted[key] = value.map(item => (isPlainObject(item) ? this.redactSensitiveData(item) : item));
      } else if (isPlainObject(value)) {
        redacted[key] = this.redactSensitiveData(value);
      } else {
        redacted[key] = value;
      }
    }

    return redacted;
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/**
 * JSON with object keys sorted at every depth
 */
function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (isPlainObject(value)) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      sorted[key] = sortKeys(value[key]);
    }
    return sorted;
  }
  return value;
}
