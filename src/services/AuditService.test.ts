import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { AuditService } from './AuditService';

const SIGNING_KEY = Buffer.from('test-secret-test-secret-test-sec');

describe('AuditService', () => {
  let auditService: AuditService;

  beforeEach(() => {
    auditService = new AuditService(SIGNING_KEY, 'session-1');
  });

  it('records trade events with the session id and a signature', () => {
    auditService.recordTradeEvent('ORDER_CREATED', { orderId: 'ORD-000000000001', symbol: 'AAPL', quantity: 10 });

    const events = auditService.getAllEvents();
    expect(events).toHaveLength(1);
    expect(events[0].eventType).toBe('ORDER_CREATED');
    expect(events[0].sessionId).toBe('session-1');
    expect(events[0].details).toEqual({ orderId: 'ORD-000000000001', symbol: 'AAPL', quantity: 10 });
    expect(events[0].signature).toMatch(/^[0-9a-f]{64}$/);
    expect(auditService.verifyLogIntegrity()).toBe(true);
  });

  it('detects tampering with a recorded event', () => {
    auditService.recordTradeEvent('ORDER_FILLED', { orderId: 'ORD-000000000002', quantity: 5 });

    const [event] = auditService.getAllEvents();
    event.details.quantity = 500;

    expect(auditService.verifyLogIntegrity()).toBe(false);
  });

  it('filters exports by date range', () => {
    let clock = new Date('2024-01-01T00:00:00.000Z');
    const timed = new AuditService(SIGNING_KEY, undefined, () => clock);

    timed.logEvent('CONFIG_CHANGE', { section: 'risk' });
    clock = new Date('2024-01-10T00:00:00.000Z');
    timed.logEvent('CONFIG_CHANGE', { section: 'runner' });

    const exported = timed.exportAuditLog(new Date('2024-01-05T00:00:00.000Z'));

    expect(exported.map(e => e.details.section)).toEqual(['runner']);
    expect(timed.getEventsByType('CONFIG_CHANGE')).toHaveLength(2);
  });

  describe('Property-Based Tests', () => {
    it('redacts sensitive fields at every depth and keeps the rest', () => {
      fc.assert(
        fc.property(
          fc.record({
            apiKey: fc.string({ minLength: 1, maxLength: 20 }),
            password: fc.string({ minLength: 1, maxLength: 20 }),
            symbol: fc.string({ maxLength: 10 }),
            nested: fc.record({
              token: fc.string(),
              quantity: fc.integer()
            }),
            legs: fc.array(fc.record({ secret: fc.string(), side: fc.constantFrom('buy', 'sell') }), { maxLength: 3 })
          }),
          details => {
            auditService.clearLog();
            auditService.logEvent('ORDER_CREATED', details);

            const [event] = auditService.exportAuditLog();
            expect(event.details.apiKey).toBe('[REDACTED]');
            expect(event.details.password).toBe('[REDACTED]');
            expect(event.details.symbol).toBe(details.symbol);
            expect(event.details.nested).toEqual({ token: '[REDACTED]', quantity: details.nested.quantity });
            expect(event.details.legs).toEqual(details.legs.map(leg => ({ secret: '[REDACTED]', side: leg.side })));
            expect(auditService.verifyLogIntegrity()).toBe(true);
          }
        ),
        { numRuns: 100 }
      );
    });

    it('exports every recorded event in order', () => {
      fc.assert(
        fc.property(
          fc.array(fc.constantFrom('ORDER_CREATED', 'ORDER_FILLED', 'ORDER_REJECTED', 'ORDER_CANCELLED'), {
            minLength: 1,
            maxLength: 20
          }),
          eventTypes => {
            auditService.clearLog();
            const ids = eventTypes.map(type => auditService.logEvent(type, { type }));

            const exported = auditService.exportAuditLog();
            expect(exported.map(e => e.eventId)).toEqual(ids);
            expect(exported.map(e => e.eventType)).toEqual(eventTypes);
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
