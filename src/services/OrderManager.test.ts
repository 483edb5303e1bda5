import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { OrderManager } from './OrderManager';
import { Order } from '../models/Order';
import { silentLogger } from '../utils/Logger';
import { err, ok } from '../utils/Result';
import { InsufficientCashError, InvalidOrderError } from '../utils/TradingErrors';

const T0 = new Date('2024-03-01T10:00:00.000Z');

function expectOrder(result: ReturnType<OrderManager['createOrder']>): Order {
  if (!result.success) {
    throw result.error;
  }
  return result.value;
}

describe('OrderManager', () => {
  let manager: OrderManager;

  beforeEach(() => {
    manager = new OrderManager({ commissionPct: 0.001, slippagePct: 0.0005 }, silentLogger, () => T0);
  });

  describe('createOrder', () => {
    it('rejects a non-positive quantity', () => {
      const result = manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: -1, orderType: 'market' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidOrderError);
        expect(result.error.code).toBe('INVALID_ORDER');
      }
      expect(manager.getAllOrders()).toHaveLength(0);
    });

    it('rejects a limit order without a price', () => {
      const result = manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'limit' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InvalidOrderError);
      }
    });

    it('rejects stop and stop-limit orders without a stop price', () => {
      const stop = manager.createOrder({ symbol: 'AAPL', side: 'sell', quantity: 1, orderType: 'stop' });
      const stopLimit = manager.createOrder({
        symbol: 'AAPL',
        side: 'sell',
        quantity: 1,
        orderType: 'stop_limit',
        price: 95
      });

      expect(stop.success).toBe(false);
      expect(stopLimit.success).toBe(false);
    });

    it('books a pending order with a formatted id', () => {
      const order = expectOrder(
        manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 5, orderType: 'limit', price: 180 })
      );

      expect(order.orderId).toMatch(/^ORD-[0-9A-F]{12}$/);
      expect(order.status).toBe('pending');
      expect(order.filledQuantity).toBe(0);
      expect(order.createdAt).toEqual(T0);
      expect(manager.getPendingOrders()).toHaveLength(1);
    });
  });

  describe('processTick', () => {
    it('fills a buy limit only when the price is at or below the limit', () => {
      const order = expectOrder(
        manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 10, orderType: 'limit', price: 180 })
      );

      expect(manager.processTick('AAPL', 182, T0)).toHaveLength(0);
      expect(manager.getOrder(order.orderId)?.status).toBe('pending');

      const filled = manager.processTick('AAPL', 179, T0);
      expect(filled).toHaveLength(1);
      expect(filled[0].status).toBe('filled');
      expect(filled[0].filledQuantity).toBe(10);
      expect(filled[0].filledAt).toEqual(T0);
      expect(manager.getPendingOrders()).toHaveLength(0);
    });

    it('fills a sell limit only when the price is at or above the limit', () => {
      manager.createOrder({ symbol: 'AAPL', side: 'sell', quantity: 1, orderType: 'limit', price: 200 });

      expect(manager.processTick('AAPL', 199, T0)).toHaveLength(0);
      expect(manager.processTick('AAPL', 200, T0)).toHaveLength(1);
    });

    it('triggers stops in the adverse direction', () => {
      manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'stop', stopPrice: 110 });
      manager.createOrder({ symbol: 'AAPL', side: 'sell', quantity: 1, orderType: 'stop', stopPrice: 90 });

      expect(manager.processTick('AAPL', 100, T0)).toHaveLength(0);

      const buys = manager.processTick('AAPL', 110, T0);
      expect(buys.map(o => o.side)).toEqual(['buy']);

      const sells = manager.processTick('AAPL', 89, T0);
      expect(sells.map(o => o.side)).toEqual(['sell']);
    });

    it('requires both the stop trigger and the limit for stop-limit orders', () => {
      manager.createOrder({
        symbol: 'AAPL',
        side: 'buy',
        quantity: 1,
        orderType: 'stop_limit',
        stopPrice: 100,
        price: 102
      });

      // below the stop
      expect(manager.processTick('AAPL', 99, T0)).toHaveLength(0);
      // stop triggered, above the limit
      expect(manager.processTick('AAPL', 103, T0)).toHaveLength(0);
      expect(manager.processTick('AAPL', 101, T0)).toHaveLength(1);
    });

    it('applies slippage and commission on the slipped price', () => {
      manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 10, orderType: 'market' });
      manager.createOrder({ symbol: 'AAPL', side: 'sell', quantity: 10, orderType: 'market' });

      const [buy, sell] = manager.processTick('AAPL', 100, T0);

      expect(buy.averageFillPrice).toBeCloseTo(100.05, 10);
      expect(buy.commission).toBeCloseTo(1.0005, 10);
      expect(buy.slippage).toBeCloseTo(0.5, 10);
      expect(sell.averageFillPrice).toBeCloseTo(99.95, 10);
      expect(sell.commission).toBeCloseTo(0.9995, 10);
    });

    it('leaves orders for other symbols untouched', () => {
      manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'market' });
      manager.createOrder({ symbol: 'MSFT', side: 'buy', quantity: 1, orderType: 'market' });

      const filled = manager.processTick('AAPL', 150, T0);

      expect(filled.map(o => o.symbol)).toEqual(['AAPL']);
      expect(manager.getPendingOrders('MSFT')).toHaveLength(1);
    });

    it('rejects an order whose settlement fails', () => {
      const order = expectOrder(manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'market' }));

      const filled = manager.processTick('AAPL', 100, T0, () => err(new InsufficientCashError(100, 10)));

      expect(filled).toHaveLength(0);
      const stored = manager.getOrder(order.orderId);
      expect(stored?.status).toBe('rejected');
      expect(stored?.rejectionReason).toBe('Insufficient cash: required 100.00, available 10.00');
      expect(manager.getPendingOrders()).toHaveLength(0);
    });

    it('passes the computed fill to the settlement handler', () => {
      manager.createOrder({ symbol: 'AAPL', side: 'sell', quantity: 2, orderType: 'market' });
      const seen: number[] = [];

      manager.processTick('AAPL', 50, T0, (_order, fill) => {
        seen.push(fill.fillPrice, fill.tickPrice);
        return ok(undefined);
      });

      expect(seen[0]).toBeCloseTo(49.975, 10);
      expect(seen[1]).toBe(50);
    });
  });

  describe('cancelOrder', () => {
    it('cancels pending orders only', () => {
      const pending = expectOrder(
        manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'limit', price: 10 })
      );
      const market = expectOrder(manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'market' }));
      manager.processTick('AAPL', 20, T0);

      expect(manager.cancelOrder(market.orderId)).toBe(false);
      expect(manager.cancelOrder('ORD-UNKNOWN')).toBe(false);
      expect(manager.cancelOrder(pending.orderId)).toBe(true);
      expect(manager.getOrder(pending.orderId)?.status).toBe('cancelled');
      expect(manager.cancelOrder(pending.orderId)).toBe(false);
    });

    it('never fills a cancelled order', () => {
      const order = expectOrder(
        manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'limit', price: 100 })
      );
      manager.cancelOrder(order.orderId);

      expect(manager.processTick('AAPL', 90, T0)).toHaveLength(0);
      expect(manager.getOrder(order.orderId)?.status).toBe('cancelled');
    });
  });

  describe('getStatistics', () => {
    it('counts orders by status and sums fill costs', () => {
      manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 10, orderType: 'market' });
      const limit = expectOrder(
        manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'limit', price: 1 })
      );
      manager.createOrder({ symbol: 'AAPL', side: 'buy', quantity: 1, orderType: 'limit', price: 2 });
      manager.processTick('AAPL', 100, T0);
      manager.cancelOrder(limit.orderId);

      const stats = manager.getStatistics();
      expect(stats.totalOrders).toBe(3);
      expect(stats.filledOrders).toBe(1);
      expect(stats.pendingOrders).toBe(1);
      expect(stats.cancelledOrders).toBe(1);
      expect(stats.rejectedOrders).toBe(0);
      expect(stats.totalCommission).toBeCloseTo(1.0005, 10);
      expect(stats.totalSlippage).toBeCloseTo(0.5, 10);
    });
  });

  describe('Property-Based Tests', () => {
    it('fills every order at most once and never reopens terminal orders', () => {
      fc.assert(
        fc.property(
          fc.array(
            fc.record({
              side: fc.constantFrom<'buy' | 'sell'>('buy', 'sell'),
              limit: fc.integer({ min: 50, max: 150 })
            }),
            { minLength: 1, maxLength: 20 }
          ),
          fc.array(fc.integer({ min: 40, max: 160 }), { minLength: 1, maxLength: 30 }),
          (requests, ticks) => {
            const local = new OrderManager({}, silentLogger, () => T0);
            for (const request of requests) {
              local.createOrder({
                symbol: 'XYZ',
                side: request.side,
                quantity: 1,
                orderType: 'limit',
                price: request.limit
              });
            }

            const seen = new Set<string>();
            for (const tick of ticks) {
              for (const order of local.processTick('XYZ', tick, T0)) {
                expect(seen.has(order.orderId)).toBe(false);
                seen.add(order.orderId);
                expect(order.filledQuantity).toBe(order.quantity);
              }
            }

            const stats = local.getStatistics();
            expect(stats.filledOrders + stats.pendingOrders).toBe(requests.length);
            expect(stats.filledOrders).toBe(seen.size);
          }
        ),
        { numRuns: 100 }
      );
    });
  });
});
