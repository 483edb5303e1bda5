import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { PortfolioManager } from './PortfolioManager';
import { silentLogger } from '../utils/Logger';
import { InsufficientCashError, NoPositionError, OverCloseError } from '../utils/TradingErrors';

const OPENED = new Date('2024-01-02T15:00:00.000Z');
const CLOSED = new Date('2024-01-05T15:00:00.000Z');

describe('PortfolioManager', () => {
  let portfolio: PortfolioManager;

  beforeEach(() => {
    portfolio = new PortfolioManager(10000, silentLogger, () => OPENED);
  });

  describe('openOrAdd', () => {
    it('merges additions with weighted-average cost', () => {
      portfolio.openOrAdd('AAPL', 10, 100, 0);
      const result = portfolio.openOrAdd('AAPL', 10, 120, 0);

      expect(result.success).toBe(true);
      const position = portfolio.getPosition('AAPL');
      expect(position?.quantity).toBe(20);
      expect(position?.averageEntryPrice).toBe(110);
      expect(position?.costBasis).toBe(2200);
      expect(portfolio.getCash()).toBe(7800);
    });

    it('rejects buys whose cost plus commission exceeds cash', () => {
      const small = new PortfolioManager(1000, silentLogger);

      const result = small.openOrAdd('AAPL', 10, 100, 1);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(InsufficientCashError);
        if (result.error instanceof InsufficientCashError) {
          expect(result.error.required).toBe(1001);
          expect(result.error.available).toBe(1000);
        }
      }
      expect(small.getCash()).toBe(1000);
      expect(small.hasPosition('AAPL')).toBe(false);
    });

    it('accepts a buy that spends exactly the available cash', () => {
      const exact = new PortfolioManager(1001, silentLogger);

      expect(exact.openOrAdd('AAPL', 10, 100, 1).success).toBe(true);
      expect(exact.getCash()).toBe(0);
    });
  });

  describe('closeOrReduce', () => {
    it('realizes P&L net of commission on a partial close', () => {
      portfolio.openOrAdd('AAPL', 10, 100, 1);

      const result = portfolio.closeOrReduce('AAPL', 4, 110, 0.44, CLOSED);

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.value.realizedPnl).toBeCloseTo(39.56, 10);
        expect(result.value.realizedPnlPct).toBeCloseTo(9.89, 10);
        expect(result.value.entryPrice).toBe(100);
        expect(result.value.exitPrice).toBe(110);
        expect(result.value.openedAt).toEqual(OPENED);
        expect(result.value.closedAt).toEqual(CLOSED);
      }

      const position = portfolio.getPosition('AAPL');
      expect(position?.quantity).toBe(6);
      expect(position?.costBasis).toBe(600);
      expect(position?.marketValue).toBe(660);
      expect(portfolio.getCash()).toBeCloseTo(9438.56, 10);
      expect(portfolio.getPortfolioValue()).toBeCloseTo(10098.56, 10);
      expect(portfolio.getTotalCommission()).toBeCloseTo(1.44, 10);
    });

    it('removes the position on a full close', () => {
      portfolio.openOrAdd('AAPL', 10, 100, 0);
      portfolio.closeOrReduce('AAPL', 10, 90, 0);

      expect(portfolio.hasPosition('AAPL')).toBe(false);
      expect(portfolio.getAllPositions()).toHaveLength(0);
      expect(portfolio.getRealizedPnl()).toBe(-100);
      expect(portfolio.getCash()).toBe(9900);
    });

    it('fails without a position', () => {
      const result = portfolio.closeOrReduce('MSFT', 1, 100, 0);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error).toBeInstanceOf(NoPositionError);
      }
    });

    it('fails when closing more than is held', () => {
      portfolio.openOrAdd('AAPL', 10, 100, 0);

      const result = portfolio.closeOrReduce('AAPL', 11, 100, 0);

      expect(result.success).toBe(false);
      if (!result.success && result.error instanceof OverCloseError) {
        expect(result.error.requested).toBe(11);
        expect(result.error.held).toBe(10);
      } else {
        throw new Error('expected OverCloseError');
      }
      expect(portfolio.getPosition('AAPL')?.quantity).toBe(10);
    });
  });

  describe('markToMarket', () => {
    it('updates unrealized P&L without touching cash', () => {
      portfolio.openOrAdd('AAPL', 10, 100, 0);
      portfolio.openOrAdd('MSFT', 5, 200, 0);
      const cash = portfolio.getCash();

      portfolio.markToMarket(new Map([['AAPL', 90], ['TSLA', 300]]));

      const aapl = portfolio.getPosition('AAPL');
      expect(aapl?.currentPrice).toBe(90);
      expect(aapl?.unrealizedPnl).toBe(-100);
      expect(aapl?.unrealizedPnlPct).toBe(-10);
      expect(portfolio.getPosition('MSFT')?.currentPrice).toBe(200);
      expect(portfolio.getCash()).toBe(cash);
      expect(portfolio.getUnrealizedPnl()).toBe(-100);
      expect(portfolio.getReturnPct()).toBe(-1);
    });
  });

  describe('getStatistics', () => {
    it('summarizes wins, losses and commission', () => {
      portfolio.openOrAdd('AAPL', 10, 100, 0);
      portfolio.closeOrReduce('AAPL', 5, 110, 0);
      portfolio.closeOrReduce('AAPL', 5, 96, 0);

      const stats = portfolio.getStatistics();
      expect(stats.totalTrades).toBe(2);
      expect(stats.winningTrades).toBe(1);
      expect(stats.losingTrades).toBe(1);
      expect(stats.winRate).toBe(50);
      expect(stats.averageWin).toBe(50);
      expect(stats.averageLoss).toBe(-20);
      expect(stats.realizedPnl).toBe(30);
      expect(stats.portfolioValue).toBe(10030);
      expect(stats.openPositions).toBe(0);
    });
  });

  it('returns copies that cannot mutate internal state', () => {
    portfolio.openOrAdd('AAPL', 10, 100, 0);

    const copy = portfolio.getPosition('AAPL');
    if (copy) copy.quantity = 999;

    expect(portfolio.getPosition('AAPL')?.quantity).toBe(10);
  });

  describe('Property-Based Tests', () => {
    it('keeps cash non-negative and value equal to cash plus position values', () => {
      const operation = fc.record({
        kind: fc.constantFrom<'buy' | 'sell' | 'mark'>('buy', 'sell', 'mark'),
        symbol: fc.constantFrom('AAA', 'BBB', 'CCC'),
        quantity: fc.integer({ min: 1, max: 50 }),
        price: fc.double({ min: 1, max: 500, noNaN: true })
      });

      fc.assert(
        fc.property(fc.array(operation, { minLength: 1, maxLength: 60 }), operations => {
          const local = new PortfolioManager(10000, silentLogger);

          for (const op of operations) {
            if (op.kind === 'buy') {
              local.openOrAdd(op.symbol, op.quantity, op.price, op.quantity * op.price * 0.001);
            } else if (op.kind === 'sell') {
              const held = local.getPosition(op.symbol)?.quantity ?? 0;
              const result = local.closeOrReduce(op.symbol, op.quantity, op.price, 0);
              expect(result.success).toBe(held >= op.quantity);
            } else {
              local.markToMarket(new Map([[op.symbol, op.price]]));
            }

            const positionsValue = local.getAllPositions().reduce((acc, p) => acc + p.marketValue, 0);
            expect(local.getCash()).toBeGreaterThanOrEqual(0);
            expect(local.getPortfolioValue()).toBeCloseTo(local.getCash() + positionsValue, 6);
            for (const position of local.getAllPositions()) {
              expect(position.quantity).toBeGreaterThan(0);
              expect(position.costBasis).toBeCloseTo(position.quantity * position.averageEntryPrice, 6);
            }
          }
        }),
        { numRuns: 100 }
      );
    });
  });
});
