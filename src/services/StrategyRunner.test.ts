/**
 * Tests for StrategyRunner sweeps, protective exits, pair checks and lifecycle
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { StrategyRunner, StrategyRunnerConfig, pairZScore } from './StrategyRunner';
import { TradingEngine } from './TradingEngine';
import { OptimizedParameterStore } from './OptimizedParameterStore';
import { InMemoryPriceFeed } from '../connectors/PriceFeed';
import { Bar, Signal } from '../models/MarketData';
import { createStrategy, Strategy } from '../strategies';
import { silentLogger } from '../utils/Logger';

const T0 = new Date('2024-05-06T15:00:00.000Z');
const HOUR = 60 * 60 * 1000;

function makeBars(closes: number[]): Bar[] {
  return closes.map((close, i) => ({
    timestamp: new Date(T0.getTime() + (i - closes.length) * HOUR),
    open: close,
    high: close,
    low: close,
    close,
    volume: 500
  }));
}

/**
 * Signals only on the most recent bar, as set by the test
 */
class LastBarStrategy implements Strategy {
  readonly kind = 'simple_ma';
  readonly name = 'last-bar';
  readonly parameters = { stopLossPct: 0.02, takeProfitPct: 0.04 };
  readonly stopLossPct = 0.02;
  readonly takeProfitPct = 0.04;
  entry = false;
  exit = false;

  requiredParameters(): string[] {
    return ['stopLossPct', 'takeProfitPct'];
  }

  generateSignals(bars: readonly Bar[]): Signal {
    const entries = bars.map(() => false);
    const exits = bars.map(() => false);
    entries[bars.length - 1] = this.entry;
    exits[bars.length - 1] = this.exit;
    return { entries, exits };
  }
}

/**
 * Holds the first bar fetch until released
 */
class GatedPriceFeed extends InMemoryPriceFeed {
  fetchStarted = false;
  private release: () => void = () => undefined;
  private readonly gate = new Promise<void>(resolve => {
    this.release = resolve;
  });

  open(): void {
    this.release();
  }

  async historicalBars(symbol: string, period: string, interval: string): Promise<Bar[] | null> {
    if (!this.fetchStarted) {
      this.fetchStarted = true;
      await this.gate;
    }
    return super.historicalBars(symbol, period, interval);
  }
}

describe('StrategyRunner', () => {
  let feed: InMemoryPriceFeed;
  let engine: TradingEngine;
  let strategy: LastBarStrategy;

  function createRunner(config: Partial<StrategyRunnerConfig> = {}, optimizedParameters?: OptimizedParameterStore): StrategyRunner {
    return new StrategyRunner(
      engine,
      strategy,
      { symbols: ['AAPL'], fetchRetries: 0, fetchBackoffMs: 0, ...config },
      { priceFeed: feed, optimizedParameters, logger: silentLogger, now: () => T0 }
    );
  }

  beforeEach(() => {
    feed = new InMemoryPriceFeed();
    feed.setBars('AAPL', makeBars(new Array<number>(60).fill(100)));
    engine = new TradingEngine(
      { initialCapital: 10000, commissionPct: 0, slippagePct: 0 },
      { logger: silentLogger, now: () => T0 }
    );
    strategy = new LastBarStrategy();
  });

  describe('runOnce', () => {
    it('opens a sized position on an entry signal', async () => {
      strategy.entry = true;
      const runner = createRunner();

      const summary = await runner.runOnce();

      expect(summary.processed).toEqual(['AAPL']);
      expect(summary.ordersPlaced).toBe(1);
      expect(engine.getPosition('AAPL')?.quantity).toBe(20);
      expect(engine.getCash()).toBe(8000);
      expect(runner.getStatus().lastSignals.AAPL).toMatchObject({ type: 'entry', price: 100, quantity: 20 });
    });

    it('does not add to an existing position on a repeated entry signal', async () => {
      strategy.entry = true;
      const runner = createRunner();

      await runner.runOnce();
      const second = await runner.runOnce();

      expect(second.ordersPlaced).toBe(0);
      expect(engine.getPosition('AAPL')?.quantity).toBe(20);
    });

    it('closes the position on an exit signal', async () => {
      strategy.entry = true;
      const runner = createRunner();
      await runner.runOnce();

      strategy.entry = false;
      strategy.exit = true;
      const summary = await runner.runOnce();

      expect(summary.ordersPlaced).toBe(1);
      expect(engine.getPosition('AAPL')).toBeUndefined();
      expect(engine.getCash()).toBe(10000);
      expect(runner.getStatus().lastSignals.AAPL).toMatchObject({ type: 'exit', reason: 'signal', pnl: 0 });
    });

    it('closes a position whose stop-loss level is breached', async () => {
      strategy.entry = true;
      const runner = createRunner();
      await runner.runOnce();

      strategy.entry = false;
      feed.appendBar('AAPL', { timestamp: T0, open: 97, high: 97, low: 97, close: 97, volume: 500 });
      await runner.runOnce();

      expect(engine.getPosition('AAPL')).toBeUndefined();
      expect(runner.getStatus().lastSignals.AAPL).toMatchObject({ type: 'exit', reason: 'stop_loss', price: 97, pnl: -60 });
    });

    it('only reports a breach when automatic protective exits are off', async () => {
      strategy.entry = true;
      const runner = createRunner({ autoProtectiveExits: false });
      await runner.runOnce();

      strategy.entry = false;
      feed.appendBar('AAPL', { timestamp: T0, open: 105, high: 105, low: 105, close: 105, volume: 500 });
      const summary = await runner.runOnce();

      expect(summary.ordersPlaced).toBe(0);
      expect(engine.getPosition('AAPL')?.quantity).toBe(20);
    });

    it('skips the entry when the budget buys less than one unit', async () => {
      feed.setBars('AAPL', makeBars(new Array<number>(60).fill(5000)));
      strategy.entry = true;
      const runner = createRunner();

      const summary = await runner.runOnce();

      expect(summary.ordersPlaced).toBe(0);
      expect(engine.getPositions()).toHaveLength(0);
    });

    it('keeps sweeping after one symbol fails', async () => {
      strategy.entry = true;
      const runner = createRunner({ symbols: ['MISSING', 'AAPL'] });

      const summary = await runner.runOnce();

      expect(summary.failed).toHaveLength(1);
      expect(summary.failed[0].symbol).toBe('MISSING');
      expect(summary.processed).toEqual(['AAPL']);
      expect(engine.getPosition('AAPL')?.quantity).toBe(20);
    });

    it('keeps fetching other symbols once a failing symbol trips its breaker', async () => {
      const runner = createRunner({ symbols: ['MISSING', 'AAPL'] });

      let summary = await runner.runOnce();
      for (let i = 0; i < 5; i++) {
        summary = await runner.runOnce();
      }

      expect(summary.failed[0].error).toBe('Circuit breaker is open for fetchMarketData:MISSING');
      expect(summary.processed).toEqual(['AAPL']);
    });

    it('skips symbols with too little history', async () => {
      feed.setBars('AAPL', makeBars(new Array<number>(10).fill(100)));
      const runner = createRunner();

      const summary = await runner.runOnce();

      expect(summary.failed).toEqual([
        { symbol: 'AAPL', error: 'Insufficient data: 10 usable bars, at least 50 required' }
      ]);
    });

    it('pushes the latest close into the engine', async () => {
      feed.appendBar('AAPL', { timestamp: T0, open: 101, high: 101, low: 101, close: 101.5, volume: 500 });
      const runner = createRunner();

      await runner.runOnce();

      expect(engine.getCurrentPrice('AAPL')).toBe(101.5);
    });
  });

  describe('optimized parameters', () => {
    it('uses the per-symbol variant when one is configured', () => {
      const base = createStrategy('simple_ma');
      const runner = new StrategyRunner(
        engine,
        base,
        { symbols: ['AAPL'] },
        {
          priceFeed: feed,
          optimizedParameters: new OptimizedParameterStore({ AAPL: { maFast: 3, maSlow: 5 } }),
          logger: silentLogger
        }
      );

      expect(runner.strategyFor('AAPL').parameters.maFast).toBe(3);
      expect(runner.strategyFor('MSFT')).toBe(base);
    });

    it('falls back to the default strategy when the variant is invalid', () => {
      const base = createStrategy('simple_ma');
      const runner = new StrategyRunner(
        engine,
        base,
        { symbols: ['AAPL'] },
        {
          priceFeed: feed,
          optimizedParameters: new OptimizedParameterStore({ AAPL: { maFast: 30, maSlow: 5 } }),
          logger: silentLogger
        }
      );

      expect(runner.strategyFor('AAPL')).toBe(base);
    });

    it('ignores stored variants when disabled', () => {
      const base = createStrategy('simple_ma');
      const runner = new StrategyRunner(
        engine,
        base,
        { symbols: ['AAPL'], useOptimizedParams: false },
        {
          priceFeed: feed,
          optimizedParameters: new OptimizedParameterStore({ AAPL: { maFast: 3, maSlow: 5 } }),
          logger: silentLogger
        }
      );

      expect(runner.strategyFor('AAPL')).toBe(base);
    });
  });

  describe('pair check', () => {
    it('computes the z-score of the latest price ratio', () => {
      expect(pairZScore([1, 1, 1, 1, 2], [1, 1, 1, 1, 1])).toBeCloseTo(1.78885, 4);
      expect(pairZScore([3, 3, 3], [1, 1, 1])).toBe(0);
    });

    it('buys the cheap leg when the ratio diverges past the threshold', async () => {
      feed.setBars('AAA', makeBars([10, 10, 10, 10, 20]));
      feed.setBars('BBB', makeBars([10, 10, 10, 10, 10]));
      const runner = createRunner({
        symbols: [],
        pairs: [{ primary: 'AAA', secondary: 'BBB' }],
        pairLookback: 5,
        pairZScoreThreshold: 1.5
      });

      const summary = await runner.runOnce();

      expect(summary.ordersPlaced).toBe(1);
      expect(engine.getPosition('BBB')?.quantity).toBe(200);
      expect(engine.getPosition('AAA')).toBeUndefined();
      expect(runner.getStatus().lastSignals['AAA/BBB']).toMatchObject({ type: 'pair', bought: ['BBB'], sold: [] });
    });

    it('does nothing inside the threshold', async () => {
      feed.setBars('AAA', makeBars([10, 10, 10, 10, 20]));
      feed.setBars('BBB', makeBars([10, 10, 10, 10, 10]));
      const runner = createRunner({
        symbols: [],
        pairs: [{ primary: 'AAA', secondary: 'BBB' }],
        pairLookback: 5,
        pairZScoreThreshold: 2
      });

      const summary = await runner.runOnce();

      expect(summary.ordersPlaced).toBe(0);
      expect(engine.getPositions()).toHaveLength(0);
    });
  });

  describe('lifecycle', () => {
    it('runs sweeps until stopped', async () => {
      const runner = createRunner({ updateIntervalMs: 60000 });

      expect(runner.start().success).toBe(true);
      expect(runner.isRunning()).toBe(true);
      await vi.waitFor(() => expect(runner.getStatus().sweepCount).toBe(1));

      const stopped = await runner.stop();

      expect(stopped.success).toBe(true);
      expect(runner.getState()).toBe('stopped');
      expect(runner.getStatus().sweepCount).toBe(1);
    });

    it('waits for the sweep in progress before stop resolves', async () => {
      strategy.entry = true;
      const gated = new GatedPriceFeed();
      gated.setBars('AAPL', makeBars(new Array<number>(60).fill(100)));
      gated.setBars('MSFT', makeBars(new Array<number>(60).fill(50)));
      const runner = new StrategyRunner(
        engine,
        strategy,
        { symbols: ['AAPL', 'MSFT'], fetchRetries: 0, fetchBackoffMs: 0 },
        { priceFeed: gated, logger: silentLogger, now: () => T0 }
      );

      runner.start();
      await vi.waitFor(() => expect(gated.fetchStarted).toBe(true));

      let stopResolved = false;
      const stopping = runner.stop().then(result => {
        stopResolved = true;
        return result;
      });
      await new Promise(resolve => setTimeout(resolve, 20));

      expect(stopResolved).toBe(false);
      expect(runner.getState()).toBe('stopping');
      expect(engine.getPositions()).toHaveLength(0);

      gated.open();
      const stopped = await stopping;

      expect(stopped.success).toBe(true);
      expect(runner.getState()).toBe('stopped');
      expect(runner.getStatus().sweepCount).toBe(1);
      expect(engine.getPosition('AAPL')?.quantity).toBe(20);
      expect(engine.getPosition('MSFT')?.quantity).toBe(40);
    });

    it('rejects a second start while running', async () => {
      const runner = createRunner();
      runner.start();

      const again = runner.start();

      expect(again.success).toBe(false);
      if (!again.success) {
        expect(again.error.code).toBe('RUNNER_ALREADY_RUNNING');
      }
      await runner.stop();
    });

    it('rejects stop when not running', async () => {
      const runner = createRunner();

      const result = await runner.stop();

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('RUNNER_NOT_RUNNING');
      }
      expect(runner.getState()).toBe('created');
    });

    it('can be restarted after stopping', async () => {
      const runner = createRunner();
      runner.start();
      await runner.stop();

      expect(runner.start().success).toBe(true);
      await runner.stop();
      expect(runner.getState()).toBe('stopped');
    });
  });
});
