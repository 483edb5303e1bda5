/**
 * Strategy Runner
 * Periodic live loop: pulls bars per symbol, asks the strategy for a signal and trades the result
 * through the engine. Failures are contained per symbol; the loop itself never dies.
 */

import { PriceFeed } from '../connectors/PriceFeed';
import { ExitReason } from '../models/Backtest';
import { Bar } from '../models/MarketData';
import { Position, PortfolioSummary } from '../models/Position';
import { withParameters } from '../strategies';
import { Strategy } from '../strategies/Strategy';
import { ErrorHandler, RecoveryStrategy } from '../utils/ErrorHandler';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, ok, Result } from '../utils/Result';
import { SerialExecutor } from '../utils/SerialExecutor';
import { mean, sampleStd } from '../utils/statistics';
import { DataUnavailableError, InsufficientDataError, RunnerStateError } from '../utils/TradingErrors';
import { OptimizedParameterStore } from './OptimizedParameterStore';
import { RiskManager } from './RiskManager';
import { TradingEngine } from './TradingEngine';

export type RunnerState = 'created' | 'running' | 'stopping' | 'stopped';

export interface SymbolPair {
  primary: string;
  secondary: string;
}

export interface StrategyRunnerConfig {
  symbols: string[];
  updateIntervalMs: number;
  dataPeriod: string;
  dataInterval: string;
  minBars: number;
  maxPositionPct: number;
  maxCashUsagePct: number;
  pairs: SymbolPair[];
  pairLookback: number;
  pairZScoreThreshold: number;
  useOptimizedParams: boolean;
  optimizedParamsPath: string;
  fetchRetries: number;
  fetchBackoffMs: number;
  autoProtectiveExits: boolean;
}

export const DEFAULT_RUNNER_CONFIG: StrategyRunnerConfig = {
  symbols: [],
  updateIntervalMs: 60000,
  dataPeriod: '1mo',
  dataInterval: '1h',
  minBars: 50,
  maxPositionPct: 0.2,
  maxCashUsagePct: 0.95,
  pairs: [],
  pairLookback: 50,
  pairZScoreThreshold: 2.0,
  useOptimizedParams: true,
  optimizedParamsPath: './config/optimized-parameters.json',
  fetchRetries: 1,
  fetchBackoffMs: 500,
  autoProtectiveExits: true
};

export type RunnerSignal =
  | { type: 'entry'; time: Date; price: number; quantity: number; orderId: string }
  | { type: 'exit'; time: Date; price: number; quantity: number; reason: ExitReason; pnl: number; orderId: string }
  | { type: 'pair'; time: Date; zScore: number; bought: string[]; sold: string[] };

export interface SweepSummary {
  startedAt: Date;
  processed: string[];
  failed: Array<{ symbol: string; error: string }>;
  ordersPlaced: number;
}

export interface RunnerStatus {
  state: RunnerState;
  strategy: string;
  symbols: string[];
  updateIntervalMs: number;
  sweepCount: number;
  lastSweepAt?: Date;
  lastSignals: Record<string, RunnerSignal>;
  portfolio: PortfolioSummary;
}

export interface StrategyRunnerDependencies {
  priceFeed: PriceFeed;
  optimizedParameters?: OptimizedParameterStore;
  executor?: SerialExecutor;
  errorHandler?: ErrorHandler;
  logger?: LoggerService;
  now?: () => Date;
}

export class StrategyRunner {
  private readonly engine: TradingEngine;
  private readonly strategy: Strategy;
  private readonly config: StrategyRunnerConfig;
  private readonly priceFeed: PriceFeed;
  private readonly optimizedParameters?: OptimizedParameterStore;
  private readonly executor: SerialExecutor;
  private readonly errorHandler: ErrorHandler;
  private readonly logger: LoggerService;
  private readonly now: () => Date;
  private readonly exitRules: RiskManager;
  private state: RunnerState = 'created';
  private loopTask?: Promise<void>;
  private wake?: () => void;
  private sweepCount = 0;
  private lastSweepAt?: Date;
  private lastSignals: Map<string, RunnerSignal> = new Map();
  private strategyCache: Map<string, Strategy> = new Map();

  constructor(
    engine: TradingEngine,
    strategy: Strategy,
    config: Partial<StrategyRunnerConfig>,
    dependencies: StrategyRunnerDependencies
  ) {
    this.engine = engine;
    this.strategy = strategy;
    this.config = { ...DEFAULT_RUNNER_CONFIG, ...config };
    this.priceFeed = dependencies.priceFeed;
    this.optimizedParameters = dependencies.optimizedParameters;
    this.executor = dependencies.executor ?? new SerialExecutor();
    this.logger = dependencies.logger ?? new ConsoleLogger('StrategyRunner');
    this.now = dependencies.now ?? (() => new Date());
    this.exitRules = new RiskManager({}, this.logger, this.now);

    this.errorHandler = dependencies.errorHandler ?? new ErrorHandler({ logger: this.logger });
    this.errorHandler.registerRecoveryStrategy('fetchMarketData', {
      strategy: RecoveryStrategy.RETRY,
      maxAttempts: this.config.fetchRetries,
      backoffMs: this.config.fetchBackoffMs
    });

    this.logger.info('Strategy runner initialized', {
      strategy: strategy.name,
      symbols: this.config.symbols,
      updateIntervalMs: this.config.updateIntervalMs,
      optimized: this.config.useOptimizedParams && (this.optimizedParameters?.size ?? 0) > 0
    });
  }

  /**
   * Launches the periodic loop; the first sweep starts immediately
   */
  start(): Result<void, RunnerStateError> {
    if (this.state === 'running' || this.state === 'stopping') {
      this.logger.warn('Strategy runner already running');
      return err(new RunnerStateError('RUNNER_ALREADY_RUNNING', 'Strategy runner is already running'));
    }

    this.state = 'running';
    this.loopTask = this.loop();
    this.logger.info('Strategy runner started', { symbols: this.config.symbols });
    return ok(undefined);
  }

  /**
   * Requests cancellation and waits for the sweep in progress, if any, to finish
   */
  async stop(): Promise<Result<void, RunnerStateError>> {
    if (this.state !== 'running') {
      return err(new RunnerStateError('RUNNER_NOT_RUNNING', 'Strategy runner is not running'));
    }

    this.state = 'stopping';
    this.wake?.();
    await this.loopTask;
    this.loopTask = undefined;
    this.state = 'stopped';
    this.logger.info('Strategy runner stopped', { sweeps: this.sweepCount });
    return ok(undefined);
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getState(): RunnerState {
    return this.state;
  }

  /**
   * One pass over every configured symbol, then the pair check
   */
  async runOnce(): Promise<SweepSummary> {
    const summary: SweepSummary = { startedAt: this.now(), processed: [], failed: [], ordersPlaced: 0 };
    const barsBySymbol = new Map<string, Bar[]>();

    this.logger.info('Checking signals', { symbols: this.config.symbols.length });

    for (const symbol of this.config.symbols) {
      try {
        const bars = await this.fetchBars(symbol);
        barsBySymbol.set(symbol, bars);
        summary.ordersPlaced += await this.processSymbol(symbol, bars);
        summary.processed.push(symbol);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error('Error processing symbol', { symbol, error: message });
        summary.failed.push({ symbol, error: message });
      }
    }

    if (this.config.pairs.length > 0) {
      try {
        summary.ordersPlaced += await this.checkPairs(barsBySymbol);
      } catch (error) {
        this.logger.error('Pair check failed', { error: error instanceof Error ? error.message : String(error) });
      }
    }

    this.sweepCount++;
    this.lastSweepAt = summary.startedAt;
    return summary;
  }

  getStatus(): RunnerStatus {
    return {
      state: this.state,
      strategy: this.strategy.name,
      symbols: [...this.config.symbols],
      updateIntervalMs: this.config.updateIntervalMs,
      sweepCount: this.sweepCount,
      lastSweepAt: this.lastSweepAt,
      lastSignals: Object.fromEntries(this.lastSignals),
      portfolio: this.engine.getPortfolioSummary()
    };
  }

  /**
   * Default strategy, or its per-symbol optimized variant when one is configured and valid
   */
  strategyFor(symbol: string): Strategy {
    const overrides = this.config.useOptimizedParams ? this.optimizedParameters?.get(symbol) : undefined;
    if (!overrides) {
      return this.strategy;
    }

    const cached = this.strategyCache.get(symbol);
    if (cached) {
      return cached;
    }

    let variant: Strategy;
    try {
      variant = withParameters(this.strategy, overrides);
    } catch (error) {
      this.logger.warn('Optimized parameters rejected, using defaults', {
        symbol,
        error: error instanceof Error ? error.message : String(error)
      });
      variant = this.strategy;
    }
    this.strategyCache.set(symbol, variant);
    return variant;
  }

  private async loop(): Promise<void> {
    while (this.state === 'running') {
      try {
        await this.runOnce();
      } catch (error) {
        this.logger.error('Error in strategy loop', { error: error instanceof Error ? error.message : String(error) });
      }

      if (this.state !== 'running') {
        break;
      }
      await this.sleep(this.config.updateIntervalMs);
    }
  }

  // Resolves early when stop() is called
  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }

  private async fetchBars(symbol: string): Promise<Bar[]> {
    const outcome = await this.errorHandler.handleError(
      async () => {
        const bars = await this.priceFeed.historicalBars(symbol, this.config.dataPeriod, this.config.dataInterval);
        if (!bars || bars.length === 0) {
          throw new DataUnavailableError(symbol);
        }
        return bars;
      },
      { operation: 'fetchMarketData', component: 'StrategyRunner', symbol, timestamp: this.now() }
    );

    if (!outcome.success) {
      throw outcome.error;
    }
    return outcome.result;
  }

  private async processSymbol(symbol: string, bars: Bar[]): Promise<number> {
    if (bars.length < this.config.minBars) {
      throw new InsufficientDataError(this.config.minBars, bars.length, symbol);
    }

    const price = bars[bars.length - 1].close;
    await this.executor.run(() => this.engine.updateMarketData(symbol, price, this.now()));

    const strategy = this.strategyFor(symbol);
    const signal = strategy.generateSignals(bars);
    const last = bars.length - 1;
    const entry = signal.entries[last];
    const exit = signal.exits[last];

    // Position read and order placement form one task so no other writer lands in between
    return this.executor.run(async () => {
      const position = this.engine.getPosition(symbol);

      if (entry && !position) {
        return (await this.enter(symbol, price)) ? 1 : 0;
      }
      if (exit && position) {
        return (await this.exit(position, price, 'signal')) ? 1 : 0;
      }
      if (position) {
        return (await this.checkProtectiveExit(position, price, strategy)) ? 1 : 0;
      }
      return 0;
    });
  }

  /**
   * Whole units worth the smaller of a fraction of portfolio value and a fraction of free cash.
   * Reads engine state; inside a sweep it is only called from an executor task.
   */
  calculatePositionSize(price: number): number {
    if (!(price > 0)) {
      return 0;
    }
    const budget = Math.min(
      this.engine.getPortfolioValue() * this.config.maxPositionPct,
      this.engine.getCash() * this.config.maxCashUsagePct
    );
    return Math.floor(budget / price);
  }

  // enter and exit place orders directly and must run inside an executor task
  private async enter(symbol: string, price: number): Promise<boolean> {
    const quantity = this.calculatePositionSize(price);
    if (quantity < 1) {
      this.logger.info('Position size too small, skipping entry', { symbol, price });
      return false;
    }

    const placed = await this.engine.placeOrder({ symbol, side: 'buy', quantity, orderType: 'market' });
    if (!placed.success) {
      this.logger.warn('Entry order rejected', { symbol, quantity, error: placed.error.message });
      return false;
    }

    const fillPrice = placed.value.averageFillPrice ?? price;
    this.lastSignals.set(symbol, { type: 'entry', time: this.now(), price: fillPrice, quantity, orderId: placed.value.orderId });
    this.logger.info('Entry signal executed', { symbol, quantity, price: fillPrice, orderId: placed.value.orderId });
    return true;
  }

  private async exit(position: Position, price: number, reason: ExitReason): Promise<boolean> {
    const { symbol, quantity, averageEntryPrice } = position;
    const placed = await this.engine.placeOrder({ symbol, side: 'sell', quantity, orderType: 'market' });
    if (!placed.success) {
      this.logger.warn('Exit order rejected', { symbol, quantity, reason, error: placed.error.message });
      return false;
    }

    const exitPrice = placed.value.averageFillPrice ?? price;
    const pnl = (exitPrice - averageEntryPrice) * quantity;
    this.lastSignals.set(symbol, {
      type: 'exit',
      time: this.now(),
      price: exitPrice,
      quantity,
      reason,
      pnl,
      orderId: placed.value.orderId
    });
    this.logger.info('Exit executed', { symbol, quantity, reason, price: exitPrice, pnl });
    return true;
  }

  private async checkProtectiveExit(position: Position, price: number, strategy: Strategy): Promise<boolean> {
    const stopLoss = this.exitRules.stopLossPrice(position.averageEntryPrice, strategy.stopLossPct);
    const takeProfit = this.exitRules.takeProfitPrice(position.averageEntryPrice, strategy.takeProfitPct);
    const breach = this.exitRules.shouldClosePosition(price, stopLoss, takeProfit);
    if (!breach) {
      return false;
    }

    if (!this.config.autoProtectiveExits) {
      this.logger.warn('Protective level breached', { symbol: position.symbol, breach, price, stopLoss, takeProfit });
      return false;
    }
    return this.exit(position, price, breach);
  }

  /**
   * Mean reversion on the price ratio of each configured pair. Long-only: the cheap leg is
   * bought when flat, the rich leg is sold only if already held.
   */
  private async checkPairs(barsBySymbol: Map<string, Bar[]>): Promise<number> {
    let placed = 0;
    const lookback = this.config.pairLookback;

    for (const pair of this.config.pairs) {
      const primaryBars = barsBySymbol.get(pair.primary) ?? (await this.fetchPairBars(pair.primary));
      const secondaryBars = barsBySymbol.get(pair.secondary) ?? (await this.fetchPairBars(pair.secondary));
      if (!primaryBars || !secondaryBars || primaryBars.length < lookback || secondaryBars.length < lookback) {
        continue;
      }

      const primary = primaryBars.slice(-lookback).map(bar => bar.close);
      const secondary = secondaryBars.slice(-lookback).map(bar => bar.close);
      const zScore = pairZScore(primary, secondary);
      if (Math.abs(zScore) <= this.config.pairZScoreThreshold) {
        continue;
      }

      const primaryPrice = primary[lookback - 1];
      const secondaryPrice = secondary[lookback - 1];
      await this.executor.run(() => {
        this.engine.updateMarketData(pair.primary, primaryPrice, this.now());
        this.engine.updateMarketData(pair.secondary, secondaryPrice, this.now());
      });

      const primaryLeg = { symbol: pair.primary, price: primaryPrice };
      const secondaryLeg = { symbol: pair.secondary, price: secondaryPrice };
      const rich = zScore > 0 ? primaryLeg : secondaryLeg;
      const cheap = zScore > 0 ? secondaryLeg : primaryLeg;

      const bought: string[] = [];
      const sold: string[] = [];
      await this.executor.run(async () => {
        const richPosition = this.engine.getPosition(rich.symbol);
        if (richPosition && (await this.exit(richPosition, rich.price, 'signal'))) {
          sold.push(rich.symbol);
        }
        if (!this.engine.getPosition(cheap.symbol) && (await this.enter(cheap.symbol, cheap.price))) {
          bought.push(cheap.symbol);
        }
      });

      this.logger.info('Pair divergence', { primary: pair.primary, secondary: pair.secondary, zScore, bought, sold });
      this.lastSignals.set(`${pair.primary}/${pair.secondary}`, { type: 'pair', time: this.now(), zScore, bought, sold });
      placed += bought.length + sold.length;
    }

    return placed;
  }

  private async fetchPairBars(symbol: string): Promise<Bar[] | undefined> {
    try {
      return await this.fetchBars(symbol);
    } catch (error) {
      this.logger.warn('Pair data unavailable', { symbol, error: error instanceof Error ? error.message : String(error) });
      return undefined;
    }
  }
}

/**
 * Z-score of the latest primary/secondary price ratio against the window's ratios
 */
export function pairZScore(primary: readonly number[], secondary: readonly number[]): number {
  const ratios = primary.map((price, i) => price / secondary[i]);
  const deviation = sampleStd(ratios);
  return (ratios[ratios.length - 1] - mean(ratios)) / (deviation !== 0 ? deviation : 1);
}
