/**
 * Backtest Engine
 * Replays a strategy's signals over historical bars with slippage, commission and protective exits
 */

import { BacktestOptions, BacktestResult, BacktestTrade, EquityPoint, ExitReason } from '../models/Backtest';
import { Bar, Signal } from '../models/MarketData';
import { Strategy } from '../strategies/Strategy';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, ok, Result } from '../utils/Result';
import { InsufficientDataError, InvalidSignalError } from '../utils/TradingErrors';
import { PerformanceAnalyzer } from './PerformanceAnalyzer';
import { RiskManager } from './RiskManager';

export const DEFAULT_BACKTEST_OPTIONS: BacktestOptions = {
  initialCapital: 10000,
  commissionPct: 0.001,
  slippagePct: 0.0005,
  riskPerTrade: 0.02,
  maxPositionPct: 0.95,
  riskFreeRate: 0.02,
  minBars: 50,
  periodsPerYear: 252
};

export type BacktestError = InsufficientDataError | InvalidSignalError;

interface OpenPosition {
  entryTime: Date;
  entryPrice: number;
  quantity: number;
  entryCommission: number;
  stopLoss: number;
  takeProfit: number;
}

export class BacktestEngine {
  private readonly options: BacktestOptions;
  private readonly logger: LoggerService;
  private readonly riskManager: RiskManager;

  constructor(options: Partial<BacktestOptions> = {}, logger?: LoggerService) {
    this.options = { ...DEFAULT_BACKTEST_OPTIONS, ...options };
    this.logger = logger ?? new ConsoleLogger('BacktestEngine');
    this.riskManager = new RiskManager(
      { maxLossPerTradePct: this.options.riskPerTrade, maxPositionSizePct: this.options.maxPositionPct },
      this.logger
    );

    if (!(this.options.initialCapital > 0)) {
      throw new RangeError(`Initial capital must be positive, got ${this.options.initialCapital}`);
    }
  }

  getOptions(): BacktestOptions {
    return { ...this.options };
  }

  /**
   * Runs one strategy over one symbol's bars. The run is a pure function of its inputs:
   * replaying the same bars with the same strategy yields an identical result.
   */
  runBacktest(bars: readonly Bar[], strategy: Strategy, symbol: string): Result<BacktestResult, BacktestError> {
    const usable = this.usableBars(bars);
    if (usable.length < this.options.minBars) {
      this.logger.warn('Backtest skipped, not enough data', {
        symbol,
        strategy: strategy.name,
        usableBars: usable.length,
        required: this.options.minBars
      });
      return err(new InsufficientDataError(this.options.minBars, usable.length, symbol));
    }

    const signalResult = this.signalsFor(strategy, usable);
    if (!signalResult.success) {
      return signalResult;
    }
    const { entries, exits } = signalResult.value;

    const { commissionPct, slippagePct, initialCapital } = this.options;
    let cash = initialCapital;
    let position: OpenPosition | null = null;
    const trades: BacktestTrade[] = [];
    const equityCurve: EquityPoint[] = [];

    for (let i = 0; i < usable.length; i++) {
      const bar = usable[i];
      const close = bar.close;

      const equity = position ? cash + position.quantity * close : cash;
      equityCurve.push({ timestamp: bar.timestamp, equity });

      if (!position && entries[i]) {
        const stopLoss = close * (1 - strategy.stopLossPct);
        const quantity = this.riskManager.positionSize(
          equity,
          close,
          stopLoss,
          this.options.riskPerTrade,
          this.options.maxPositionPct
        );
        const entryPrice = close * (1 + slippagePct);
        const entryCommission = quantity * entryPrice * commissionPct;
        const cost = quantity * entryPrice;

        if (quantity > 0 && cash >= cost + entryCommission) {
          cash -= cost + entryCommission;
          position = {
            entryTime: bar.timestamp,
            entryPrice,
            quantity,
            entryCommission,
            stopLoss,
            takeProfit: close * (1 + strategy.takeProfitPct)
          };
        }
      } else if (position) {
        const reason = this.exitReason(position, close, exits[i]);
        if (reason) {
          const exitPrice = close * (1 - slippagePct);
          const proceeds = position.quantity * exitPrice;
          const exitCommission = proceeds * commissionPct;
          const entryCost = position.quantity * position.entryPrice;
          const pnl = proceeds - exitCommission - entryCost - position.entryCommission;

          cash += proceeds - exitCommission;
          trades.push({
            symbol,
            side: 'long',
            entryTime: position.entryTime,
            exitTime: bar.timestamp,
            entryPrice: position.entryPrice,
            exitPrice,
            quantity: position.quantity,
            pnl,
            pnlPct: (pnl / entryCost) * 100,
            commission: position.entryCommission + exitCommission,
            reason
          });
          position = null;
        }
      }
    }

    const metrics = PerformanceAnalyzer.calculateMetrics(equityCurve, trades, initialCapital, {
      riskFreeRate: this.options.riskFreeRate,
      periodsPerYear: this.options.periodsPerYear
    });

    const result: BacktestResult = {
      symbol,
      strategy: strategy.name,
      parameters: { ...strategy.parameters },
      initialCapital,
      finalCapital: equityCurve[equityCurve.length - 1].equity,
      startDate: usable[0].timestamp,
      endDate: usable[usable.length - 1].timestamp,
      barsProcessed: usable.length,
      ...metrics,
      equityCurve,
      drawdownCurve: PerformanceAnalyzer.drawdownCurve(equityCurve),
      trades
    };

    this.logger.info('Backtest completed', {
      symbol,
      strategy: strategy.name,
      bars: usable.length,
      trades: trades.length,
      totalReturnPct: Number(metrics.totalReturnPct.toFixed(2))
    });

    return ok(result);
  }

  /**
   * Bars with a positive finite close inside the configured date window, in time order
   */
  private usableBars(bars: readonly Bar[]): Bar[] {
    const { startDate, endDate } = this.options;
    return bars
      .filter(bar => Number.isFinite(bar.close) && bar.close > 0)
      .filter(bar => !startDate || bar.timestamp.getTime() >= startDate.getTime())
      .filter(bar => !endDate || bar.timestamp.getTime() <= endDate.getTime())
      .sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  }

  private signalsFor(strategy: Strategy, bars: readonly Bar[]): Result<Signal, InvalidSignalError> {
    let signal: Signal;
    try {
      signal = strategy.generateSignals(bars);
    } catch (error) {
      if (error instanceof InvalidSignalError) {
        return err(error);
      }
      throw error;
    }

    if (signal.entries.length !== bars.length || signal.exits.length !== bars.length) {
      return err(new InvalidSignalError(strategy.name, bars.length, signal.entries.length, signal.exits.length));
    }
    return ok(signal);
  }

  // Strategy exit first, then stop-loss, then take-profit
  private exitReason(position: OpenPosition, close: number, exitSignal: boolean): ExitReason | null {
    if (exitSignal) {
      return 'signal';
    }
    if (close <= position.stopLoss) {
      return 'stop_loss';
    }
    if (close >= position.takeProfit) {
      return 'take_profit';
    }
    return null;
  }
}
