/**
 * Performance metrics for a completed replay run
 */

import { BacktestTrade, DrawdownPoint, EquityPoint, PerformanceMetrics } from '../models/Backtest';
import { mean, pctChange, sampleStd, sum } from '../utils/statistics';

export interface AnalysisOptions {
  riskFreeRate: number;
  periodsPerYear: number;
}

const HOUR_MS = 60 * 60 * 1000;

export class PerformanceAnalyzer {
  static calculateMetrics(
    equityCurve: readonly EquityPoint[],
    trades: readonly BacktestTrade[],
    initialCapital: number,
    options: AnalysisOptions
  ): PerformanceMetrics {
    const equity = equityCurve.map(point => point.equity);
    const finalEquity = equity.length > 0 ? equity[equity.length - 1] : initialCapital;

    const totalReturn = finalEquity - initialCapital;
    const totalReturnPct = (totalReturn / initialCapital) * 100;

    const returns = pctChange(equity);
    const sharpeRatio = this.sharpeRatio(returns, options);
    const sortinoRatio = this.sortinoRatio(returns, options);
    const volatility = returns.length >= 2 ? sampleStd(returns) * Math.sqrt(options.periodsPerYear) * 100 : 0;

    const drawdowns = this.drawdownCurve(equityCurve);
    const maxDrawdown = drawdowns.reduce((max, point) => Math.max(max, point.drawdown), 0);
    const maxDrawdownPct = drawdowns.reduce((max, point) => Math.max(max, point.drawdownPct), 0);

    const wins = trades.filter(trade => trade.pnl > 0).map(trade => trade.pnl);
    const losses = trades.filter(trade => trade.pnl < 0).map(trade => trade.pnl);
    const winRate = trades.length > 0 ? (wins.length / trades.length) * 100 : 0;
    const averageWin = mean(wins);
    const averageLoss = Math.abs(mean(losses));
    const profitFactor = losses.length > 0 ? sum(wins) / Math.abs(sum(losses)) : 0;
    const expectancy = (winRate / 100) * averageWin - (1 - winRate / 100) * averageLoss;

    const durations = trades.map(trade => (trade.exitTime.getTime() - trade.entryTime.getTime()) / HOUR_MS);

    return {
      totalReturn,
      totalReturnPct,
      sharpeRatio,
      sortinoRatio,
      calmarRatio: maxDrawdownPct !== 0 ? Math.abs(totalReturnPct / maxDrawdownPct) : 0,
      maxDrawdown,
      maxDrawdownPct,
      recoveryFactor: maxDrawdown !== 0 ? Math.abs(totalReturn / maxDrawdown) : 0,
      volatility,
      totalTrades: trades.length,
      winningTrades: wins.length,
      losingTrades: losses.length,
      winRate,
      averageWin,
      averageLoss,
      profitFactor,
      expectancy,
      averageTradeDurationHours: mean(durations),
      maxTradeDurationHours: durations.reduce((max, hours) => Math.max(max, hours), 0),
      totalCommission: sum(trades.map(trade => trade.commission))
    };
  }

  /**
   * Mean excess return over its sample deviation, annualized; 0 without dispersion
   */
  static sharpeRatio(returns: readonly number[], options: AnalysisOptions): number {
    // Shifting by the risk-free rate leaves the deviation unchanged
    const deviation = sampleStd(returns);
    if (returns.length < 2 || deviation === 0) {
      return 0;
    }
    return (mean(this.excessReturns(returns, options)) / deviation) * Math.sqrt(options.periodsPerYear);
  }

  /**
   * Like Sharpe, but the denominator is the deviation of negative returns only
   */
  static sortinoRatio(returns: readonly number[], options: AnalysisOptions): number {
    const downside = returns.filter(value => value < 0);
    const deviation = sampleStd(downside);
    if (downside.length < 2 || deviation === 0) {
      return 0;
    }
    return (mean(this.excessReturns(returns, options)) / deviation) * Math.sqrt(options.periodsPerYear);
  }

  /**
   * Decline from the running peak at every point, as a positive amount and percent of that peak
   */
  static drawdownCurve(equityCurve: readonly EquityPoint[]): DrawdownPoint[] {
    let peak = Number.NEGATIVE_INFINITY;

    return equityCurve.map(point => {
      peak = Math.max(peak, point.equity);
      const drawdown = peak - point.equity;
      return {
        timestamp: point.timestamp,
        drawdown,
        drawdownPct: peak > 0 ? (drawdown / peak) * 100 : 0
      };
    });
  }

  private static excessReturns(returns: readonly number[], options: AnalysisOptions): number[] {
    const perPeriod = options.riskFreeRate / options.periodsPerYear;
    return returns.map(value => value - perPeriod);
  }
}
