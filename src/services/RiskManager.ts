/**
 * Risk Manager
 * Pre-trade limit checks, risk-based sizing and rolling drawdown / daily P&L tracking
 */

import { OrderSide } from '../models/Order';
import { Position } from '../models/Position';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, ok, Result } from '../utils/Result';
import { RiskViolationError } from '../utils/TradingErrors';

export type PositionDirection = 'long' | 'short';

export type ProtectiveExit = 'stop_loss' | 'take_profit';

export interface RiskLimits {
  maxPositionSizePct: number;
  maxTotalExposurePct: number;
  maxDrawdownPct: number;
  maxDailyLossPct: number;
  maxLossPerTradePct: number;
  enableDailyLimit: boolean;
}

export const DEFAULT_RISK_LIMITS: RiskLimits = {
  maxPositionSizePct: 0.2,
  maxTotalExposurePct: 0.95,
  maxDrawdownPct: 0.15,
  maxDailyLossPct: 0.05,
  maxLossPerTradePct: 0.02,
  enableDailyLimit: true
};

export interface RiskMetrics {
  peakValue: number;
  currentDrawdownPct: number;
  maxObservedDrawdownPct: number;
  drawdownLimitBreached: boolean;
  dailyPnl: number;
  limits: RiskLimits;
}

const DAILY_HISTORY_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

function dayKey(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function pct(fraction: number): string {
  return `${(fraction * 100).toFixed(1)}%`;
}

export class RiskManager {
  private readonly limits: RiskLimits;
  private readonly logger: LoggerService;
  private readonly now: () => Date;
  private peakValue = 0;
  private currentDrawdownPct = 0;
  private maxObservedDrawdownPct = 0;
  private dailyPnl: Map<string, number> = new Map();

  constructor(limits: Partial<RiskLimits> = {}, logger?: LoggerService, now: () => Date = () => new Date()) {
    this.limits = { ...DEFAULT_RISK_LIMITS, ...limits };
    this.logger = logger ?? new ConsoleLogger('RiskManager');
    this.now = now;
  }

  /**
   * Checks a prospective order against position-size, exposure and daily-loss limits, in that order.
   * Sells reduce risk and are always allowed.
   */
  checkOrder(
    symbol: string,
    quantity: number,
    price: number,
    portfolioValue: number,
    openPositions: readonly Position[],
    side: OrderSide
  ): Result<void, RiskViolationError> {
    if (side === 'sell') {
      return ok(undefined);
    }

    if (!(portfolioValue > 0)) {
      return this.reject(symbol, new RiskViolationError(
        `Portfolio value ${portfolioValue} leaves no capacity for new positions`,
        'portfolio_value',
        0,
        portfolioValue
      ));
    }

    const orderValue = quantity * price;
    const positionFraction = orderValue / portfolioValue;
    if (positionFraction > this.limits.maxPositionSizePct) {
      return this.reject(symbol, new RiskViolationError(
        `Position size ${pct(positionFraction)} exceeds limit ${pct(this.limits.maxPositionSizePct)}`,
        'position_size',
        this.limits.maxPositionSizePct,
        positionFraction
      ));
    }

    const openValue = openPositions.reduce((acc, position) => acc + Math.abs(position.marketValue), 0);
    const exposureFraction = (openValue + orderValue) / portfolioValue;
    if (exposureFraction > this.limits.maxTotalExposurePct) {
      return this.reject(symbol, new RiskViolationError(
        `Total exposure ${pct(exposureFraction)} exceeds limit ${pct(this.limits.maxTotalExposurePct)}`,
        'total_exposure',
        this.limits.maxTotalExposurePct,
        exposureFraction
      ));
    }

    if (this.limits.enableDailyLimit) {
      const todayPnl = this.getDailyPnl();
      const lossFraction = todayPnl < 0 ? -todayPnl / portfolioValue : 0;
      if (lossFraction > this.limits.maxDailyLossPct) {
        return this.reject(symbol, new RiskViolationError(
          `Daily loss ${pct(lossFraction)} exceeds limit ${pct(this.limits.maxDailyLossPct)}`,
          'daily_loss',
          this.limits.maxDailyLossPct,
          lossFraction
        ));
      }
    }

    return ok(undefined);
  }

  /**
   * Quantity risking riskPct of the portfolio between entry and stop, capped by the position-size limit
   */
  positionSize(
    portfolioValue: number,
    entryPrice: number,
    stopPrice: number,
    riskPct: number = this.limits.maxLossPerTradePct,
    maxPositionPct: number = this.limits.maxPositionSizePct
  ): number {
    if (!(portfolioValue > 0) || !(entryPrice > 0)) {
      return 0;
    }

    const capped = (portfolioValue * maxPositionPct) / entryPrice;
    const riskPerUnit = Math.abs(entryPrice - stopPrice);
    if (riskPerUnit === 0) {
      return capped;
    }

    return Math.min((portfolioValue * riskPct) / riskPerUnit, capped);
  }

  /**
   * Observes the latest portfolio value and returns the current drawdown percent
   */
  updateDrawdown(currentValue: number): number {
    if (currentValue > this.peakValue) {
      this.peakValue = currentValue;
    }

    this.currentDrawdownPct = currentValue < this.peakValue
      ? ((this.peakValue - currentValue) * 100) / this.peakValue
      : 0;
    this.maxObservedDrawdownPct = Math.max(this.maxObservedDrawdownPct, this.currentDrawdownPct);

    return this.currentDrawdownPct;
  }

  getCurrentDrawdownPct(): number {
    return this.currentDrawdownPct;
  }

  /**
   * True while the current drawdown is within the configured maximum
   */
  checkDrawdownLimit(): boolean {
    return this.currentDrawdownPct / 100 <= this.limits.maxDrawdownPct;
  }

  updateDailyPnl(pnl: number, date: Date = this.now()): void {
    const key = dayKey(date);
    this.dailyPnl.set(key, (this.dailyPnl.get(key) ?? 0) + pnl);
  }

  getDailyPnl(date: Date = this.now()): number {
    return this.dailyPnl.get(dayKey(date)) ?? 0;
  }

  /**
   * Drops daily P&L entries older than the retention window
   */
  resetDailyLimits(): void {
    const cutoff = dayKey(new Date(this.now().getTime() - DAILY_HISTORY_DAYS * DAY_MS));
    for (const key of Array.from(this.dailyPnl.keys())) {
      if (key < cutoff) {
        this.dailyPnl.delete(key);
      }
    }
  }

  stopLossPrice(entryPrice: number, stopLossPct: number, direction: PositionDirection = 'long'): number {
    return direction === 'long' ? entryPrice * (1 - stopLossPct) : entryPrice * (1 + stopLossPct);
  }

  takeProfitPrice(entryPrice: number, takeProfitPct: number, direction: PositionDirection = 'long'): number {
    return direction === 'long' ? entryPrice * (1 + takeProfitPct) : entryPrice * (1 - takeProfitPct);
  }

  shouldClosePosition(
    currentPrice: number,
    stopLoss: number,
    takeProfit: number,
    direction: PositionDirection = 'long'
  ): ProtectiveExit | null {
    if (direction === 'long') {
      if (currentPrice <= stopLoss) return 'stop_loss';
      if (currentPrice >= takeProfit) return 'take_profit';
    } else {
      if (currentPrice >= stopLoss) return 'stop_loss';
      if (currentPrice <= takeProfit) return 'take_profit';
    }
    return null;
  }

  getLimits(): RiskLimits {
    return { ...this.limits };
  }

  getRiskMetrics(): RiskMetrics {
    return {
      peakValue: this.peakValue,
      currentDrawdownPct: this.currentDrawdownPct,
      maxObservedDrawdownPct: this.maxObservedDrawdownPct,
      drawdownLimitBreached: !this.checkDrawdownLimit(),
      dailyPnl: this.getDailyPnl(),
      limits: this.getLimits()
    };
  }

  reset(): void {
    this.peakValue = 0;
    this.currentDrawdownPct = 0;
    this.maxObservedDrawdownPct = 0;
    this.dailyPnl.clear();
  }

  private reject(symbol: string, violation: RiskViolationError): Result<void, RiskViolationError> {
    this.logger.warn('Order blocked by risk check', {
      symbol,
      rule: violation.rule,
      limit: violation.limit,
      measured: violation.measured
    });
    return err(violation);
  }
}
