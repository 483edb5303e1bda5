/**
 * Portfolio Manager
 * Owns cash and positions, applies fills with weighted-average cost and records closed trades
 */

import { ClosedTrade, PortfolioStatistics, PortfolioSummary, Position } from '../models/Position';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, ok, Result } from '../utils/Result';
import { InsufficientCashError, InvalidOrderError, NoPositionError, OverCloseError } from '../utils/TradingErrors';

export const DEFAULT_INITIAL_CAPITAL = 10000;

// Quantities within this distance of the held amount count as a full close
const QUANTITY_EPSILON = 1e-9;

export class PortfolioManager {
  private readonly initialCapital: number;
  private readonly logger: LoggerService;
  private readonly now: () => Date;
  private cash: number;
  private positions: Map<string, Position> = new Map();
  private closedTrades: ClosedTrade[] = [];
  private totalCommission = 0;

  constructor(initialCapital: number = DEFAULT_INITIAL_CAPITAL, logger?: LoggerService, now: () => Date = () => new Date()) {
    if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
      throw new RangeError(`Initial capital must be positive, got ${initialCapital}`);
    }
    this.initialCapital = initialCapital;
    this.cash = initialCapital;
    this.logger = logger ?? new ConsoleLogger('PortfolioManager');
    this.now = now;
  }

  /**
   * Debits cash for a buy fill and opens or extends the position
   */
  openOrAdd(
    symbol: string,
    quantity: number,
    fillPrice: number,
    commission: number,
    timestamp: Date = this.now()
  ): Result<Position, InsufficientCashError | InvalidOrderError> {
    const invalid = this.validateFill(symbol, quantity, fillPrice, commission);
    if (invalid) {
      return err(invalid);
    }

    const notional = quantity * fillPrice;
    const totalCost = notional + commission;
    if (totalCost > this.cash) {
      this.logger.warn('Insufficient cash for buy', { symbol, required: totalCost, available: this.cash });
      return err(new InsufficientCashError(totalCost, this.cash, symbol));
    }

    this.cash -= totalCost;
    this.totalCommission += commission;

    const existing = this.positions.get(symbol);
    let position: Position;

    if (existing) {
      const newQuantity = existing.quantity + quantity;
      const newCostBasis = existing.costBasis + notional;
      existing.quantity = newQuantity;
      existing.costBasis = newCostBasis;
      existing.averageEntryPrice = newCostBasis / newQuantity;
      position = existing;
    } else {
      position = {
        symbol,
        quantity,
        averageEntryPrice: fillPrice,
        currentPrice: fillPrice,
        marketValue: notional,
        costBasis: notional,
        unrealizedPnl: 0,
        unrealizedPnlPct: 0,
        openedAt: timestamp,
        updatedAt: timestamp
      };
      this.positions.set(symbol, position);
    }

    revalue(position, fillPrice, timestamp);

    this.logger.info(existing ? 'Position increased' : 'Position opened', {
      symbol,
      quantity,
      fillPrice,
      commission,
      heldQuantity: position.quantity,
      averageEntryPrice: position.averageEntryPrice,
      cash: this.cash
    });

    return ok({ ...position });
  }

  /**
   * Credits cash for a sell fill, realizes P&L against the average entry price
   * and removes the position once it is fully closed
   */
  closeOrReduce(
    symbol: string,
    quantity: number,
    fillPrice: number,
    commission: number,
    timestamp: Date = this.now()
  ): Result<ClosedTrade, NoPositionError | OverCloseError | InvalidOrderError> {
    const invalid = this.validateFill(symbol, quantity, fillPrice, commission);
    if (invalid) {
      return err(invalid);
    }

    const position = this.positions.get(symbol);
    if (!position) {
      return err(new NoPositionError(symbol));
    }

    if (quantity > position.quantity + QUANTITY_EPSILON) {
      return err(new OverCloseError(symbol, quantity, position.quantity));
    }

    const proceeds = quantity * fillPrice - commission;
    const closedCost = quantity * position.averageEntryPrice;
    const realizedPnl = proceeds - closedCost;

    const trade: ClosedTrade = Object.freeze({
      symbol,
      quantity,
      entryPrice: position.averageEntryPrice,
      exitPrice: fillPrice,
      realizedPnl,
      realizedPnlPct: closedCost > 0 ? (realizedPnl / closedCost) * 100 : 0,
      commission,
      openedAt: position.openedAt,
      closedAt: timestamp
    });

    this.cash += proceeds;
    this.totalCommission += commission;
    this.closedTrades.push(trade);

    if (position.quantity - quantity <= QUANTITY_EPSILON) {
      this.positions.delete(symbol);
      this.logger.info('Position closed', { symbol, quantity, fillPrice, realizedPnl, cash: this.cash });
    } else {
      position.quantity -= quantity;
      position.costBasis = position.quantity * position.averageEntryPrice;
      revalue(position, fillPrice, timestamp);
      this.logger.info('Position reduced', {
        symbol,
        quantity,
        fillPrice,
        realizedPnl,
        remaining: position.quantity,
        cash: this.cash
      });
    }

    return ok(trade);
  }

  /**
   * Revalues every held position whose symbol has a price; cash is never touched
   */
  markToMarket(prices: ReadonlyMap<string, number>, timestamp: Date = this.now()): void {
    for (const [symbol, price] of prices) {
      const position = this.positions.get(symbol);
      if (position && Number.isFinite(price) && price > 0) {
        revalue(position, price, timestamp);
      }
    }
  }

  updatePrice(symbol: string, price: number, timestamp: Date = this.now()): void {
    this.markToMarket(new Map([[symbol, price]]), timestamp);
  }

  getCash(): number {
    return this.cash;
  }

  getInitialCapital(): number {
    return this.initialCapital;
  }

  getPositionsValue(): number {
    let total = 0;
    for (const position of this.positions.values()) {
      total += position.marketValue;
    }
    return total;
  }

  getPortfolioValue(): number {
    return this.cash + this.getPositionsValue();
  }

  getRealizedPnl(): number {
    return this.closedTrades.reduce((acc, trade) => acc + trade.realizedPnl, 0);
  }

  getUnrealizedPnl(): number {
    let total = 0;
    for (const position of this.positions.values()) {
      total += position.unrealizedPnl;
    }
    return total;
  }

  /**
   * Value change since inception, commissions included
   */
  getTotalPnl(): number {
    return this.getPortfolioValue() - this.initialCapital;
  }

  getReturnPct(): number {
    return (this.getTotalPnl() / this.initialCapital) * 100;
  }

  getTotalCommission(): number {
    return this.totalCommission;
  }

  getPosition(symbol: string): Position | undefined {
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  hasPosition(symbol: string): boolean {
    return this.positions.has(symbol);
  }

  getAllPositions(): Position[] {
    return Array.from(this.positions.values()).map(position => ({ ...position }));
  }

  getClosedTrades(symbol?: string): ClosedTrade[] {
    return this.closedTrades.filter(trade => symbol === undefined || trade.symbol === symbol);
  }

  getStatistics(): PortfolioStatistics {
    const wins = this.closedTrades.filter(trade => trade.realizedPnl > 0);
    const losses = this.closedTrades.filter(trade => trade.realizedPnl < 0);

    return {
      ...this.getSummary(),
      positionsValue: this.getPositionsValue(),
      winningTrades: wins.length,
      losingTrades: losses.length,
      averageWin: averagePnl(wins),
      averageLoss: averagePnl(losses),
      totalCommission: this.totalCommission
    };
  }

  getSummary(): PortfolioSummary {
    const totalTrades = this.closedTrades.length;
    const wins = this.closedTrades.filter(trade => trade.realizedPnl > 0).length;

    return {
      portfolioValue: this.getPortfolioValue(),
      cashBalance: this.cash,
      initialCapital: this.initialCapital,
      totalPnl: this.getTotalPnl(),
      realizedPnl: this.getRealizedPnl(),
      unrealizedPnl: this.getUnrealizedPnl(),
      returnPct: this.getReturnPct(),
      openPositions: this.positions.size,
      totalTrades,
      winRate: totalTrades > 0 ? (wins / totalTrades) * 100 : 0
    };
  }

  /**
   * Restores the starting state: full cash, no positions, no history
   */
  reset(): void {
    this.cash = this.initialCapital;
    this.positions.clear();
    this.closedTrades = [];
    this.totalCommission = 0;
  }

  private validateFill(symbol: string, quantity: number, fillPrice: number, commission: number): InvalidOrderError | undefined {
    if (!Number.isFinite(quantity) || quantity <= 0) {
      return new InvalidOrderError(`Fill quantity must be positive, got ${quantity}`, { symbol, quantity });
    }
    if (!Number.isFinite(fillPrice) || fillPrice <= 0) {
      return new InvalidOrderError(`Fill price must be positive, got ${fillPrice}`, { symbol, fillPrice });
    }
    if (!Number.isFinite(commission) || commission < 0) {
      return new InvalidOrderError(`Commission must be non-negative, got ${commission}`, { symbol, commission });
    }
    return undefined;
  }
}

function revalue(position: Position, price: number, timestamp: Date): void {
  position.currentPrice = price;
  position.marketValue = position.quantity * price;
  position.costBasis = position.quantity * position.averageEntryPrice;
  position.unrealizedPnl = position.marketValue - position.costBasis;
  position.unrealizedPnlPct = position.costBasis > 0 ? (position.unrealizedPnl / position.costBasis) * 100 : 0;
  position.updatedAt = timestamp;
}

function averagePnl(trades: ClosedTrade[]): number {
  if (trades.length === 0) return 0;
  return trades.reduce((acc, trade) => acc + trade.realizedPnl, 0) / trades.length;
}
