/**
 * Trading Engine
 * Single entry point for order placement and price updates; composes the order book,
 * the portfolio and the optional risk layer for one trading session
 */

import { PriceFeed } from '../connectors/PriceFeed';
import { AuditSink, TradeEventType } from '../models/AuditEvent';
import { Order, OrderRequest, OrderStatistics, OrderStatus } from '../models/Order';
import { ClosedTrade, PortfolioStatistics, PortfolioSummary, Position } from '../models/Position';
import { ApplicationError, ErrorHandler } from '../utils/ErrorHandler';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, ok, Result } from '../utils/Result';
import {
  DataUnavailableError,
  InsufficientCashError,
  InvalidOrderError,
  NoPositionError,
  OverCloseError,
  PlaceOrderError,
  RiskViolationError
} from '../utils/TradingErrors';
import { DEFAULT_ORDER_MANAGER_CONFIG, FillDetails, OrderManager } from './OrderManager';
import { DEFAULT_INITIAL_CAPITAL, PortfolioManager } from './PortfolioManager';
import { RiskLimits, RiskManager, RiskMetrics } from './RiskManager';

export interface TradingEngineConfig {
  initialCapital: number;
  commissionPct: number;
  slippagePct: number;
  enableRiskManagement: boolean;
  risk: Partial<RiskLimits>;
}

export const DEFAULT_ENGINE_CONFIG: TradingEngineConfig = {
  initialCapital: DEFAULT_INITIAL_CAPITAL,
  commissionPct: DEFAULT_ORDER_MANAGER_CONFIG.commissionPct,
  slippagePct: DEFAULT_ORDER_MANAGER_CONFIG.slippagePct,
  enableRiskManagement: true,
  risk: {}
};

export interface TradingEngineDependencies {
  logger?: LoggerService;
  auditSink?: AuditSink;
  priceFeed?: PriceFeed;
  errorHandler?: ErrorHandler;
  now?: () => Date;
}

/**
 * Order request with optional protective exits placed once a buy fills:
 * a stop sell at fill × (1 − stopLossPct) and a limit sell at fill × (1 + takeProfitPct).
 * Whichever fills first cancels the other.
 */
export interface PlaceOrderRequest extends OrderRequest {
  stopLossPct?: number;
  takeProfitPct?: number;
}

export interface EngineStatus {
  initialCapital: number;
  currentValue: number;
  cash: number;
  totalPnl: number;
  returnPct: number;
  openPositions: number;
  totalTrades: number;
  pendingOrders: number;
  totalCommission: number;
  createdAt: Date;
  riskMetrics?: RiskMetrics;
}

interface ProtectionRequest {
  stopLossPct?: number;
  takeProfitPct?: number;
}

interface TickOutcome {
  filled: Order[];
  rejections: Map<string, ApplicationError>;
}

export class TradingEngine {
  private readonly config: TradingEngineConfig;
  private readonly orderManager: OrderManager;
  private readonly portfolio: PortfolioManager;
  private readonly riskManager?: RiskManager;
  private readonly logger: LoggerService;
  private readonly auditSink?: AuditSink;
  private readonly priceFeed?: PriceFeed;
  private readonly errorHandler: ErrorHandler;
  private readonly now: () => Date;
  private readonly createdAt: Date;
  private currentPrices: Map<string, number> = new Map();
  private pendingProtection: Map<string, ProtectionRequest> = new Map();
  private protectiveSiblings: Map<string, string> = new Map();

  constructor(config: Partial<TradingEngineConfig> = {}, dependencies: TradingEngineDependencies = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...config };
    this.logger = dependencies.logger ?? new ConsoleLogger('TradingEngine');
    this.auditSink = dependencies.auditSink;
    this.priceFeed = dependencies.priceFeed;
    this.errorHandler = dependencies.errorHandler ?? new ErrorHandler({ logger: this.logger });
    this.now = dependencies.now ?? (() => new Date());
    this.createdAt = this.now();

    this.orderManager = new OrderManager(
      { commissionPct: this.config.commissionPct, slippagePct: this.config.slippagePct },
      this.logger,
      this.now
    );
    this.portfolio = new PortfolioManager(this.config.initialCapital, this.logger, this.now);
    if (this.config.enableRiskManagement) {
      this.riskManager = new RiskManager(this.config.risk, this.logger, this.now);
    }
  }

  /**
   * Validates, risk-checks and books an order. Market orders execute immediately at the
   * reference price and resolve to the filled order.
   */
  async placeOrder(request: PlaceOrderRequest): Promise<Result<Order, PlaceOrderError>> {
    const invalid = this.orderManager.validateOrder(request);
    if (invalid) {
      this.audit('ORDER_REJECTED', { ...request, reason: invalid.message });
      return err(invalid);
    }

    const referencePrice = await this.resolveReferencePrice(request);
    if (referencePrice === undefined) {
      const unavailable = new DataUnavailableError(request.symbol, 'no reference price', 'placeOrder');
      this.audit('ORDER_REJECTED', { ...request, reason: unavailable.message });
      return err(unavailable);
    }

    if (this.riskManager && request.side === 'buy') {
      // Limit buys never fill above their limit
      const limited = request.orderType === 'limit' || request.orderType === 'stop_limit';
      const riskPrice = limited && request.price !== undefined ? request.price : referencePrice;
      const check = this.riskManager.checkOrder(
        request.symbol,
        request.quantity,
        riskPrice,
        this.portfolio.getPortfolioValue(),
        this.portfolio.getAllPositions(),
        request.side
      );
      if (!check.success) {
        this.audit('ORDER_REJECTED', { ...request, reason: check.error.message, rule: check.error.rule });
        return err(check.error);
      }
    }

    const created = this.orderManager.createOrder(request);
    if (!created.success) {
      return created;
    }

    const order = created.value;
    this.audit('ORDER_CREATED', {
      orderId: order.orderId,
      symbol: order.symbol,
      side: order.side,
      orderType: order.orderType,
      quantity: order.quantity,
      price: order.price,
      stopPrice: order.stopPrice
    });

    if (request.side === 'buy' && (request.stopLossPct !== undefined || request.takeProfitPct !== undefined)) {
      this.pendingProtection.set(order.orderId, {
        stopLossPct: request.stopLossPct,
        takeProfitPct: request.takeProfitPct
      });
    }

    if (order.orderType !== 'market') {
      return ok(order);
    }

    const outcome = this.processOrders(order.symbol, referencePrice, this.now());
    this.portfolio.updatePrice(order.symbol, referencePrice);

    const rejection = outcome.rejections.get(order.orderId);
    if (rejection && isPlaceOrderError(rejection)) {
      return err(rejection);
    }

    const settled = this.orderManager.getOrder(order.orderId);
    return ok(settled ?? order);
  }

  cancelOrder(orderId: string): boolean {
    const cancelled = this.orderManager.cancelOrder(orderId);
    if (cancelled) {
      this.pendingProtection.delete(orderId);
      this.protectiveSiblings.delete(orderId);
      this.audit('ORDER_CANCELLED', { orderId });
    }
    return cancelled;
  }

  /**
   * Records a price, revalues the symbol's position, fills eligible pending orders for that
   * symbol only and lets the risk layer observe the resulting portfolio value
   */
  updateMarketData(symbol: string, price: number, timestamp: Date = this.now()): Order[] {
    if (!Number.isFinite(price) || price <= 0) {
      this.logger.warn('Ignoring invalid market price', { symbol, price });
      return [];
    }

    this.currentPrices.set(symbol, price);
    this.portfolio.updatePrice(symbol, price, timestamp);

    const outcome = this.processOrders(symbol, price, timestamp);
    this.portfolio.updatePrice(symbol, price, timestamp);

    if (this.riskManager) {
      const drawdown = this.riskManager.updateDrawdown(this.portfolio.getPortfolioValue());
      if (!this.riskManager.checkDrawdownLimit()) {
        this.logger.warn('Drawdown limit breached', {
          drawdownPct: drawdown,
          limitPct: this.riskManager.getLimits().maxDrawdownPct * 100
        });
      }
    }

    return outcome.filled;
  }

  /**
   * Pulls current prices for the given symbols, or for every held or pending symbol
   */
  async fetchAndUpdatePrices(symbols?: string[]): Promise<Map<string, Order[]>> {
    const filled = new Map<string, Order[]>();
    const priceFeed = this.priceFeed;
    if (!priceFeed) {
      this.logger.warn('No price feed configured; skipping price refresh');
      return filled;
    }

    const targets = symbols ?? this.getActiveSymbols();
    for (const symbol of targets) {
      try {
        const price = await priceFeed.currentPrice(symbol);
        if (price === null) {
          this.logger.warn('No price returned', { symbol });
          continue;
        }
        filled.set(symbol, this.updateMarketData(symbol, price));
      } catch (error) {
        this.logger.error('Failed to fetch price', {
          symbol,
          error: error instanceof Error ? error.message : String(error)
        });
      }
    }

    return filled;
  }

  getCurrentPrice(symbol: string): number | undefined {
    return this.currentPrices.get(symbol);
  }

  getPositions(): Position[] {
    return this.portfolio.getAllPositions();
  }

  getPosition(symbol: string): Position | undefined {
    return this.portfolio.getPosition(symbol);
  }

  getOrder(orderId: string): Order | undefined {
    return this.orderManager.getOrder(orderId);
  }

  getOrders(status?: OrderStatus): Order[] {
    return status ? this.orderManager.getOrdersByStatus(status) : this.orderManager.getAllOrders();
  }

  getPendingOrders(symbol?: string): Order[] {
    return this.orderManager.getPendingOrders(symbol);
  }

  getOrderStatistics(): OrderStatistics {
    return this.orderManager.getStatistics();
  }

  getClosedTrades(symbol?: string): ClosedTrade[] {
    return this.portfolio.getClosedTrades(symbol);
  }

  getPortfolioSummary(): PortfolioSummary {
    return this.portfolio.getSummary();
  }

  getPortfolioStatistics(): PortfolioStatistics {
    return this.portfolio.getStatistics();
  }

  getPortfolioValue(): number {
    return this.portfolio.getPortfolioValue();
  }

  getCash(): number {
    return this.portfolio.getCash();
  }

  getRiskMetrics(): RiskMetrics | undefined {
    return this.riskManager?.getRiskMetrics();
  }

  getStatus(): EngineStatus {
    const summary = this.portfolio.getSummary();

    return {
      initialCapital: summary.initialCapital,
      currentValue: summary.portfolioValue,
      cash: summary.cashBalance,
      totalPnl: summary.totalPnl,
      returnPct: summary.returnPct,
      openPositions: summary.openPositions,
      totalTrades: summary.totalTrades,
      pendingOrders: this.orderManager.getPendingOrders().length,
      totalCommission: this.portfolio.getTotalCommission(),
      createdAt: this.createdAt,
      riskMetrics: this.riskManager?.getRiskMetrics()
    };
  }

  /**
   * Returns the session to its starting capital with no orders, positions or history
   */
  reset(): void {
    this.portfolio.reset();
    this.orderManager.clear();
    this.riskManager?.reset();
    this.currentPrices.clear();
    this.pendingProtection.clear();
    this.protectiveSiblings.clear();
    this.logger.info('Trading engine reset', { initialCapital: this.config.initialCapital });
  }

  private async resolveReferencePrice(request: OrderRequest): Promise<number | undefined> {
    const known = this.currentPrices.get(request.symbol) ?? (await this.fetchQuote(request.symbol));
    if (known !== undefined) {
      return known;
    }
    if (request.orderType === 'market') {
      return undefined;
    }
    return request.price ?? request.stopPrice;
  }

  private async fetchQuote(symbol: string): Promise<number | undefined> {
    const priceFeed = this.priceFeed;
    if (!priceFeed) {
      return undefined;
    }

    const outcome = await this.errorHandler.handleError(
      async () => {
        const price = await priceFeed.currentPrice(symbol);
        if (price === null || !Number.isFinite(price) || price <= 0) {
          throw new DataUnavailableError(symbol, 'no quote', 'fetchCurrentPrice');
        }
        return price;
      },
      { operation: 'fetchCurrentPrice', component: 'TradingEngine', symbol, timestamp: this.now() }
    );

    if (!outcome.success) {
      this.logger.warn('Quote unavailable', { symbol, error: outcome.error.message });
      return undefined;
    }

    this.currentPrices.set(symbol, outcome.result);
    return outcome.result;
  }

  private processOrders(symbol: string, price: number, timestamp: Date): TickOutcome {
    const rejections = new Map<string, ApplicationError>();

    const filled = this.orderManager.processTick(symbol, price, timestamp, (order, fill) => {
      const settlement = this.settleFill(order, fill);
      if (!settlement.success) {
        rejections.set(order.orderId, settlement.error);
      }
      return settlement;
    });

    for (const order of filled) {
      this.audit('ORDER_FILLED', {
        orderId: order.orderId,
        symbol: order.symbol,
        side: order.side,
        quantity: order.filledQuantity,
        fillPrice: order.averageFillPrice,
        commission: order.commission,
        slippage: order.slippage
      });
      this.afterFill(order);
    }

    for (const [orderId, reason] of rejections) {
      this.audit('ORDER_REJECTED', { orderId, symbol, reason: reason.message });
      this.pendingProtection.delete(orderId);
      this.cancelSibling(orderId);
    }

    return { filled, rejections };
  }

  private settleFill(order: Order, fill: FillDetails): Result<unknown, ApplicationError> {
    if (order.side === 'buy') {
      return this.portfolio.openOrAdd(order.symbol, order.quantity, fill.fillPrice, fill.commission, fill.timestamp);
    }

    const closed = this.portfolio.closeOrReduce(order.symbol, order.quantity, fill.fillPrice, fill.commission, fill.timestamp);
    if (closed.success && this.riskManager) {
      this.riskManager.updateDailyPnl(closed.value.realizedPnl, fill.timestamp);
    }
    return closed;
  }

  private afterFill(order: Order): void {
    this.cancelSibling(order.orderId);

    const protection = this.pendingProtection.get(order.orderId);
    if (!protection || order.averageFillPrice === undefined) {
      return;
    }
    this.pendingProtection.delete(order.orderId);

    const fillPrice = order.averageFillPrice;
    const placed: string[] = [];

    if (protection.stopLossPct !== undefined) {
      const stop = this.orderManager.createOrder({
        symbol: order.symbol,
        side: 'sell',
        quantity: order.quantity,
        orderType: 'stop',
        stopPrice: fillPrice * (1 - protection.stopLossPct)
      });
      if (stop.success) placed.push(stop.value.orderId);
    }

    if (protection.takeProfitPct !== undefined) {
      const target = this.orderManager.createOrder({
        symbol: order.symbol,
        side: 'sell',
        quantity: order.quantity,
        orderType: 'limit',
        price: fillPrice * (1 + protection.takeProfitPct)
      });
      if (target.success) placed.push(target.value.orderId);
    }

    if (placed.length === 2) {
      this.protectiveSiblings.set(placed[0], placed[1]);
      this.protectiveSiblings.set(placed[1], placed[0]);
    }

    for (const orderId of placed) {
      this.audit('ORDER_CREATED', { orderId, symbol: order.symbol, side: 'sell', protectiveFor: order.orderId });
    }
  }

  private cancelSibling(orderId: string): void {
    const sibling = this.protectiveSiblings.get(orderId);
    if (sibling === undefined) {
      return;
    }
    this.protectiveSiblings.delete(orderId);
    this.protectiveSiblings.delete(sibling);
    if (this.orderManager.cancelOrder(sibling)) {
      this.audit('ORDER_CANCELLED', { orderId: sibling, reason: 'sibling filled', siblingOf: orderId });
    }
  }

  private getActiveSymbols(): string[] {
    const symbols = new Set<string>();
    for (const position of this.portfolio.getAllPositions()) symbols.add(position.symbol);
    for (const order of this.orderManager.getPendingOrders()) symbols.add(order.symbol);
    return Array.from(symbols);
  }

  private audit(eventType: TradeEventType, details: Record<string, unknown>): void {
    if (!this.auditSink) {
      return;
    }
    try {
      this.auditSink.recordTradeEvent(eventType, details);
    } catch (error) {
      this.logger.warn('Audit sink failed; continuing', {
        eventType,
        error: error instanceof Error ? error.message : String(error)
      });
    }
  }
}

function isPlaceOrderError(error: ApplicationError): error is PlaceOrderError {
  return (
    error instanceof InvalidOrderError ||
    error instanceof InsufficientCashError ||
    error instanceof NoPositionError ||
    error instanceof OverCloseError ||
    error instanceof RiskViolationError ||
    error instanceof DataUnavailableError
  );
}
