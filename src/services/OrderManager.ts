/**
 * Order Manager
 * Owns the order lifecycle: validation, pending book, per-tick fill evaluation and cancellation
 */

import { randomBytes } from 'crypto';
import { Order, OrderRequest, OrderSide, OrderStatistics, OrderStatus } from '../models/Order';
import { ApplicationError } from '../utils/ErrorHandler';
import { ConsoleLogger, LoggerService } from '../utils/Logger';
import { err, ok, Result } from '../utils/Result';
import { InvalidOrderError } from '../utils/TradingErrors';

export interface OrderManagerConfig {
  commissionPct: number;
  slippagePct: number;
}

export const DEFAULT_ORDER_MANAGER_CONFIG: OrderManagerConfig = {
  commissionPct: 0.001,
  slippagePct: 0.0005
};

export interface FillDetails {
  tickPrice: number;
  fillPrice: number;
  commission: number;
  slippage: number;
  timestamp: Date;
}

/**
 * Applies a fill to the account before the order is marked filled.
 * A failed settlement rejects the order instead.
 */
export type SettlementHandler = (order: Order, fill: FillDetails) => Result<unknown, ApplicationError>;

export class OrderManager {
  private readonly config: OrderManagerConfig;
  private readonly logger: LoggerService;
  private readonly now: () => Date;
  private orders: Map<string, Order> = new Map();
  private pending: Map<string, Order> = new Map();

  constructor(
    config: Partial<OrderManagerConfig> = {},
    logger?: LoggerService,
    now: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_ORDER_MANAGER_CONFIG, ...config };
    this.logger = logger ?? new ConsoleLogger('OrderManager');
    this.now = now;
  }

  /**
   * Validates and books a new pending order
   */
  createOrder(request: OrderRequest): Result<Order, InvalidOrderError> {
    const validationError = this.validateOrder(request);
    if (validationError) {
      this.logger.warn('Order rejected at creation', { ...request, reason: validationError.message });
      return err(validationError);
    }

    const createdAt = this.now();
    const order: Order = {
      orderId: this.generateOrderId(),
      symbol: request.symbol,
      side: request.side,
      orderType: request.orderType,
      quantity: request.quantity,
      price: request.price,
      stopPrice: request.stopPrice,
      status: 'pending',
      filledQuantity: 0,
      commission: 0,
      slippage: 0,
      createdAt,
      updatedAt: createdAt
    };

    this.orders.set(order.orderId, order);
    this.pending.set(order.orderId, order);

    this.logger.info('Order created', {
      orderId: order.orderId,
      symbol: order.symbol,
      side: order.side,
      orderType: order.orderType,
      quantity: order.quantity
    });

    return ok({ ...order });
  }

  /**
   * Evaluates pending orders for one symbol at the tick price; returns the orders that filled
   */
  processTick(symbol: string, price: number, timestamp: Date = this.now(), settle?: SettlementHandler): Order[] {
    const filled: Order[] = [];

    if (!Number.isFinite(price) || price <= 0) {
      this.logger.warn('Ignoring non-positive tick price', { symbol, price });
      return filled;
    }

    for (const order of Array.from(this.pending.values())) {
      if (order.symbol !== symbol || !this.shouldFill(order, price)) {
        continue;
      }

      const fill = this.computeFill(order, price, timestamp);
      const settlement = settle ? settle({ ...order }, fill) : ok(undefined);

      this.pending.delete(order.orderId);
      order.updatedAt = timestamp;

      if (!settlement.success) {
        this.markRejected(order, settlement.error.message);
        continue;
      }

      order.status = 'filled';
      order.filledQuantity = order.quantity;
      order.averageFillPrice = fill.fillPrice;
      order.commission = fill.commission;
      order.slippage = fill.slippage;
      order.filledAt = timestamp;

      this.logger.info('Order filled', {
        orderId: order.orderId,
        symbol,
        side: order.side,
        quantity: order.quantity,
        fillPrice: fill.fillPrice,
        commission: fill.commission
      });

      filled.push({ ...order });
    }

    return filled;
  }

  /**
   * Cancels a pending order; false when the order is unknown or already terminal
   */
  cancelOrder(orderId: string): boolean {
    const order = this.pending.get(orderId);
    if (!order) {
      return false;
    }

    this.pending.delete(orderId);
    order.status = 'cancelled';
    order.updatedAt = this.now();

    this.logger.info('Order cancelled', { orderId, symbol: order.symbol });
    return true;
  }

  getOrder(orderId: string): Order | undefined {
    const order = this.orders.get(orderId);
    return order ? { ...order } : undefined;
  }

  getPendingOrders(symbol?: string): Order[] {
    return this.select(Array.from(this.pending.values()), symbol);
  }

  getFilledOrders(symbol?: string): Order[] {
    return this.select(this.byStatus('filled'), symbol);
  }

  getOrdersByStatus(status: OrderStatus): Order[] {
    return this.select(this.byStatus(status));
  }

  getAllOrders(): Order[] {
    return this.select(Array.from(this.orders.values()));
  }

  getStatistics(): OrderStatistics {
    const all = Array.from(this.orders.values());
    const filled = all.filter(order => order.status === 'filled');

    return {
      totalOrders: all.length,
      filledOrders: filled.length,
      pendingOrders: this.pending.size,
      cancelledOrders: all.filter(order => order.status === 'cancelled').length,
      rejectedOrders: all.filter(order => order.status === 'rejected').length,
      totalCommission: filled.reduce((acc, order) => acc + order.commission, 0),
      totalSlippage: filled.reduce((acc, order) => acc + order.slippage, 0)
    };
  }

  /**
   * Drops every order; used when the owning engine resets
   */
  clear(): void {
    this.orders.clear();
    this.pending.clear();
  }

  /**
   * Returns the reason a request is malformed, or undefined when it is acceptable
   */
  validateOrder(request: OrderRequest): InvalidOrderError | undefined {
    const { symbol, quantity, orderType, price, stopPrice } = request;

    if (!symbol || symbol.trim().length === 0) {
      return new InvalidOrderError('Symbol is required', { symbol });
    }

    if (!Number.isFinite(quantity) || quantity <= 0) {
      return new InvalidOrderError(`Quantity must be positive, got ${quantity}`, { symbol, quantity });
    }

    if ((orderType === 'limit' || orderType === 'stop_limit') && !isPositivePrice(price)) {
      return new InvalidOrderError(`${orderType} order requires a positive limit price`, { symbol, orderType, price });
    }

    if ((orderType === 'stop' || orderType === 'stop_limit') && !isPositivePrice(stopPrice)) {
      return new InvalidOrderError(`${orderType} order requires a positive stop price`, { symbol, orderType, stopPrice });
    }

    return undefined;
  }

  private shouldFill(order: Order, price: number): boolean {
    switch (order.orderType) {
      case 'market':
        return true;
      case 'limit':
        return limitReached(order.side, price, order.price);
      case 'stop':
        return stopTriggered(order.side, price, order.stopPrice);
      case 'stop_limit':
        return stopTriggered(order.side, price, order.stopPrice) && limitReached(order.side, price, order.price);
    }
  }

  private computeFill(order: Order, tickPrice: number, timestamp: Date): FillDetails {
    const adjustment = order.side === 'buy' ? 1 + this.config.slippagePct : 1 - this.config.slippagePct;
    const fillPrice = tickPrice * adjustment;

    return {
      tickPrice,
      fillPrice,
      commission: order.quantity * fillPrice * this.config.commissionPct,
      slippage: Math.abs(fillPrice - tickPrice) * order.quantity,
      timestamp
    };
  }

  private markRejected(order: Order, reason: string): void {
    order.status = 'rejected';
    order.rejectionReason = reason;

    this.logger.warn('Order rejected at fill', {
      orderId: order.orderId,
      symbol: order.symbol,
      side: order.side,
      reason
    });
  }

  private byStatus(status: OrderStatus): Order[] {
    return Array.from(this.orders.values()).filter(order => order.status === status);
  }

  private select(orders: Order[], symbol?: string): Order[] {
    return orders
      .filter(order => symbol === undefined || order.symbol === symbol)
      .map(order => ({ ...order }));
  }

  private generateOrderId(): string {
    return `ORD-${randomBytes(6).toString('hex').toUpperCase()}`;
  }
}

function isPositivePrice(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

function limitReached(side: OrderSide, price: number, limit: number | undefined): boolean {
  if (limit === undefined) return false;
  return side === 'buy' ? price <= limit : price >= limit;
}

function stopTriggered(side: OrderSide, price: number, stop: number | undefined): boolean {
  if (stop === undefined) return false;
  return side === 'buy' ? price >= stop : price <= stop;
}
