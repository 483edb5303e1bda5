/**
 * Order data models
 */

export type OrderStatus = 'pending' | 'filled' | 'cancelled' | 'rejected';
export type OrderSide = 'buy' | 'sell';
export type OrderType = 'market' | 'limit' | 'stop' | 'stop_limit';

export interface OrderRequest {
  symbol: string;
  side: OrderSide;
  quantity: number;
  orderType: OrderType;
  price?: number;
  stopPrice?: number;
}

export interface Order {
  orderId: string;
  symbol: string;
  side: OrderSide;
  orderType: OrderType;
  quantity: number;
  price?: number;
  stopPrice?: number;
  status: OrderStatus;
  filledQuantity: number;
  averageFillPrice?: number;
  commission: number;
  slippage: number;
  createdAt: Date;
  updatedAt: Date;
  filledAt?: Date;
  rejectionReason?: string;
}

export interface OrderStatistics {
  totalOrders: number;
  filledOrders: number;
  pendingOrders: number;
  cancelledOrders: number;
  rejectedOrders: number;
  totalCommission: number;
  totalSlippage: number;
}
